import type { Action } from '../types';
import {
  BaseAgent,
  REPLAN_LIMIT_MESSAGE,
  STEP_LIMIT_MESSAGE,
  type RunState,
} from './base-agent';
import {
  getCheckFinalPrompt,
  getConfirmActionPrompt,
  getPlanRequestPrompt,
  getPlanningSystemPrompt,
} from './prompts/task-planning-prompt';
import { parseDecision, parsePlan } from './response-parser';

export const UNPARSED_PLAN_OBSERVATION =
  'Observation: plan not understood; please output a JSON ARRAY of actions.';

/**
 * Plan -> execute every action (confirming each against what was observed)
 * -> ask whether the answer is ready, replanning up to `maxReplans` times.
 *
 * A final answer is only accepted from the check that follows a plan;
 * one sent while a plan is running is ignored.
 */
export class PlanAgent extends BaseAgent {
  protected buildSystemPrompt(): string {
    return getPlanningSystemPrompt({
      toolList: this.registry.describe(),
      today: this.options.today(),
      timezone: this.options.timezone,
      maxReplans: this.options.maxReplans,
    });
  }

  protected async loop(state: RunState): Promise<string> {
    let plan = await this.requestPlan(state);
    let replans = 0;
    let steps = 0;

    for (;;) {
      if (plan.length === 0) {
        state.conversation.append(UNPARSED_PLAN_OBSERVATION);
        state.emit('Warning: plan not understood; asking for the final check.');
      }

      for (const planned of plan) {
        if (steps >= this.options.maxSteps) {
          return this.finish(state, STEP_LIMIT_MESSAGE);
        }
        steps++;

        const action =
          state.conversation.size > 0
            ? await this.confirm(state, planned)
            : planned;
        const terminal = await this.performAction(state, action);
        if (terminal !== null) {
          return terminal;
        }
      }

      state.emit('Check-Final: asking whether the request is fully answered.');
      const verdict = await this.ask(state, getCheckFinalPrompt());
      const decision = parseDecision(verdict);
      if (decision.type === 'final') {
        return this.finish(state, decision.text);
      }

      if (replans >= this.options.maxReplans) {
        return this.finish(state, REPLAN_LIMIT_MESSAGE);
      }
      replans++;
      this.logger.debug(`Replanning (${replans}/${this.options.maxReplans})`);

      const next = parsePlan(verdict);
      if (next.length > 0) {
        state.emit(`Plan: ${JSON.stringify(next)}`);
        plan = next;
      } else {
        plan = await this.requestPlan(state);
      }
    }
  }

  private async requestPlan(state: RunState): Promise<Action[]> {
    const plan = parsePlan(await this.ask(state, getPlanRequestPrompt()));
    if (plan.length > 0) {
      state.emit(`Plan: ${JSON.stringify(plan)}`);
    }
    return plan;
  }

  // Lets the model adjust the next action to what has been observed so far
  private async confirm(state: RunState, planned: Action): Promise<Action> {
    const decision = parseDecision(
      await this.ask(state, getConfirmActionPrompt(planned)),
    );

    switch (decision.type) {
      case 'action':
        state.emit(`Confirm: ${JSON.stringify(decision.action)}`);
        return decision.action;
      case 'final':
        state.emit('Warning: final answer ignored while the plan is running.');
        return planned;
      case 'unparsed':
        state.emit('Confirm: continue');
        return planned;
    }
  }
}
