import { BaseAgent, STEP_LIMIT_MESSAGE, UNPARSED_OBSERVATION, type RunState } from './base-agent';
import { getSystemPrompt } from './prompts/system-prompt';
import { parseDecision } from './response-parser';

/**
 * One action per model turn: Reason -> Act -> Observe until a final answer,
 * a repeated action or the step limit. A final answer is accepted at any step.
 */
export class ReActAgent extends BaseAgent {
  protected buildSystemPrompt(): string {
    return getSystemPrompt({
      toolList: this.registry.describe(),
      today: this.options.today(),
      timezone: this.options.timezone,
    });
  }

  protected async loop(state: RunState): Promise<string> {
    for (let step = 1; step <= this.options.maxSteps; step++) {
      const text = await this.ask(state);
      state.emit(`Next: ${text}`);
      const decision = parseDecision(text);
      this.logger.debug(`Step ${step} decision: ${decision.type}`);

      switch (decision.type) {
        case 'final':
          return this.finish(state, decision.text);

        case 'action': {
          const terminal = await this.performAction(state, decision.action);
          if (terminal !== null) {
            return terminal;
          }
          break;
        }

        case 'unparsed':
          state.conversation.append(UNPARSED_OBSERVATION);
          state.emit('Warning: unparseable output; retrying.');
          break;
      }
    }

    return this.finish(state, STEP_LIMIT_MESSAGE);
  }
}
