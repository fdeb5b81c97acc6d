import { ModelRequestError, errorMessage } from '../errors';
import type { CompletionProvider } from '../llm';
import type { Action, StepObserver, TaskAgent } from '../types';
import { stringifyObservation } from '../utils/json';
import type { Logger } from '../utils/logger';
import { RepetitionGuard, applySafetyDefaults } from './action-guard';
import { Conversation } from './conversation';
import { ToolExecutor } from './tool-executor';
import type { ToolRegistry } from './tool-registry';

export const STUCK_MESSAGE =
  "I'm stuck repeating the same action. Please rephrase or provide more details.";
export const STEP_LIMIT_MESSAGE =
  'I could not reach a final answer within the step limit.';
export const REPLAN_LIMIT_MESSAGE =
  'I could not reach a final answer within the replanning limit.';
export const UNPARSED_OBSERVATION =
  'Observation: model output not understood; please output a single JSON action or Final Answer.';

export interface AgentOptions {
  model: string;
  temperature: number;
  requestTimeoutMs: number;
  maxSteps: number;
  maxReplans: number;
  timezone: string;
  todayPhrase: string;
  today: () => string;
}

export interface AgentDependencies {
  provider: CompletionProvider;
  registry: ToolRegistry;
  logger: Logger;
  options: AgentOptions;
}

/**
 * Everything one `run` call owns. Built fresh per call so concurrent runs
 * on the same agent never share context.
 */
export interface RunState {
  conversation: Conversation;
  guard: RepetitionGuard;
  emit: (line: string) => void;
}

export abstract class BaseAgent implements TaskAgent {
  protected readonly options: AgentOptions;
  protected readonly registry: ToolRegistry;
  protected readonly logger: Logger;
  private readonly provider: CompletionProvider;
  private readonly executor: ToolExecutor;

  constructor({ provider, registry, logger, options }: AgentDependencies) {
    this.provider = provider;
    this.registry = registry;
    this.logger = logger;
    this.options = options;
    this.executor = new ToolExecutor(registry, logger.child('executor'));
  }

  async run(query: string, onStep?: StepObserver): Promise<string> {
    const state: RunState = {
      conversation: new Conversation(this.buildSystemPrompt(), query),
      guard: new RepetitionGuard(),
      emit: this.createEmitter(onStep),
    };

    try {
      return await this.loop(state);
    } catch (error) {
      if (error instanceof ModelRequestError) {
        return this.finish(
          state,
          `The language model request failed (${error.message}). Please try again.`,
        );
      }
      throw error;
    }
  }

  protected abstract buildSystemPrompt(): string;

  protected abstract loop(state: RunState): Promise<string>;

  protected async ask(state: RunState, instruction?: string): Promise<string> {
    let text: string;
    try {
      text = await this.provider.complete({
        messages: state.conversation.toMessages(instruction),
        model: this.options.model,
        temperature: this.options.temperature,
        timeoutMs: this.options.requestTimeoutMs,
      });
    } catch (error) {
      throw new ModelRequestError(errorMessage(error));
    }
    this.logger.debug('Model output', { text });
    return text;
  }

  /**
   * Runs one action through defaults, the repetition guard and the executor,
   * and records the observation. Returns the terminal text when the run
   * must stop, null otherwise.
   */
  protected async performAction(
    state: RunState,
    planned: Action,
  ): Promise<string | null> {
    const { action, applied } = applySafetyDefaults(planned, {
      todayPhrase: this.options.todayPhrase,
    });

    if (state.guard.record(action)) {
      this.logger.warn('Same action requested repeatedly, stopping', {
        tool: action.tool,
      });
      return this.finish(state, STUCK_MESSAGE);
    }

    const input = JSON.stringify(action.args);
    const lines = [`Action: ${action.tool}`, `Action Input: ${input}`];
    if (Object.keys(applied).length > 0) {
      lines.push(`Defaults Applied: ${JSON.stringify(applied)}`);
    }
    lines.forEach((line) => state.emit(line));

    const result = await this.executor.execute(action.tool, action.args);
    const observation = `Observation: ${stringifyObservation(result)}`;

    state.conversation.append([...lines, observation].join('\n'));
    state.emit(observation);
    return null;
  }

  protected finish(state: RunState, text: string): string {
    state.emit(`Final Answer: ${text}`);
    return text;
  }

  private createEmitter(onStep?: StepObserver): (line: string) => void {
    return (line) => {
      if (!onStep) {
        return;
      }
      try {
        onStep(line);
      } catch (error) {
        this.logger.warn('Step observer failed', { error: errorMessage(error) });
      }
    };
  }
}
