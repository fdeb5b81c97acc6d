import type { Settings } from '../config';
import type { CompletionProvider } from '../llm';
import type { TaskAgent, Tool } from '../types';
import { TODAY_PHRASES, todayIso } from '../utils/dates';
import type { Logger } from '../utils/logger';
import type { AgentDependencies } from './base-agent';
import { PlanAgent } from './plan-agent';
import { ReActAgent } from './react-agent';
import { ToolRegistry } from './tool-registry';

export interface CreateAgentOptions {
  settings: Settings;
  provider: CompletionProvider;
  tools: readonly Tool[];
  logger: Logger;
}

export const createAgent = ({
  settings,
  provider,
  tools,
  logger,
}: CreateAgentOptions): TaskAgent => {
  const dependencies: AgentDependencies = {
    provider,
    registry: new ToolRegistry(tools),
    logger,
    options: {
      model: settings.model,
      temperature: settings.temperature,
      requestTimeoutMs: settings.requestTimeoutMs,
      maxSteps: settings.maxSteps,
      maxReplans: settings.maxReplans,
      timezone: settings.timezone,
      todayPhrase: TODAY_PHRASES[settings.locale],
      today: () => todayIso(settings.timezone),
    },
  };

  return settings.agentMode === 'plan'
    ? new PlanAgent(dependencies)
    : new ReActAgent(dependencies);
};

export { BaseAgent, STEP_LIMIT_MESSAGE, STUCK_MESSAGE, REPLAN_LIMIT_MESSAGE } from './base-agent';
export type { AgentDependencies, AgentOptions } from './base-agent';
export { PlanAgent } from './plan-agent';
export { ReActAgent } from './react-agent';
export { ToolRegistry } from './tool-registry';
export { ToolExecutor } from './tool-executor';
export { parseDecision, parsePlan, cleanFinalAnswer } from './response-parser';
