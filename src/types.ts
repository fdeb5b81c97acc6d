import type { z } from 'zod';

// Tool Types
export type ToolArgs = Record<string, unknown>;

export interface Tool {
  name: string;
  description: string;
  argsSchema: z.AnyZodObject;
  execute: (args: ToolArgs) => unknown;
}

export interface ToolError {
  error: string;
}

// Decision Types
export interface Action {
  tool: string;
  args: ToolArgs;
}

export type Decision =
  | { type: 'final'; text: string }
  | { type: 'action'; action: Action }
  | { type: 'unparsed' };

// Agent Types
export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string };

/**
 * Receives one trace line per significant event of a run
 * (`Action: ...`, `Observation: ...`, `Final Answer: ...`).
 */
export type StepObserver = (line: string) => void;

export interface TaskAgent {
  run(query: string, onStep?: StepObserver): Promise<string>;
}

export type AgentMode = 'react' | 'plan';

export interface SearchResultItem {
  title: string | null;
  url: string;
  content: string | null;
  score: number | null;
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);
