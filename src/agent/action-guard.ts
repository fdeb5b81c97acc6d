import type { Action, ToolArgs } from '../types';
import { canonicalJson } from '../utils/json';

export const REPEAT_WINDOW = 3;

// Tools whose answer depends on a date the model may leave out
export const DATE_SENSITIVE_TOOLS: ReadonlySet<string> = new Set([
  'openmeteo_forecast',
  'date_parse',
]);

export const actionSignature = (action: Action): string =>
  canonicalJson({ tool: action.tool, args: action.args });

/**
 * Sliding window over the last few action signatures of one run.
 */
export class RepetitionGuard {
  private readonly window: string[] = [];

  constructor(private readonly size: number = REPEAT_WINDOW) {}

  /**
   * Records the action and reports whether the full window now holds
   * the same signature.
   */
  record(action: Action): boolean {
    this.window.push(actionSignature(action));
    if (this.window.length > this.size) {
      this.window.shift();
    }
    return (
      this.window.length === this.size &&
      this.window.every((signature) => signature === this.window[0])
    );
  }
}

export interface SafetyDefaultsOptions {
  todayPhrase: string;
  dateSensitiveTools?: ReadonlySet<string>;
}

/**
 * Fills `units` and, for date-sensitive tools, `target_date` when the model
 * left them out. Returns the completed action and the values injected.
 */
export const applySafetyDefaults = (
  action: Action,
  { todayPhrase, dateSensitiveTools = DATE_SENSITIVE_TOOLS }: SafetyDefaultsOptions,
): { action: Action; applied: ToolArgs } => {
  const args: ToolArgs = { ...action.args };
  const applied: ToolArgs = {};

  if (!Object.hasOwn(args, 'units')) {
    args.units = 'metric';
    applied.units = 'metric';
  }
  if (dateSensitiveTools.has(action.tool) && !Object.hasOwn(args, 'target_date')) {
    args.target_date = todayPhrase;
    applied.target_date = todayPhrase;
  }

  return { action: { tool: action.tool, args }, applied };
};
