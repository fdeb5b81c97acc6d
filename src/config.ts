import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { AgentMode } from './types';
import { DEFAULT_TIMEZONE, isValidTimezone, type Locale } from './utils/dates';
import type { LogLevel } from './utils/logger';

export interface Settings {
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  exaApiKey?: string;
  model: string;
  dateModel: string;
  temperature: number;
  requestTimeoutMs: number;
  maxSteps: number;
  maxReplans: number;
  agentMode: AgentMode;
  timezone: string;
  locale: Locale;
  logLevel: LogLevel;
}

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const envSchema = z.object({
  OPENAI_API_KEY: optionalSecret,
  OPENAI_BASE_URL: optionalSecret,
  EXA_API_KEY: optionalSecret,
  DEFAULT_LLM_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  DATE_LLM_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  MAX_STEPS: z.coerce.number().int().positive().default(10),
  MAX_REPLANS: z.coerce.number().int().min(0).default(2),
  AGENT_MODE: z.enum(['react', 'plan']).default('react'),
  TIMEZONE: z
    .string()
    .default(DEFAULT_TIMEZONE)
    .transform((value) => {
      const name = value.trim();
      return name && isValidTimezone(name) ? name : DEFAULT_TIMEZONE;
    }),
  AGENT_LOCALE: z.enum(['en', 'it']).default('en'),
  LOG_LEVEL: z
    .enum(['debug', 'info', 'warn', 'error', 'silent'])
    .default('warn'),
});

/**
 * Resolves the process-wide settings once. Everything downstream receives
 * the returned object instead of reading the environment itself.
 */
export const loadSettings = (
  env: Record<string, string | undefined>,
): Readonly<Settings> => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  return Object.freeze({
    openaiApiKey: values.OPENAI_API_KEY,
    openaiBaseUrl: values.OPENAI_BASE_URL,
    exaApiKey: values.EXA_API_KEY,
    model: values.DEFAULT_LLM_MODEL,
    dateModel: values.DATE_LLM_MODEL,
    temperature: values.LLM_TEMPERATURE,
    requestTimeoutMs: values.LLM_TIMEOUT_MS,
    maxSteps: values.MAX_STEPS,
    maxReplans: values.MAX_REPLANS,
    agentMode: values.AGENT_MODE,
    timezone: values.TIMEZONE,
    locale: values.AGENT_LOCALE,
    logLevel: values.LOG_LEVEL,
  });
};
