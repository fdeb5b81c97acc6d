import { ZodError } from 'zod';

/**
 * Raised when the agent cannot be built: missing credentials,
 * invalid settings, duplicate tool names.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised by the agent when the completion provider fails. Never leaves `run`.
 */
export class ModelRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModelRequestError';
  }
}

export const errorMessage = (error: unknown): string => {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      )
      .join('; ');
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
