import { errorMessage } from '../errors';
import type { ToolArgs, ToolError } from '../types';
import type { Logger } from '../utils/logger';
import type { ToolRegistry } from './tool-registry';

/**
 * Calls registered tools. Every failure comes back as `{ error }`;
 * nothing a handler throws gets past `execute`.
 */
export class ToolExecutor {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly logger: Logger,
  ) {}

  async execute(toolName: string, args: ToolArgs): Promise<unknown> {
    const tool = this.registry.get(toolName);
    if (!tool) {
      this.logger.warn(`Unknown tool requested: ${toolName}`);
      return toolError(`Tool '${toolName}' not available.`);
    }

    try {
      return await tool.execute(args);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(`Tool ${toolName} failed`, { error: message });
      return toolError(message);
    }
  }
}

const toolError = (message: string): ToolError => ({ error: message });
