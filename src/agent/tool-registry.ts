import { zodSchema } from 'ai';
import { ConfigurationError } from '../errors';
import type { Tool } from '../types';

/**
 * Read-only lookup of the tools an agent may call, keyed by name.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  constructor(tools: readonly Tool[]) {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new ConfigurationError(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  list(): Tool[] {
    return [...this.tools.values()];
  }

  // One line per tool, as listed in the system prompt
  describe(): string {
    return this.list()
      .map(
        (tool) =>
          `- ${tool.name}: ${tool.description} (schema: ${JSON.stringify(
            zodSchema(tool.argsSchema).jsonSchema,
          )})`,
      )
      .join('\n');
  }
}
