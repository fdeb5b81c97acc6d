/**
 * @fileoverview Unit tests for ToolRegistry and ToolExecutor
 */

import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { ConfigurationError } from '../errors';
import type { Tool } from '../types';
import { Logger } from '../utils/logger';
import { ToolExecutor } from './tool-executor';
import { ToolRegistry } from './tool-registry';

const silent = new Logger('test', 'silent');

const echoTool: Tool = {
  name: 'echo',
  description: 'Echoes text',
  argsSchema: z.object({ text: z.string() }),
  execute: async (args) => ({ echo: args.text }),
};

describe('ToolRegistry', () => {
  it('looks tools up by name', () => {
    const registry = new ToolRegistry([echoTool]);

    expect(registry.get('echo')).toBe(echoTool);
    expect(registry.get('missing')).toBeUndefined();
    expect(registry.list()).toEqual([echoTool]);
  });

  it('refuses duplicate names at construction', () => {
    expect(() => new ToolRegistry([echoTool, { ...echoTool }])).toThrow(
      ConfigurationError,
    );
  });

  it('describes each tool with its JSON schema', () => {
    const [line] = new ToolRegistry([echoTool]).describe().split('\n');

    expect(line.startsWith('- echo: Echoes text (schema: {')).toBe(true);
    expect(line).toContain('"required":["text"]');
  });
});

describe('ToolExecutor', () => {
  it('returns the handler result', async () => {
    const executor = new ToolExecutor(new ToolRegistry([echoTool]), silent);

    await expect(executor.execute('echo', { text: 'hi' })).resolves.toEqual({
      echo: 'hi',
    });
  });

  it('reports an unknown tool as a structured error', async () => {
    const executor = new ToolExecutor(new ToolRegistry([echoTool]), silent);

    await expect(executor.execute('weather_xyz', {})).resolves.toEqual({
      error: "Tool 'weather_xyz' not available.",
    });
  });

  it('converts a rejected handler into an error result', async () => {
    const failing: Tool = {
      ...echoTool,
      name: 'failing',
      execute: vi.fn().mockRejectedValue(new Error('upstream 503')),
    };
    const executor = new ToolExecutor(new ToolRegistry([failing]), silent);

    await expect(executor.execute('failing', {})).resolves.toEqual({
      error: 'upstream 503',
    });
  });

  it('converts a synchronous throw into an error result', async () => {
    const throwing: Tool = {
      ...echoTool,
      name: 'throwing',
      execute: () => {
        throw new Error('bad input');
      },
    };
    const executor = new ToolExecutor(new ToolRegistry([throwing]), silent);

    await expect(executor.execute('throwing', {})).resolves.toEqual({
      error: 'bad input',
    });
  });

  it('formats validation errors by field', async () => {
    const strict: Tool = {
      ...echoTool,
      name: 'strict',
      execute: (args) => z.object({ count: z.number() }).parse(args),
    };
    const executor = new ToolExecutor(new ToolRegistry([strict]), silent);

    await expect(executor.execute('strict', { count: 'x' })).resolves.toEqual({
      error: 'count: Expected number, received string',
    });
  });

  it('passes arguments through unchanged', async () => {
    const execute = vi.fn().mockResolvedValue('ok');
    const executor = new ToolExecutor(
      new ToolRegistry([{ ...echoTool, execute }]),
      silent,
    );

    await executor.execute('echo', { text: 'a', units: 'metric' });

    expect(execute).toHaveBeenCalledWith({ text: 'a', units: 'metric' });
  });
});
