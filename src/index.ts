#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import dotenv from 'dotenv';
import { createInterface } from 'readline';
import { createAgent } from './agent';
import { loadSettings, type Settings } from './config';
import { errorMessage } from './errors';
import { OpenAICompletionProvider } from './llm';
import { createTools } from './tools';
import type { TaskAgent } from './types';
import { colorize } from './utils/colorize';
import { todayIso } from './utils/dates';
import { createLogger } from './utils/logger';

dotenv.config();

interface CliOptions {
  task?: string;
  mode?: string;
  maxSteps?: string;
}

const buildAgent = (settings: Settings): TaskAgent => {
  const logger = createLogger('agent', settings.logLevel);
  const provider = new OpenAICompletionProvider(settings, logger.child('llm'));
  const tools = createTools({ settings, provider });
  return createAgent({ settings, provider, tools, logger });
};

const answer = async (agent: TaskAgent, question: string): Promise<void> => {
  console.log(chalk.blue.bold('\n--- Agent Trace ---'));
  const spinner = ora('Thinking...').start();

  try {
    const final = await agent.run(question, (line) => {
      spinner.stop();
      console.log(colorize(line));
      spinner.start();
    });
    spinner.stop();
    console.log(chalk.green.bold('\n=== Final Answer ==='));
    console.log(chalk.green(final));
  } catch (error) {
    spinner.fail(chalk.red(`[ERROR] ${errorMessage(error)}`));
  }
};

const startRepl = async (agent: TaskAgent): Promise<void> => {
  console.log("Type your question, or 'exit' to quit.");
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt(chalk.blue('\nYou> '));
  rl.prompt();

  for await (const line of rl) {
    const input = line.trim();
    if (['exit', 'quit'].includes(input.toLowerCase())) {
      break;
    }
    if (input) {
      await answer(agent, input);
    }
    rl.prompt();
  }

  rl.close();
  console.log('\nBye!');
};

const program = new Command();

program
  .name('task-agent')
  .description(
    'LLM task agent that answers questions with date math, web search and weather tools',
  )
  .version('1.0.0');

program
  .option('-t, --task <task>', 'Answer a single question and exit')
  .option('-m, --mode <mode>', 'Loop style: react or plan')
  .option('--max-steps <n>', 'Maximum number of loop steps')
  .action(async (options: CliOptions) => {
    const settings = loadSettings({
      ...process.env,
      ...(options.mode ? { AGENT_MODE: options.mode } : {}),
      ...(options.maxSteps ? { MAX_STEPS: options.maxSteps } : {}),
    });

    console.log(chalk.blue.bold(`=== Task Agent (${settings.agentMode}) ===`));
    console.log(
      `[Env] Today is ${chalk.yellow(todayIso(settings.timezone))} (Timezone: ${chalk.cyan(settings.timezone)})`,
    );

    if (!settings.exaApiKey) {
      console.warn(
        chalk.yellow('Warning: EXA_API_KEY environment variable is not set'),
      );
      console.log('Search functionality will not work properly');
    }

    const agent = buildAgent(settings);

    if (options.task) {
      await answer(agent, options.task);
      return;
    }
    await startRepl(agent);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exit(1);
});
