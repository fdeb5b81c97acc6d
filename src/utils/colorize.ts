import chalk from 'chalk';

// Trace line colours, picked by prefix
export const colorize = (line: string): string => {
  const text = line.trim();
  if (text.startsWith('Next:')) return chalk.gray(line);
  if (text.startsWith('Plan:')) return chalk.blue.bold(line);
  if (text.startsWith('Confirm:')) return chalk.yellow(line);
  if (text.startsWith('Check-Final:')) return chalk.yellow.dim(line);
  if (text.startsWith('Action Input:')) return chalk.cyan(`  ${line}`);
  if (text.startsWith('Action:')) return chalk.cyan(line);
  if (text.startsWith('Defaults Applied:')) return chalk.cyan.dim(`  ${line}`);
  if (text.startsWith('Observation:')) return chalk.magenta(line);
  if (text.startsWith('Final Answer:')) return chalk.green.bold(line);
  if (text.startsWith('Warning:')) return chalk.yellow(line);
  return line;
};
