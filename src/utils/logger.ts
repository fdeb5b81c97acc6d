import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type LogWriter = (line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_COLORS: Record<Exclude<LogLevel, 'silent'>, chalk.Chalk> = {
  debug: chalk.gray,
  info: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
};

// Trace output goes to stdout, so log lines go to stderr by default
const writeToStderr: LogWriter = (line) => console.error(line);

export class Logger {
  constructor(
    private readonly scope: string,
    private readonly level: LogLevel = 'warn',
    private readonly write: LogWriter = writeToStderr,
  ) {}

  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`, this.level, this.write);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }
    const tag = LEVEL_COLORS[level](`[${level.toUpperCase()}]`);
    const suffix = data ? ` ${JSON.stringify(data)}` : '';
    this.write(`${tag} ${chalk.dim(`[${this.scope}]`)} ${message}${suffix}`);
  }
}

export const createLogger = (
  scope: string,
  level?: LogLevel,
  write?: LogWriter,
): Logger => new Logger(scope, level, write);
