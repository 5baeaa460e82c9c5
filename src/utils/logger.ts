import chalk from 'chalk';
import { getLogLevelFromEnv, LogLevel } from '../config';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red
};

export type LogMetadata = Record<string, unknown>;

export class Logger {
  constructor(
    private readonly component: string,
    private readonly level: () => LogLevel = getLogLevelFromEnv
  ) {}

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.level()]) return;

    const suffix = metadata ? ` | ${JSON.stringify(metadata)}` : '';
    const line = LEVEL_COLOR[level](
      `[${level.toUpperCase()}] [${this.component}] ${message}${suffix}`
    );

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

export function createLogger(component: string): Logger {
  return new Logger(component);
}
