import chalk from 'chalk';

export type LogLevel = 'info' | 'warn' | 'error';

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  verbose?: boolean;
  // Defaults to stderr so stdout only carries the ranking
  sink?: LogSink;
}

const LEVEL_STYLES: Record<LogLevel, (text: string) => string> = {
  info: chalk.gray,
  warn: chalk.yellow,
  error: chalk.red
};

/**
 * Named console logger. Info records are only written when verbose.
 */
export class Logger {
  private readonly verbose: boolean;
  private readonly sink: LogSink;

  constructor(public readonly name: string, options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.sink = options.sink ?? ((line: string) => console.error(line));
  }

  info(message: string): void {
    if (this.verbose) {
      this.write('info', message);
    }
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  private write(level: LogLevel, message: string): void {
    const style = LEVEL_STYLES[level];
    this.sink(style(`[${this.name}] ${level.toUpperCase()} ${message}`));
  }
}

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  return new Logger(name, options);
}
