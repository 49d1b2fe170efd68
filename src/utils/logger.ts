import chalk from 'chalk';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  error: chalk.redBright,
  warn: chalk.yellowBright,
  info: chalk.greenBright,
  debug: chalk.magenta,
  trace: chalk.gray,
};

/**
 * Map the number of -v flags to a level: none → info, -v → debug, -vv → trace
 */
export function levelFromVerbosity(verbosity: number): LogLevel {
  if (verbosity <= 0) return 'info';
  if (verbosity === 1) return 'debug';
  return 'trace';
}

export class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = 'info') {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] <= LEVEL_RANK[this.level];
  }

  error(message: string): void {
    this.write('error', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  trace(message: string): void {
    this.write('trace', message);
  }

  /**
   * Format a line as "[ INFO] message"
   */
  format(level: LogLevel, message: string): string {
    const style = LEVEL_STYLE[level];
    const label = style(level.toUpperCase().padStart(5));
    // Info lines keep the default color so they stay readable
    const body = level === 'info' ? message : style(message);
    return `${chalk.gray('[')}${label}${chalk.gray(']')} ${body}`;
  }

  private write(level: LogLevel, message: string): void {
    if (!this.enabled(level)) return;

    const line = this.format(level, message);
    if (level === 'error' || level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Build the process-wide logger from the -v count
 */
export function createLogger(verbosity: number): Logger {
  return new Logger(levelFromVerbosity(verbosity));
}
