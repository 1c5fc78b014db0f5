import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Tagged logger writing to stderr, so that stdout stays free for
 * machine-readable output (`--json`).
 *
 * Usage:
 *   logger.debug('[Executor]', 'spawned hook', { name });
 */
export class Logger {
  private minLevel: LogLevel = 'info';

  constructor(private readonly write: (line: string) => void = (line) => console.error(line)) {}

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  setDebug(enabled: boolean): void {
    this.minLevel = enabled ? 'debug' : 'info';
  }

  isDebugEnabled(): boolean {
    return this.minLevel === 'debug';
  }

  debug(tag: string, message: string, data?: unknown): void {
    this.log('debug', tag, message, data);
  }

  info(tag: string, message: string, data?: unknown): void {
    this.log('info', tag, message, data);
  }

  warn(tag: string, message: string, data?: unknown): void {
    this.log('warn', tag, message, data);
  }

  error(tag: string, message: string, data?: unknown): void {
    this.log('error', tag, message, data);
  }

  private log(level: LogLevel, tag: string, message: string, data?: unknown): void {
    if (LEVELS[level] < LEVELS[this.minLevel]) return;

    const dataStr = data !== undefined ? ' ' + formatData(data) : '';
    const line = `${tag} ${message}${dataStr}`;

    switch (level) {
      case 'debug':
        this.write(chalk.dim(line));
        break;
      case 'warn':
        this.write(chalk.yellow(line));
        break;
      case 'error':
        this.write(chalk.red(line));
        break;
      default:
        this.write(line);
    }
  }
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return data.stack ?? data.message;
  }
  if (typeof data === 'string') {
    return data;
  }
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

export const logger = new Logger();
