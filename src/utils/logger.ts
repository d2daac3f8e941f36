import { appendFileSync } from 'fs';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export interface LoggerOptions {
  /** Print debug lines (also enabled by USBFRAME_DEBUG) */
  verbose?: boolean;
  /** Append every entry as a JSON line to this file */
  logFilePath?: string;
}

export interface LogEntry {
  timestamp: string;
  scope: string;
  level: LogLevel;
  message: string;
  error?: string;
}

/**
 * Scoped console logger. Info goes to stdout, everything else to stderr
 * so command output stays clean.
 */
export class ConsoleLogger implements Logger {
  private readonly scope: string;
  private readonly verbose: boolean;
  private readonly logFilePath?: string;

  constructor(scope: string, options: LoggerOptions = {}) {
    this.scope = scope;
    this.verbose = options.verbose ?? false;
    this.logFilePath = options.logFilePath;
  }

  debug(message: string): void {
    if (!this.isDebugEnabled()) return;
    console.error(chalk.dim(`${this.prefix()} ${message}`));
    this.append('debug', message);
  }

  info(message: string): void {
    console.log(`${this.prefix()} ${message}`);
    this.append('info', message);
  }

  warn(message: string): void {
    console.error(chalk.yellow(`${this.prefix()} ${message}`));
    this.append('warn', message);
  }

  error(message: string, error?: unknown): void {
    const detail = error === undefined ? undefined : describeError(error);
    console.error(chalk.red(`${this.prefix()} ${message}${detail ? `: ${detail}` : ''}`));
    this.append('error', message, detail);
  }

  private prefix(): string {
    return `[${this.scope}]`;
  }

  private isDebugEnabled(): boolean {
    const env = process.env.USBFRAME_DEBUG;
    return this.verbose || (env !== undefined && env !== '' && env !== '0');
  }

  private append(level: LogLevel, message: string, error?: string): void {
    if (!this.logFilePath) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      scope: this.scope,
      level,
      message,
      ...(error ? { error } : {}),
    };

    try {
      appendFileSync(this.logFilePath, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (appendError) {
      console.error(`[Logger] Failed to write to log file: ${describeError(appendError)}`);
    }
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createLogger(scope: string, options?: LoggerOptions): Logger {
  return new ConsoleLogger(scope, options);
}
