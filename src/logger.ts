type Level = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  debugEnabled?: boolean;
  silent?: boolean;
  write?: (line: string) => void;
}

export class Logger {
  private readonly debugEnabled: boolean;
  private readonly silent: boolean;
  private readonly write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled = options.debugEnabled ?? true;
    this.silent = options.silent ?? false;
    this.write = options.write ?? ((line) => process.stdout.write(line));
  }

  debug(message: string): void {
    if (!this.debugEnabled) {
      return;
    }
    this.print('debug', message);
  }

  info(message: string): void {
    this.print('info', message);
  }

  warn(message: string): void {
    this.print('warn', message);
  }

  error(message: string): void {
    this.print('error', message);
  }

  private print(level: Level, message: string): void {
    if (this.silent) {
      return;
    }
    const ts = new Date().toISOString();
    // Unified, grep-friendly log format.
    this.write(`[${ts}] [${level.toUpperCase()}] ${message}\n`);
  }
}

export const silentLogger = new Logger({ silent: true });
