export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LEVELS as string[]).includes(value);
}

/**
 * Diagnostics for the operator. Always stderr, so the report on stdout stays clean.
 */
class Logger {
  constructor(private readonly level: LogLevel = 'info') {}

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private write(level: LogLevel, message: string): void {
    if (!this.shouldLog(level)) return;
    const line = `[fetch-probe] ${level === 'info' ? '' : `${level.toUpperCase()} `}${message}`;
    if (level === 'warn') {
      console.warn(line);
    } else {
      console.error(line);
    }
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }
}

const envLevel = process.env['FETCH_PROBE_LOG_LEVEL'];

export const logger = new Logger(isLogLevel(envLevel) ? envLevel : 'info');
