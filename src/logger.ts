export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

let threshold: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

function write(level: LogLevel, prefix: string) {
  return (...args: unknown[]): void => {
    if (enabled(level)) console.error(prefix, ...args);
  };
}

// Everything goes to stderr: stdout carries program output and the MCP channel.
export function createLogger(tag: string): Logger {
  return {
    debug: write('debug', `[${tag} DEBUG]`),
    info: write('info', `[${tag}]`),
    warn: write('warn', `[${tag} WARN]`),
    error: write('error', `[${tag} ERROR]`),
  };
}
