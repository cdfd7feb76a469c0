/**
 * logger.ts — Structured logging for request diagnostics.
 *
 * The console logger writes through console.error so that stdout stays free
 * for the host application's own output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  if (level === 'silent') return silentLogger;
  const threshold = LEVEL_RANK[level];

  const write = (at: Exclude<LogLevel, 'silent'>) => (message: string, fields?: LogFields) => {
    if (LEVEL_RANK[at] < threshold) return;
    const line = fields ? `${message} ${JSON.stringify(fields)}` : message;
    console.error(`[connect] ${at.toUpperCase()} ${line}`);
  };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}
