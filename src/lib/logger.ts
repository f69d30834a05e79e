/**
 * Leveled stderr logger. stdout is reserved for transcript output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// ANSI colors
export const green = (s: string) => `\x1b[32m${s}\x1b[0m`;
export const red = (s: string) => `\x1b[31m${s}\x1b[0m`;
export const yellow = (s: string) => `\x1b[33m${s}\x1b[0m`;
export const dim = (s: string) => `\x1b[2m${s}\x1b[0m`;

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

let currentLevel: LogLevel = (() => {
  const fromEnv = process.env.TRANSCRIPT_LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'warn';
})();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_COLORS: Record<Exclude<LogLevel, 'silent'>, (s: string) => string> = {
  debug: dim,
  info: (s) => s,
  warn: yellow,
  error: red,
};

export function formatLogLine(
  level: Exclude<LogLevel, 'silent'>,
  component: string,
  message: string,
  context?: Record<string, unknown>,
  now: Date = new Date()
): string {
  const contextStr = context ? ` ${JSON.stringify(context)}` : '';
  return `[${now.toISOString()}] [${level.toUpperCase()}] [${component}] ${message}${contextStr}`;
}

/**
 * Create a logger tagged with a component name
 */
export function createLogger(component: string): Logger {
  const write = (
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: Record<string, unknown>
  ) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
    const line = formatLogLine(level, component, message, context);
    process.stderr.write(`${LEVEL_COLORS[level](line)}\n`);
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}
