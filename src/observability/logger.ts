import { RcqueryError } from '../core/errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger whose entries all carry `context`, e.g. the command or the file at hand. */
  child(context: LogContext): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  base?: LogContext;
  stream?: NodeJS.WritableStream;
  now?: () => Date;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

/**
 * One JSON object per line on stderr: stdout carries search results and
 * generated whitelists. Keys whose value is undefined are left out.
 */
export function createJsonLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'warn';
  const stream = options.stream ?? process.stderr;
  const now = options.now ?? (() => new Date());

  const build = (base: LogContext): Logger => {
    const write = (lvl: LogLevel) => (message: string, context?: LogContext) => {
      if (SEVERITY[lvl] < SEVERITY[level]) return;
      const entry = { time: now().toISOString(), level: lvl, message, ...base, ...context };
      stream.write(`${JSON.stringify(entry, errorReplacer)}\n`);
    };
    return {
      debug: write('debug'),
      info: write('info'),
      warn: write('warn'),
      error: write('error'),
      child: (context) => build({ ...base, ...context })
    };
  };

  return build(options.base ?? {});
}

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger
};

// Error instances stringify to {}; log what identifies them instead.
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof RcqueryError) {
    return { name: value.name, code: value.code, message: value.message, file: value.file, line: value.line };
  }
  if (value instanceof Error) return { name: value.name, message: value.message };
  return value;
}
