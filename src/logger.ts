/**
 * @module logger
 * @description Verbose-gated diagnostic logging to stderr
 * @status COMPLETE
 * @dependencies none
 * @lastModified 2026-10-19
 *
 * stdout carries the MCP stdio transport, so every line goes to stderr.
 */

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface LoggerOptions {
  /** Print debug and info lines */
  verbose: boolean;
  prefix?: string;
  /** Output sink, console.error unless replaced */
  sink?: (line: string, ...details: unknown[]) => void;
}

/**
 * Create a logger. warn and error always print; debug and info only when verbose.
 */
export function createLogger(options: LoggerOptions): Logger {
  const prefix = options.prefix ?? 'argocd-mcp';
  const sink = options.sink ?? ((line: string, ...details: unknown[]) => console.error(line, ...details));

  const write = (level: LogLevelName, message: string, details: unknown[]): void => {
    if ((level === 'debug' || level === 'info') && !options.verbose) return;
    sink(`[${prefix}] ${level}: ${message}`, ...details);
  };

  return {
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details),
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = createLogger({ verbose: false, sink: () => undefined });
