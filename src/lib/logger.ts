/**
 * Stderr logger
 *
 * stdout carries the MCP protocol stream, so every line goes to stderr.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

const LOGGER_NAME = 'anki-card-mcp';

export function createLogger(verbose = false): Logger {
  const write = (level: LogLevel, message: string) => {
    console.error(`${new Date().toISOString()} - ${LOGGER_NAME} - ${level.toUpperCase()} - ${message}`);
  };

  return {
    debug(message) {
      if (verbose) write('debug', message);
    },
    info(message) {
      write('info', message);
    },
    warn(message) {
      write('warn', message);
    },
    error(message, error) {
      write('error', message);
      if (verbose && error instanceof Error && error.stack) {
        console.error(error.stack);
      }
    },
  };
}
