/**
 * Logging Utilities
 *
 * Structured pino loggers with file-based output. Each area of the app gets
 * its own JSON-lines file in ./logs so agent traces never interleave with
 * what the CLI prints to the terminal.
 */
import pino from 'pino';
import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';

const LOG_DIR = join(process.cwd(), 'logs');

if (!existsSync(LOG_DIR)) {
  mkdirSync(LOG_DIR, { recursive: true });
}

export type Logger = pino.Logger;

function createLogger(name: string): Logger {
  const logFile = join(LOG_DIR, `${name}.log`);

  return pino(
    {
      name,
      level: process.env['LOG_LEVEL'] ?? 'debug',
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({
      dest: logFile,
      sync: false,
    })
  );
}

export const agentLogger = createLogger('agent');
export const cliLogger = createLogger('cli');

/**
 * Logs process-level failures. An uncaught exception exits with status 1
 * once the log file has been flushed.
 */
export function setupErrorHandlers(logger: Logger): void {
  process.on('uncaughtException', (error) => {
    logger.fatal({ error: error.message, stack: error.stack }, 'Uncaught exception');
    logger.flush(() => process.exit(1));
  });

  process.on('unhandledRejection', (reason) => {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    logger.error({ error: error.message, stack: error.stack }, 'Unhandled rejection');
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
