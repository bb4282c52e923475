/**
 * Logging Utilities
 *
 * Structured JSON logging with file-based output. Creates separate log files
 * for the server, the workflow engine and the agent adapters in ./logs.
 * Includes process-level handlers for uncaught exceptions and rejections.
 *
 * Dependencies:
 * - pino: Low-overhead structured logger
 */
import pino from 'pino';
import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';

const LOG_DIR = join(process.cwd(), 'logs');

export type Logger = pino.Logger;

function createLogger(name: string): Logger {
  const level = process.env['LOG_LEVEL'] ?? 'debug';

  if (level === 'silent') {
    return pino({ name, level });
  }

  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }

  return pino(
    {
      name,
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({
      dest: join(LOG_DIR, `${name}.log`),
      sync: false,
    })
  );
}

// Separate loggers for different parts of the app
export const serverLogger = createLogger('server');
export const workflowLogger = createLogger('workflow');
export const agentLogger = createLogger('agent');

// Helper to log uncaught errors
export function setupErrorHandlers(logger: Logger): void {
  process.on('uncaughtException', (error) => {
    logger.fatal({ error: error.message, stack: error.stack }, 'Uncaught exception');
    // Give time for log to flush
    setTimeout(() => process.exit(1), 100);
  });

  process.on('unhandledRejection', (reason) => {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    logger.error({ error: error.message, stack: error.stack }, 'Unhandled rejection');
  });
}
