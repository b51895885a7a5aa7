import pino from 'pino';

/**
 * Logger Configuration
 *
 * Pino instance shared by the store services, the HTTP API and the scripts.
 *
 * Log Levels:
 * - debug: statement-level detail (ids, row counts)
 * - info: successful writes and server lifecycle
 * - warn: rejected input, missing rows
 * - error: database failures
 */

const environment = process.env.NODE_ENV || 'development';
const isTest = environment === 'test';

// Pretty printing spawns a worker thread, so it stays off under Jest and in production
const usePrettyTransport = environment !== 'production' && !isTest;

const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'debug'),
  transport: usePrettyTransport
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

/**
 * Create a child logger with additional context
 *
 * Example:
 * const callLogger = createChildLogger({ callSid: 'CA123' });
 * callLogger.info('Conversation finalized'); // includes callSid
 */
export const createChildLogger = (context: Record<string, unknown>) => {
  return logger.child(context);
};

export default logger;
