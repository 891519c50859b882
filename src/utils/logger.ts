// src/utils/logger.ts

//======================= IMPORTS =======================//
/**
 * PINO LOGGER
 * Why use Pino?
 * - Structured JSON logging
 * - Low overhead on the request path
 * - Child loggers carry module context
 */
import pino from 'pino';

/**
 * ENVIRONMENT VARIABLES
 * The logger is created before the validated config exists
 * (config itself logs through it), so it reads process.env directly.
 */
import dotenv from 'dotenv';

dotenv.config();

//======================= LOGGER CONFIGURATION =======================//
/**
 * LEVEL RESOLUTION
 *
 * LOG_LEVEL wins when set. Otherwise tests run silent and
 * everything else logs at 'info'.
 *
 * Example:
 * LOG_LEVEL=debug -> Will show debug and above
 * LOG_LEVEL=error -> Will only show error and fatal
 */
const resolveLevel = (): string => {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
};

/**
 * PRETTY PRINTING
 * pino-pretty runs in a worker thread, so it is only attached for
 * local development. Production keeps raw JSON for log aggregation.
 */
const usePrettyTransport =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

/**
 * MAIN LOGGER INSTANCE
 */
const logger = pino({
  level: resolveLevel(),
  ...(usePrettyTransport && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,                           // Add colors
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss', // Human-readable timestamps
        ignore: 'pid,hostname',                   // Remove noise
      },
    },
  }),
});

export default logger;
