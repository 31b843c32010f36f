import winston from 'winston';
import path from 'path';
import { AppConfig } from '../config/AppConfig';

/**
 * Structured logging for the execution engine.
 *
 * Console output is human readable; when LOG_DIR is set the same records are
 * also written as JSON (error.log + combined.log). Silent under NODE_ENV=test.
 */

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

const consoleFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${String(timestamp)} [${level}] ${String(message)}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: combine(colorize(), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), consoleFormat),
    }),
  ];

  const logDir = AppConfig.logging.dir;
  if (logDir) {
    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(logDir, 'combined.log'),
        maxsize: 5242880,
        maxFiles: 5,
      })
    );
  }

  return transports;
}

const logger = winston.createLogger({
  level: AppConfig.logging.level,
  silent: AppConfig.isTest,
  format: combine(errors({ stack: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), json()),
  transports: buildTransports(),
  exitOnError: false,
});

type Meta = Record<string, unknown>;

export const Logger = {
  debug(message: string, meta?: Meta): void {
    logger.debug(message, meta);
  },

  info(message: string, meta?: Meta): void {
    logger.info(message, meta);
  },

  warn(message: string, meta?: Meta): void {
    logger.warn(message, meta);
  },

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      logger.error(message, {
        error: error.message,
        stack: error.stack,
      });
    } else if (error !== undefined) {
      logger.error(message, { error });
    } else {
      logger.error(message);
    }
  },

  /**
   * Task-scoped record (title travels as metadata)
   */
  task(taskTitle: string, message: string, meta?: Meta): void {
    logger.info(message, {
      task: taskTitle,
      ...meta,
    });
  },

  /**
   * Subprocess record
   */
  command(command: string, message: string, meta?: Meta): void {
    logger.debug(`[Command ${command}] ${message}`, meta);
  },
};

export default logger;
