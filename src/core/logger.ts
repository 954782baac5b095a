/**
 * Logging utility using Pino
 */

import pino from "pino";
import { LogLevelSchema, NodeEnvSchema } from "./config";

const nodeEnv = NodeEnvSchema.catch("development").parse(process.env.NODE_ENV || undefined);
const level = LogLevelSchema.catch("info").parse(process.env.LOG_LEVEL || undefined);

/**
 * Create logger instance with environment-specific configuration
 */
export const logger = pino({
  level: nodeEnv === "test" ? "silent" : level,
  transport:
    nodeEnv === "development"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "yyyy-mm-dd HH:MM:ss.l",
            ignore: "pid,hostname",
          },
        }
      : undefined,
  formatters: {
    level: (label) => {
      return { level: label.toUpperCase() };
    },
  },
});

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>) {
  return logger.child(context);
}

export const logInfo = (message: string, context: Record<string, unknown> = {}) =>
  logger.info(context, message);
export const logError = (message: string, error?: unknown, context: Record<string, unknown> = {}) => {
  if (error instanceof Error) {
    logger.error({ err: error, ...context }, message);
  } else if (error !== undefined) {
    logger.error({ error, ...context }, message);
  } else {
    logger.error(context, message);
  }
};
export const logWarn = (message: string, context: Record<string, unknown> = {}) =>
  logger.warn(context, message);
export const logDebug = (message: string, context: Record<string, unknown> = {}) =>
  logger.debug(context, message);
export const logSuccess = (message: string, context: Record<string, unknown> = {}) =>
  logger.info({ success: true, ...context }, message);
