// functions/src/core/logging/logger.ts
import * as logger from "firebase-functions/logger";

/**
 * Central logger. Only this module depends on firebase-functions/logger;
 * everything else takes a LoggerLike so tests can record calls.
 */
export type LogMeta = Record<string, unknown>;

export type LoggerLike = {
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
};

export const firebaseLogger: LoggerLike = {
  info: (message, meta) => logger.info(message, meta ?? {}),
  warn: (message, meta) => logger.warn(message, meta ?? {}),
  error: (message, meta) => logger.error(message, meta ?? {}),
};
