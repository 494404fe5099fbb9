import Axe from "axe";
import { isMainThread, parentPort } from "node:worker_threads";

export const LOGGER_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
] as const;

export type LoggerLevels = (typeof LOGGER_LEVELS)[number];
export type LoggerMessage = string | Error;
export type LoggerMeta = Record<string, unknown>;

export type BaseLogger = Record<
  LoggerLevels,
  (message: LoggerMessage, meta?: LoggerMeta) => void
>;
export interface WorkerLoggerPostMessageType {
  level: LoggerLevels;
  message: LoggerMessage;
  meta?: LoggerMeta;
  type: "message";
}

export interface LoggerFactoryOptions {
  /** Lowest level that reaches the underlying logger */
  level?: LoggerLevels;
  /** Levels axe accepts at all; anything else is dropped before hooks run */
  levels?: LoggerLevels[];
  silent?: boolean;
  /** Whether axe attaches application info to the meta object */
  appInfo?: boolean;
}

/** Level axe applies when none is given */
export const DEFAULT_LOGGER_LEVEL: LoggerLevels = "info";

/**
 * Whether a message at `level` passes the `level`, `levels` and `silent` options.
 */
export const isLevelEnabled = (
  level: LoggerLevels,
  options: Pick<LoggerFactoryOptions, "level" | "levels" | "silent"> = {},
): boolean => {
  if (options.silent || (options.levels && !options.levels.includes(level))) {
    return false;
  }
  return (
    LOGGER_LEVELS.indexOf(level) >=
    LOGGER_LEVELS.indexOf(options.level ?? DEFAULT_LOGGER_LEVEL)
  );
};

/**
 * This logger can be used
 * in both the main thread and worker threads.
 * Worker threads hand messages that pass the configured level to the parent.
 */
export const loggerFactory = (options: LoggerFactoryOptions = {}) => {
  const axeLogger = new Axe(options);

  const logger: BaseLogger & {
    logMessage: (
      level: LoggerLevels,
      message: LoggerMessage,
      meta?: LoggerMeta,
    ) => void;
  } = {
    logMessage(level, message, meta) {
      if (!isLevelEnabled(level, options)) {
        return;
      }
      if (isMainThread) {
        void axeLogger[level](message, meta);
        return;
      }
      const forwarded: WorkerLoggerPostMessageType = {
        type: "message",
        level,
        message,
        meta,
      };
      //NOTE: only structured-clonable meta survives postMessage
      parentPort?.postMessage(forwarded);
    },
    trace: function (message, meta?) {
      this.logMessage("trace", message, meta);
    },
    debug: function (message, meta?) {
      this.logMessage("debug", message, meta);
    },
    info: function (message, meta?) {
      this.logMessage("info", message, meta);
    },
    warn: function (message, meta?) {
      this.logMessage("warn", message, meta);
    },
    error: function (message, meta?) {
      this.logMessage("error", message, meta);
    },
    fatal: function (message, meta?) {
      this.logMessage("fatal", message, meta);
    },
  };

  return { logger, axeLogger };
};

export default loggerFactory;
