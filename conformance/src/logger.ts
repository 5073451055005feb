import { createApi } from "@effectionx/context-api";
import type { Operation } from "effection";
import process from "node:process";

export interface Logger {
  info: (message: string, ...args: unknown[]) => Operation<void>;
  debug: (message: string, ...args: unknown[]) => Operation<void>;
  warn: (message: string, ...args: unknown[]) => Operation<void>;
  error: (message: string, ...args: unknown[]) => Operation<void>;
  /** raw output, written verbatim to stdout */
  write: (text: string) => Operation<void>;
}

const colors = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  gray: "\x1b[90m",
};

export const consoleLogger: Logger = {
  *info(message: string, ...args: unknown[]) {
    console.log(`${colors.blue}[INFO]${colors.reset} ${message}`, ...args);
  },
  *debug(message: string, ...args: unknown[]) {
    console.log(`${colors.gray}[DEBUG]${colors.reset} ${message}`, ...args);
  },
  *warn(message: string, ...args: unknown[]) {
    console.warn(`${colors.yellow}[WARN]${colors.reset} ${message}`, ...args);
  },
  *error(message: string, ...args: unknown[]) {
    console.error(`${colors.red}[ERROR]${colors.reset} ${message}`, ...args);
  },
  *write(text: string) {
    process.stdout.write(text);
  },
};

export const loggerApi = createApi("logger", consoleLogger);
export const log = loggerApi.operations;

/**
 * Send everything logged in the current scope to `logger` instead.
 */
export function* useLogger(logger: Logger): Operation<void> {
  yield* loggerApi.around({
    *info(args) {
      yield* logger.info(...args);
    },
    *debug(args) {
      yield* logger.debug(...args);
    },
    *warn(args) {
      yield* logger.warn(...args);
    },
    *error(args) {
      yield* logger.error(...args);
    },
    *write(args) {
      yield* logger.write(...args);
    },
  });
}

export function* verboseLogging(verbose: boolean): Operation<void> {
  yield* loggerApi.around({
    *warn(args, next) {
      if (verbose) {
        yield* next(...args);
      }
    },
    *debug(args, next) {
      if (verbose) {
        yield* next(...args);
      }
    },
  });
}
