import { describeError } from "./errors.js";
import type { ConfigLogger } from "./types.js";

export const silentLogger: ConfigLogger = {
  info() {},
  warn() {},
  error() {},
};

export interface ConsoleLoggerOptions {
  /** Print info messages (warnings and errors are always printed) */
  verbose?: boolean;
}

export function createConsoleLogger(
  options: ConsoleLoggerOptions = {},
): ConfigLogger {
  return {
    info(message) {
      if (options.verbose) {
        console.log(`  ℹ️  ${message}`);
      }
    },
    warn(message) {
      console.warn(`  ⚠️  ${message}`);
    },
    error(message, cause) {
      if (cause === undefined) {
        console.error(`  ❌ ${message}`);
      } else {
        console.error(`  ❌ ${message}: ${describeError(cause)}`);
      }
    },
  };
}
