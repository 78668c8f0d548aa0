/**
 * Step logger — console output in the `  [elapsed] [STEP] message` format.
 *
 * Warnings and errors go to stderr so that piping stdout keeps only progress.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(step: string, msg: string): void;
  info(step: string, msg: string): void;
  warn(step: string, msg: string): void;
  error(step: string, msg: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  /** Start of the elapsed-time clock; defaults to logger creation. */
  startTime?: number;
}

export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): Logger {
  const startTime = opts.startTime ?? Date.now();

  function line(level: LogLevel, step: string, msg: string): string {
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    const tag = level === "warn" ? "[WARN] " : level === "error" ? "[ERROR] " : "";
    return `  [${elapsed}s] [${step}] ${tag}${msg}`;
  }

  return {
    debug(step, msg) {
      if (opts.verbose) console.log(line("debug", step, msg));
    },
    info(step, msg) {
      console.log(line("info", step, msg));
    },
    warn(step, msg) {
      console.error(line("warn", step, msg));
    },
    error(step, msg) {
      console.error(line("error", step, msg));
    },
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
