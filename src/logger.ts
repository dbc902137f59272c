export const C = {
  reset: "\x1b[0m",
  bold: (s: string) => `\x1b[1m${s}\x1b[0m`,
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  green: (s: string) => `\x1b[32m${s}\x1b[0m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
  cyan: (s: string) => `\x1b[36m${s}\x1b[0m`,
  gray: (s: string) => `\x1b[90m${s}\x1b[0m`,
};

export type LogLevel = "DEBUG" | "INFO";

/**
 * Where components report things they cannot throw: dropped stderr lines,
 * release failures, tool errors. The `Logger` class satisfies it directly.
 */
export interface DiagnosticSink {
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug?(...args: unknown[]): void;
}

export class Logger {
  private static _verbose = false;
  private static _level: LogLevel = "INFO";

  static setVerbose(v: boolean) { Logger._verbose = v; }
  static isVerbose() { return Logger._verbose; }
  static setLevel(level: LogLevel) { Logger._level = level; }

  static info(...args: unknown[]) {
    console.log(...args);
  }

  static warn(...args: unknown[]) { console.warn(...args); }
  static error(...args: unknown[]) { console.error(...args); }

  static debug(...args: unknown[]) {
    // Debug requires BOTH verbose mode AND level DEBUG
    if (Logger._verbose && Logger._level === "DEBUG") console.error(...args);
  }

  static streamInfo(s: string) { process.stdout.write(s); }
  static endStreamLine(suffix = "") { process.stdout.write(suffix + "\n"); }
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  return (raw ?? "").toUpperCase() === "DEBUG" ? "DEBUG" : "INFO";
}
