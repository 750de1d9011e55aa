export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Narrows an arbitrary string (e.g. SPECPULSE_LOG_LEVEL) to a LogLevel.
 */
export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

// Set by the CLI from --verbose/--quiet; wins over the environment.
let processLevel: LogLevel | null = null;

export function setLogLevel(level: LogLevel | null): void {
  processLevel = level;
}

export function getLogLevel(): LogLevel {
  if (processLevel) return processLevel;

  for (const name of ["SPECPULSE_LOG_LEVEL", "LOG_LEVEL"]) {
    const fromEnv = process.env[name];
    if (isLogLevel(fromEnv)) return fromEnv;
  }

  return process.env["NODE_ENV"] === "test" ? "silent" : "warn";
}

/**
 * Diagnostics go to stderr; stdout belongs to command output (and --json).
 */
class StderrLogger implements Logger {
  constructor(
    private readonly prefix: string,
    private readonly fixedLevel?: LogLevel
  ) { }

  private enabled(level: LogLevel): boolean {
    const current = this.fixedLevel ?? getLogLevel();
    return current !== "silent" && LEVELS.indexOf(current) <= LEVELS.indexOf(level);
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.enabled(level)) return;
    const line = `${this.prefix}${message}`;
    if (level === "warn") {
      console.warn(line, ...args);
    } else {
      console.error(line, ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    this.write("debug", message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write("info", message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write("warn", message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write("error", message, args);
  }
}

// Module loggers read the level on every call, so setLogLevel applies to
// loggers created at import time. Pass `level` to pin one.
export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  return new StderrLogger(prefix, level);
}

export const logger = createLogger("[SpecPulse] ");
