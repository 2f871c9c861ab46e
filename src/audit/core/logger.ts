import type { Logger, LogLevel } from "./types.js";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Writes to stderr only; stdout is reserved for listings and reports.
 */
export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly threshold: number;

  constructor(scope: string, level: LogLevel = "info") {
    this.prefix = `[${scope}]`;
    this.threshold = LEVEL_RANK[level];
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.write("debug", msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.write("info", msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.write("warn", `⚠ ${msg}`, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.write("error", `✗ ${msg}`, data);
  }

  progress(current: number, total: number, label: string): void {
    if (this.threshold > LEVEL_RANK.info) return;
    const pct = total > 0 ? Math.round((current / total) * 100) : 0;
    process.stderr.write(
      `\r${this.prefix} ${label}: ${current}/${total} (${pct}%)`,
    );
    if (current >= total) process.stderr.write("\n");
  }

  private write(
    level: LogLevel,
    msg: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_RANK[level] < this.threshold) return;
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    console.error(`${this.prefix} ${msg}${extra}`);
  }
}

/** Maps a `-v` count to a level: 0 → warn, 1 → info, 2+ → debug. */
export function levelFromVerbosity(verbosity: number): LogLevel {
  if (verbosity >= 2) return "debug";
  if (verbosity === 1) return "info";
  return "warn";
}

export function createLogger(scope: string, level?: LogLevel): Logger {
  return new ConsoleLogger(scope, level);
}
