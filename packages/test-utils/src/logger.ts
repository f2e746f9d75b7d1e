import type { LogLevel, LoopLogger } from "@asyncloop/event-loop";

export interface LogEntry {
  readonly level: Exclude<LogLevel, "silent">;
  readonly message: string;
}

/**
 * Logger that keeps every line in memory instead of printing it.
 */
export class CapturingLogger implements LoopLogger {
  readonly entries: LogEntry[] = [];

  debug(message: string): void {
    this.entries.push({ level: "debug", message });
  }

  info(message: string): void {
    this.entries.push({ level: "info", message });
  }

  warn(message: string): void {
    this.entries.push({ level: "warn", message });
  }

  error(message: string): void {
    this.entries.push({ level: "error", message });
  }

  /** Messages logged at one level, in order */
  messages(level: LogEntry["level"]): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
