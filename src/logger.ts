/**
 * Run logger.
 *
 * Writes to stderr so stdout stays free for manifest output and the MCP stdio
 * transport. Every line is also kept in memory so a run can be published to
 * a log file, along with per-phase timing snapshots.
 */

import { writeFileSync } from "node:fs";
import type { Diagnostic } from "./models.js";

export type LogLevel = "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
}

export class Logger {
  readonly entries: LogEntry[] = [];
  readonly snapshots: string[] = [];

  constructor(private readonly echo = true) {}

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", `WARNING: ${message}`);
  }

  error(message: string): void {
    this.write("error", `ERROR: ${message}`);
  }

  diagnostic(d: Diagnostic): void {
    const text = d.path ? `${d.message} (${d.path})` : d.message;
    if (d.level === "error") this.error(text);
    else this.warn(text);
  }

  /** Run `fn`, recording `<label>: <ms>ms` as a timing snapshot. */
  time<T>(label: string, fn: () => T): T {
    const start = performance.now();
    try {
      return fn();
    } finally {
      this.snapshots.push(`${label}: ${(performance.now() - start).toFixed(3)}ms`);
    }
  }

  async timeAsync<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.snapshots.push(`${label}: ${(performance.now() - start).toFixed(3)}ms`);
    }
  }

  printSnapshots(): void {
    this.info("== Time Snapshots ==");
    for (const snapshot of this.snapshots) this.info(snapshot);
  }

  /** Write every recorded entry to `filePath`, one per line. */
  publish(filePath: string): void {
    const text = this.entries.map((e) => e.message).join("\n");
    writeFileSync(filePath, text + "\n", "utf8");
  }

  private write(level: LogLevel, message: string): void {
    this.entries.push({ level, message });
    if (this.echo) console.error(message);
  }
}
