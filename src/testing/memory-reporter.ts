/**
 * Test helper: Reporter that keeps every message for assertions.
 */

import type { Reporter } from "../events/reporter.js";

export type ReportLevel = "info" | "success" | "warn" | "error" | "header";

export interface ReportEntry {
  level: ReportLevel;
  message: string;
}

export class MemoryReporter implements Reporter {
  readonly entries: ReportEntry[] = [];

  info(message: string): void {
    this.entries.push({ level: "info", message });
  }

  success(message: string): void {
    this.entries.push({ level: "success", message });
  }

  warn(message: string): void {
    this.entries.push({ level: "warn", message });
  }

  error(message: string): void {
    this.entries.push({ level: "error", message });
  }

  header(message: string): void {
    this.entries.push({ level: "header", message });
  }

  messages(level: ReportLevel): string[] {
    return this.entries.filter(e => e.level === level).map(e => e.message);
  }
}
