import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { Clock } from "./clock";
import type { Logger, LogLevel, LogPayload } from "./logger";

export type LoggedEntry = { level: LogLevel; event: string; payload?: LogPayload };

export class RecordingLogger implements Logger {
  readonly entries: LoggedEntry[] = [];

  debug(event: string, payload?: LogPayload): void {
    this.push("debug", event, payload);
  }

  info(event: string, payload?: LogPayload): void {
    this.push("info", event, payload);
  }

  warn(event: string, payload?: LogPayload): void {
    this.push("warn", event, payload);
  }

  error(event: string, payload?: LogPayload): void {
    this.push("error", event, payload);
  }

  events(): string[] {
    return this.entries.map((entry) => entry.event);
  }

  private push(level: LogLevel, event: string, payload?: LogPayload): void {
    this.entries.push({ level, event, ...(payload ? { payload } : {}) });
  }
}

export class ManualClock implements Clock {
  private current: Date;

  constructor(iso: string) {
    this.current = new Date(iso);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(iso: string): void {
    this.current = new Date(iso);
  }
}

export function mkTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}
