import fs from "node:fs";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogPayload = Record<string, unknown>;

export interface Logger {
  debug(event: string, payload?: LogPayload): void;
  info(event: string, payload?: LogPayload): void;
  warn(event: string, payload?: LogPayload): void;
  error(event: string, payload?: LogPayload): void;
}

export type LoggerConfig = {
  logPath: string;
  level?: LogLevel;
  console?: boolean;
};

export class AppLogger implements Logger {
  private readonly logPath: string;
  private readonly minLevel: number;
  private readonly echo: boolean;

  constructor(config: LoggerConfig) {
    this.logPath = config.logPath;
    this.minLevel = LEVEL_ORDER[config.level ?? "info"];
    this.echo = config.console ?? true;
    const dir = path.dirname(this.logPath);
    fs.mkdirSync(dir, { recursive: true });
  }

  debug(event: string, payload?: LogPayload): void {
    this.write("debug", event, payload);
  }

  info(event: string, payload?: LogPayload): void {
    this.write("info", event, payload);
  }

  warn(event: string, payload?: LogPayload): void {
    this.write("warn", event, payload);
  }

  error(event: string, payload?: LogPayload): void {
    this.write("error", event, payload);
  }

  private write(level: LogLevel, event: string, payload?: LogPayload): void {
    if (LEVEL_ORDER[level] < this.minLevel) {
      return;
    }
    const entry = {
      ts: new Date().toISOString(),
      level,
      event,
      ...(payload ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    fs.appendFileSync(this.logPath, line, "utf8");
    if (this.echo) {
      // eslint-disable-next-line no-console
      console.log(line.trim());
    }
  }
}

export function normalizeError(reason: unknown): { message: string; stack?: string } {
  if (reason instanceof Error) {
    return { message: reason.message, ...(reason.stack ? { stack: reason.stack } : {}) };
  }
  return { message: String(reason) };
}
