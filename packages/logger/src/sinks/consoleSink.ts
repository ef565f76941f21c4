import { LogLevel, shouldLog, type StructuredLogEvent } from "@perf-budgets/shared";
import type { LogSink } from "./types";

export type ConsoleFormat = "json" | "text";

export interface ConsoleSinkOptions {
  level: LogLevel;
  /** `json` writes the whole event per line; `text` is for people reading a CI log. */
  format?: ConsoleFormat;
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

export function formatTextLine(event: StructuredLogEvent): string {
  const head = `[${event.level.toUpperCase()}] ${event.component} ${event.event}`;
  if (!event.payload || Object.keys(event.payload).length === 0) {
    return head;
  }
  const fields = Object.entries(event.payload)
    .map(([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`)
    .join(" ");
  return `${head} ${fields}`;
}

export function createConsoleSink(options: ConsoleSinkOptions): LogSink {
  const consoleImpl = options.consoleImpl ?? console;
  const render = options.format === "text" ? formatTextLine : (event: StructuredLogEvent) => JSON.stringify(event);
  return {
    name: "console",
    level: options.level,
    async publish(event: StructuredLogEvent) {
      if (!shouldLog(event.level, options.level)) {
        return;
      }
      const line = render(event);
      switch (event.level) {
        case LogLevel.DEBUG:
          consoleImpl.debug(line);
          break;
        case LogLevel.WARN:
          consoleImpl.warn(line);
          break;
        case LogLevel.ERROR:
        case LogLevel.CRITICAL:
          consoleImpl.error(line);
          break;
        default:
          consoleImpl.info(line);
      }
    }
  };
}
