import { createHash } from "node:crypto";

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
  CRITICAL = "critical"
}

const levelOrder: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.CRITICAL]: 50
};

export function shouldLog(target: LogLevel, minimum: LogLevel): boolean {
  return levelOrder[target] >= levelOrder[minimum];
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelOrder, value);
}

/**
 * Reads a level name case-insensitively, falling back when the value is
 * empty or not a known level.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  const normalized = (value ?? "").trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

export interface StructuredLogEvent<TPayload = Record<string, unknown>> {
  runId: string;
  component: string;
  event: string;
  level: LogLevel;
  timestamp: number;
  payload?: TPayload;
  dedupKey?: string;
  tags?: string[];
}

export function makeDedupKey(parts: Array<string | number | undefined | null>): string {
  const normalized = parts
    .filter(part => part !== undefined && part !== null)
    .map(part => String(part))
    .join("|");
  const hash = createHash("sha1");
  hash.update(normalized);
  return hash.digest("hex");
}

interface StructuredEventOptions<TPayload> {
  runId: string;
  component: string;
  level: LogLevel;
  event: string;
  payload?: TPayload;
  dedupParts?: Array<string | number | undefined | null>;
  timestamp?: number;
  tags?: string[];
}

export function createStructuredEvent<TPayload = Record<string, unknown>>(
  options: StructuredEventOptions<TPayload>
): StructuredLogEvent<TPayload> {
  return {
    runId: options.runId,
    component: options.component,
    level: options.level,
    event: options.event,
    timestamp: options.timestamp ?? Date.now(),
    payload: options.payload,
    tags: options.tags,
    dedupKey: options.dedupParts ? makeDedupKey(options.dedupParts) : undefined
  };
}
