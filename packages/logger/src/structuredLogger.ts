import {
  LogLevel,
  createStructuredEvent,
  shouldLog,
  type StructuredLogEvent
} from "@perf-budgets/shared";
import type { LogSink } from "./sinks/types";

export interface StructuredLoggerOptions {
  runId: string;
  baseComponent: string;
  level: LogLevel;
  sinks: LogSink[];
  queueSize?: number;
  onDrop?: (event: StructuredLogEvent) => void;
  onSinkError?: (sink: LogSink, error: unknown) => void;
}

export interface LogOptions {
  component?: string;
  dedupParts?: Array<string | number | undefined | null>;
  tags?: string[];
}

export type ComponentLogger = Pick<StructuredLogger, "log" | "child">;

export class StructuredLogger {
  private readonly queue: StructuredLogEvent[] = [];
  private draining = false;
  private stopped = false;
  private readonly queueSize: number;

  constructor(private readonly options: StructuredLoggerOptions) {
    this.queueSize = Math.max(100, options.queueSize ?? 1000);
  }

  async start() {
    await Promise.all(
      this.options.sinks.map(async sink => {
        if (sink.start) {
          await sink.start();
        }
      })
    );
  }

  async stop() {
    await this.flushOutstanding();
    this.stopped = true;
    await Promise.all(
      this.options.sinks.map(async sink => {
        if (sink.stop) {
          await sink.stop();
        }
      })
    );
  }

  async flushOutstanding() {
    while (this.queue.length > 0 || this.draining) {
      await this.drainQueue();
      if (this.draining) {
        await new Promise<void>(resolve => setImmediate(resolve));
      }
    }
    await Promise.all(
      this.options.sinks.map(async sink => {
        if (sink.flush) {
          await sink.flush();
        }
      })
    );
  }

  log(
    level: LogLevel,
    event: string,
    payload?: Record<string, unknown>,
    logOptions?: LogOptions
  ) {
    if (this.stopped) {
      return;
    }
    if (!shouldLog(level, this.options.level)) {
      return;
    }
    const component = logOptions?.component ?? this.options.baseComponent;
    if (this.queue.length >= this.queueSize) {
      this.options.onDrop?.(
        createStructuredEvent({ runId: this.options.runId, component, level, event, payload })
      );
      return;
    }
    this.queue.push(
      createStructuredEvent({
        runId: this.options.runId,
        component,
        level,
        event,
        payload,
        dedupParts: logOptions?.dedupParts,
        tags: logOptions?.tags
      })
    );
    void this.drainQueue();
  }

  child(component: string, defaultContext?: Record<string, unknown>): ComponentLogger {
    const mergedContext = { ...(defaultContext ?? {}) };
    return {
      log: (level, event, payload, options) => {
        this.log(
          level,
          event,
          { ...mergedContext, ...payload },
          { ...options, component }
        );
      },
      child: (nextComponent: string, childContext?: Record<string, unknown>) => {
        return this.child(nextComponent, {
          ...mergedContext,
          ...(childContext ?? {})
        });
      }
    };
  }

  private async drainQueue() {
    if (this.draining) {
      return;
    }
    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next) {
        const event = next;
        await Promise.allSettled(
          this.options.sinks.map(async sink => {
            try {
              await sink.publish(event);
            } catch (error) {
              this.reportSinkError(sink, error);
            }
          })
        );
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private reportSinkError(sink: LogSink, error: unknown) {
    if (this.options.onSinkError) {
      this.options.onSinkError(sink, error);
      return;
    }
    if (sink.name === "console") {
      // console sink already writes to console
      return;
    }
    console.warn(`[structured-logger] sink ${sink.name} failed`, error);
  }
}
