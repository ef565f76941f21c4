import { afterEach, beforeEach, describe, expect, it } from "vitest";
import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";
import {
  LogLevel,
  MILLISECOND,
  type Budget,
  type BudgetReport,
  type StructuredLogEvent
} from "@perf-budgets/shared";
import { StructuredLogger } from "../src/structuredLogger";
import { BudgetReporter } from "../src/budgetReporter";

const startupBudget: Budget = {
  name: "startup_total",
  maxDuration: 300 * MILLISECOND,
  maxAllocations: 10_000,
  maxBytes: 0,
  priority: "P0",
  description: "Total time from start to ready state"
};

const lookupBudget: Budget = {
  name: "command_lookup",
  maxDuration: 1 * MILLISECOND,
  maxAllocations: 10,
  maxBytes: 1024,
  priority: "P1",
  description: "Time to look up a command by name"
};

function sampleReport(): BudgetReport {
  return {
    total: 3,
    passed: 1,
    failed: 2,
    unbudgeted: 0,
    byPriority: { P0: { passed: 0, failed: 1 }, P1: { passed: 1, failed: 1 } },
    violations: [
      {
        budget: startupBudget,
        failed: ["duration"],
        result: {
          operation: "startup_total",
          duration: 450 * MILLISECOND,
          allocations: 20,
          bytes: 0,
          passesDuration: false,
          passesAllocations: true,
          passesBytes: true,
          passes: false
        }
      },
      {
        budget: lookupBudget,
        failed: ["allocations", "bytes"],
        result: {
          operation: "command_lookup",
          duration: 10_000,
          allocations: 12,
          bytes: 2048,
          passesDuration: true,
          passesAllocations: false,
          passesBytes: false,
          passes: false
        }
      }
    ]
  };
}

describe("BudgetReporter", () => {
  let tempDir: string;
  let received: StructuredLogEvent[];
  let logger: StructuredLogger;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "budget-reporter-"));
    received = [];
    logger = new StructuredLogger({
      runId: "ci-42",
      baseComponent: "budgets",
      level: LogLevel.DEBUG,
      sinks: [
        {
          name: "memory",
          level: LogLevel.DEBUG,
          publish: async event => {
            received.push(event);
          }
        }
      ]
    });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("logs gating violations as errors and others as warnings", async () => {
    const reporter = new BudgetReporter({ logger: logger.child("budgets.reporter"), failOn: ["P0"] });

    const outcome = await reporter.publish(sampleReport());
    await logger.flushOutstanding();

    expect(outcome).toEqual({ passed: false, gatingFailures: 1, warnings: 1 });
    expect(received.map(event => [event.event, event.level])).toEqual([
      ["budget_violation", LogLevel.ERROR],
      ["budget_violation", LogLevel.WARN],
      ["budget_check_summary", LogLevel.INFO]
    ]);
    expect(received.map(event => event.component)).toEqual([
      "budgets.reporter",
      "budgets.reporter",
      "budgets.reporter"
    ]);
    expect(received[0].payload).toEqual({
      operation: "startup_total",
      priority: "P0",
      failed: ["duration"],
      duration: 450 * MILLISECOND,
      maxDuration: 300 * MILLISECOND,
      durationText: "450ms / 300ms",
      allocations: 20,
      maxAllocations: 10_000,
      bytes: 0,
      maxBytes: 0
    });
    expect(received[1].tags).toEqual(["P1"]);
    expect(received[1].payload?.durationText).toBe("10µs / 1ms");
    expect(received[2].payload).toMatchObject({ total: 3, passed: 1, failed: 2, gatingFailures: 1, warnings: 1 });
  });

  it("gives the same violation the same dedup key", async () => {
    const reporter = new BudgetReporter({ logger, failOn: [] });
    await reporter.publish(sampleReport());
    await reporter.publish(sampleReport());
    await logger.flushOutstanding();

    const keys = received.filter(event => event.event === "budget_violation").map(event => event.dedupKey);
    expect(keys).toHaveLength(4);
    expect(keys[0]).toBe(keys[2]);
    expect(keys[0]).not.toBe(keys[1]);
  });

  it("passes when no violation has a gating priority", async () => {
    const reporter = new BudgetReporter({ logger, failOn: ["P2"] });
    expect(reporter.isGating("P2")).toBe(true);
    expect(reporter.isGating("P0")).toBe(false);
    expect(await reporter.publish(sampleReport())).toEqual({ passed: true, gatingFailures: 0, warnings: 2 });
  });

  it("writes the report file", async () => {
    const reportFilePath = path.join(tempDir, "nested", "budget-report.json");
    const reporter = new BudgetReporter({
      logger,
      failOn: ["P0", "P1"],
      reportFilePath,
      now: () => new Date("2026-01-02T03:04:05.000Z")
    });

    await reporter.publish(sampleReport());

    const persisted = JSON.parse(await fs.readFile(reportFilePath, "utf-8"));
    expect(persisted).toEqual({
      generatedAt: "2026-01-02T03:04:05.000Z",
      failOn: ["P0", "P1"],
      outcome: { passed: false, gatingFailures: 2, warnings: 0 },
      report: sampleReport()
    });
  });
});
