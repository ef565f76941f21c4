import { describe, expect, it } from "vitest";
import { KIB, MILLISECOND } from "@perf-budgets/shared";
import { BudgetCatalog, createBudgetCatalog } from "../src/catalog";
import { measureAll } from "../src/evaluator";
import { buildBudgetReport, checkTimings, summarizeTimings } from "../src/report";

describe("summarizeTimings", () => {
  it("computes count, range, mean and interpolated percentiles", () => {
    const stats = summarizeTimings({ config_load: [40, 10, 30, 20, 50] });
    expect(stats.config_load).toMatchObject({ count: 5, min: 10, max: 50, avg: 30, p50: 30 });
    expect(stats.config_load.p95).toBeCloseTo(48, 6);
  });

  it("returns zeros for an operation without samples", () => {
    expect(summarizeTimings({ idle: [] }).idle).toEqual({ count: 0, min: 0, max: 0, avg: 0, p50: 0, p95: 0 });
  });

  it("does not reorder the caller's samples", () => {
    const samples = [3, 1, 2];
    summarizeTimings({ op: samples });
    expect(samples).toEqual([3, 1, 2]);
  });
});

describe("checkTimings", () => {
  const catalog = new BudgetCatalog([
    { name: "fast", maxDuration: 10, maxAllocations: 0, maxBytes: 0, priority: "P0", description: "fast op" },
    { name: "slow", maxDuration: 100, maxAllocations: 0, maxBytes: 0, priority: "P1", description: "slow op" },
    { name: "unseen", maxDuration: 5, maxAllocations: 0, maxBytes: 0, priority: "P2", description: "no data" }
  ]);

  it("compares the average duration with every budget", () => {
    const checks = checkTimings(catalog, summarizeTimings({ fast: [8, 14], slow: [90, 100, 110] }));
    expect(checks).toEqual([
      { operation: "fast", target: 10, priority: "P0", description: "fast op", samples: 2, actual: 11, passes: false },
      { operation: "slow", target: 100, priority: "P1", description: "slow op", samples: 3, actual: 100, passes: true },
      { operation: "unseen", target: 5, priority: "P2", description: "no data", samples: 0, passes: true }
    ]);
  });
});

describe("buildBudgetReport", () => {
  it("tallies results by priority and collects violations", () => {
    const catalog = createBudgetCatalog();
    const results = measureAll(catalog, [
      { operation: "context_detection", duration: 50 * MILLISECOND, allocations: 100, bytes: 25 * KIB },
      { operation: "context_detection", duration: 200 * MILLISECOND, allocations: 100, bytes: 25 * KIB },
      { operation: "config_load", duration: 10 * MILLISECOND, allocations: 500, bytes: 30 * KIB },
      { operation: "registry_get", duration: 50, allocations: 9, bytes: 9 },
      { operation: "custom_operation", duration: 1, allocations: 1, bytes: 1 }
    ]);

    const report = buildBudgetReport(catalog, results);

    expect(report.total).toBe(5);
    expect(report.passed).toBe(3);
    expect(report.failed).toBe(2);
    expect(report.unbudgeted).toBe(1);
    expect(report.byPriority).toEqual({
      P0: { passed: 1, failed: 1 },
      P1: { passed: 0, failed: 1 },
      P2: { passed: 1, failed: 0 }
    });
    expect(report.violations.map(v => [v.result.operation, v.budget.priority, v.failed])).toEqual([
      ["context_detection", "P0", ["duration"]],
      ["config_load", "P1", ["allocations", "bytes"]]
    ]);
  });

  it("keeps priorities that share a name with Object members", () => {
    const catalog = new BudgetCatalog([
      { name: "ctor_op", maxDuration: 10, maxAllocations: 0, maxBytes: 0, priority: "constructor", description: "" },
      { name: "proto_op", maxDuration: 10, maxAllocations: 0, maxBytes: 0, priority: "__proto__", description: "" }
    ]);
    const results = measureAll(catalog, [
      { operation: "ctor_op", duration: 5, allocations: 0, bytes: 0 },
      { operation: "proto_op", duration: 50, allocations: 0, bytes: 0 }
    ]);

    const report = buildBudgetReport(catalog, results);

    expect(Object.keys(report.byPriority)).toEqual(["constructor", "__proto__"]);
    expect(Object.getOwnPropertyDescriptor(report.byPriority, "constructor")?.value).toEqual({ passed: 1, failed: 0 });
    expect(Object.getOwnPropertyDescriptor(report.byPriority, "__proto__")?.value).toEqual({ passed: 0, failed: 1 });
    expect(Object.prototype.hasOwnProperty.call(Object.prototype, "passed")).toBe(false);
    expect(Object.prototype.hasOwnProperty.call(Object, "passed")).toBe(false);
  });

  it("is empty for no results", () => {
    expect(buildBudgetReport(createBudgetCatalog(), [])).toEqual({
      total: 0,
      passed: 0,
      failed: 0,
      unbudgeted: 0,
      byPriority: {},
      violations: []
    });
  });
});
