import type {
  BudgetCheck,
  BudgetReport,
  MeasurementResult,
  PriorityTally,
  TimingStats
} from "@perf-budgets/shared";
import type { BudgetCatalog } from "./catalog";
import { failedDimensions } from "./evaluator";

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) {
    return 0;
  }
  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  if (lower === upper) {
    return sorted[lower];
  }
  const weight = rank - lower;
  return sorted[lower] * (1 - weight) + sorted[upper] * weight;
}

const EMPTY_STATS: TimingStats = { count: 0, min: 0, max: 0, avg: 0, p50: 0, p95: 0 };

/**
 * Reduces raw duration samples (nanoseconds) per operation to summary stats.
 */
export function summarizeTimings(samples: Record<string, readonly number[]>): Record<string, TimingStats> {
  const stats: Record<string, TimingStats> = {};
  for (const [operation, values] of Object.entries(samples)) {
    if (values.length === 0) {
      stats[operation] = { ...EMPTY_STATS };
      continue;
    }
    const sorted = [...values].sort((a, b) => a - b);
    const sum = sorted.reduce((acc, value) => acc + value, 0);
    stats[operation] = {
      count: sorted.length,
      min: sorted[0],
      max: sorted[sorted.length - 1],
      avg: sum / sorted.length,
      p50: percentile(sorted, 50),
      p95: percentile(sorted, 95)
    };
  }
  return stats;
}

/**
 * Checks the average recorded duration of every catalog budget. Budgets with
 * no samples yet are reported as passing.
 */
export function checkTimings(catalog: BudgetCatalog, stats: Record<string, TimingStats>): BudgetCheck[] {
  return catalog.listBudgets().map(budget => {
    const timing = stats[budget.name];
    const check: BudgetCheck = {
      operation: budget.name,
      target: budget.maxDuration,
      priority: budget.priority,
      description: budget.description,
      samples: timing?.count ?? 0,
      passes: true
    };
    if (timing && timing.count > 0) {
      check.actual = timing.avg;
      check.passes = timing.avg <= budget.maxDuration;
    }
    return check;
  });
}

export function buildBudgetReport(catalog: BudgetCatalog, results: readonly MeasurementResult[]): BudgetReport {
  const report: BudgetReport = {
    total: results.length,
    passed: 0,
    failed: 0,
    unbudgeted: 0,
    byPriority: {},
    violations: []
  };
  // priorities are arbitrary strings, so tally outside a plain object
  const tallies = new Map<string, PriorityTally>();

  for (const result of results) {
    const lookup = catalog.getBudget(result.operation);
    if (!lookup.found) {
      report.unbudgeted += 1;
      report.passed += 1;
      continue;
    }
    const priority = lookup.budget.priority;
    let tally = tallies.get(priority);
    if (!tally) {
      tally = { passed: 0, failed: 0 };
      tallies.set(priority, tally);
    }
    if (result.passes) {
      report.passed += 1;
      tally.passed += 1;
      continue;
    }
    report.failed += 1;
    tally.failed += 1;
    report.violations.push({ result, budget: lookup.budget, failed: failedDimensions(result) });
  }

  report.byPriority = Object.fromEntries(tallies);
  return report;
}
