import type { Budget, BudgetDimension, MeasurementResult, Priority } from "./types";

/** Summary of duration samples for one operation, in nanoseconds. */
export interface TimingStats {
  count: number;
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
}

export interface BudgetCheck {
  operation: string;
  target: number;
  priority: Priority;
  description: string;
  samples: number;
  actual?: number;
  passes: boolean;
}

export interface BudgetViolation {
  result: MeasurementResult;
  budget: Budget;
  failed: BudgetDimension[];
}

export interface PriorityTally {
  passed: number;
  failed: number;
}

export interface BudgetReport {
  total: number;
  passed: number;
  failed: number;
  unbudgeted: number;
  byPriority: Record<string, PriorityTally>;
  violations: BudgetViolation[];
}
