/**
 * Known priority levels. Any other string is accepted as a priority; these
 * are the ones the standard budgets use.
 */
export type KnownPriority = "P0" | "P1" | "P2";

export type Priority = KnownPriority | (string & {});

/**
 * A named performance contract.
 *
 * Durations are integer nanoseconds. `maxAllocations` and `maxBytes` use 0
 * for "no limit", so a budget of exactly zero allocations cannot be
 * expressed.
 */
export interface Budget {
  name: string;
  maxDuration: number;
  maxAllocations: number;
  maxBytes: number;
  priority: Priority;
  description: string;
}

/** One observed run of an operation, as reported by a benchmark harness. */
export interface Measurement {
  operation: string;
  duration: number;
  allocations: number;
  bytes: number;
}

export interface MeasurementResult extends Measurement {
  passesDuration: boolean;
  passesAllocations: boolean;
  passesBytes: boolean;
  passes: boolean;
}

export type BudgetDimension = "duration" | "allocations" | "bytes";
