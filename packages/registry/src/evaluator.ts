import type { Budget, BudgetDimension, Measurement, MeasurementResult } from "@perf-budgets/shared";
import type { BudgetCatalog } from "./catalog";

/**
 * Compares one measurement against a budget.
 *
 * Without a budget every dimension passes: an operation nobody registered has
 * no constraint. Duration is an inclusive upper bound. A ceiling of 0 for
 * allocations or bytes means "no limit", not "must be zero".
 */
export function evaluate(budget: Budget | undefined, measurement: Measurement): MeasurementResult {
  const { operation, duration, allocations, bytes } = measurement;
  if (!budget) {
    return {
      operation,
      duration,
      allocations,
      bytes,
      passesDuration: true,
      passesAllocations: true,
      passesBytes: true,
      passes: true
    };
  }

  const passesDuration = duration <= budget.maxDuration;
  const passesAllocations = budget.maxAllocations === 0 || allocations <= budget.maxAllocations;
  const passesBytes = budget.maxBytes === 0 || bytes <= budget.maxBytes;

  return {
    operation,
    duration,
    allocations,
    bytes,
    passesDuration,
    passesAllocations,
    passesBytes,
    passes: passesDuration && passesAllocations && passesBytes
  };
}

export function measure(
  catalog: BudgetCatalog,
  operation: string,
  duration: number,
  allocations: number,
  bytes: number
): MeasurementResult {
  return evaluate(catalog.getBudget(operation).budget, { operation, duration, allocations, bytes });
}

export function measureAll(catalog: BudgetCatalog, measurements: readonly Measurement[]): MeasurementResult[] {
  return measurements.map(sample =>
    measure(catalog, sample.operation, sample.duration, sample.allocations, sample.bytes)
  );
}

export function failedDimensions(result: MeasurementResult): BudgetDimension[] {
  const failed: BudgetDimension[] = [];
  if (!result.passesDuration) {
    failed.push("duration");
  }
  if (!result.passesAllocations) {
    failed.push("allocations");
  }
  if (!result.passesBytes) {
    failed.push("bytes");
  }
  return failed;
}
