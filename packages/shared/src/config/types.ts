export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/** Duration as written in a config file: nanoseconds, or a string with a unit. */
export type DurationInput = number | string;

export interface BudgetFileEntry {
  name: string;
  maxDuration: DurationInput;
  maxAllocations?: number;
  maxBytes?: number;
  priority: string;
  description?: string;
}

export interface BudgetFile {
  $schema?: string;
  budgets: BudgetFileEntry[];
}

export interface MeasurementFileEntry {
  operation: string;
  duration: DurationInput;
  allocations?: number;
  bytes?: number;
}

export interface MeasurementFile {
  $schema?: string;
  measurements: MeasurementFileEntry[];
}
