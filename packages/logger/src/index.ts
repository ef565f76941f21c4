export { StructuredLogger } from "./structuredLogger";
export type { ComponentLogger, LogOptions, StructuredLoggerOptions } from "./structuredLogger";
export { createConsoleSink, formatTextLine } from "./sinks/consoleSink";
export type { ConsoleFormat, ConsoleSinkOptions } from "./sinks/consoleSink";
export { createFileSink } from "./sinks/fileSink";
export type { FileSinkOptions } from "./sinks/fileSink";
export type { LogSink } from "./sinks/types";
export { BudgetReporter } from "./budgetReporter";
export type {
  BudgetReporterOptions,
  BudgetReporterOutcome,
  PersistedBudgetReport
} from "./budgetReporter";
