export { BudgetCatalog, createBudgetCatalog } from "./catalog";
export type { BudgetLookup, CreateBudgetCatalogOptions } from "./catalog";
export { STANDARD_BUDGETS } from "./standard";
export { evaluate, failedDimensions, measure, measureAll } from "./evaluator";
export { buildBudgetReport, checkTimings, summarizeTimings } from "./report";
export { BudgetNotFoundError, BudgetRegistryError } from "./errors";
export { formatBudgetLine, runCheck, runList } from "./cli/commands";
export type { CheckDependencies, CheckOutcome, ListOptions } from "./cli/commands";
export { DEFAULT_FAIL_ON, loadEnvSource, resolveCheckSettings } from "./cli/settings";
export type { CheckFlags, CheckSettings } from "./cli/settings";
