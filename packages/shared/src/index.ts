export * from "./observability";
export * from "./budget/types";
export * from "./budget/duration";
export * from "./budget/report";
export * from "./env/schema";
export * from "./env/validator";
export * from "./config/types";
export {
  BUDGET_FILE_SCHEMA_PATH,
  MEASUREMENT_FILE_SCHEMA_PATH,
  ConfigFileError,
  loadBudgetFile,
  loadMeasurementFile,
  validateBudgetFile,
  validateMeasurementFile
} from "./config/loader";
