import fs from "fs";
import path from "path";
import Ajv2020 from "ajv/dist/2020";
import type { ValidateFunction } from "ajv";
import type { Budget, Measurement } from "../budget/types";
import { DurationParseError, parseDuration } from "../budget/duration";
import type { BudgetFile, MeasurementFile, ValidationResult } from "./types";

const schemaDir = path.resolve(__dirname, "../../../../config/schema");

export const BUDGET_FILE_SCHEMA_PATH = path.join(schemaDir, "budget-file.schema.json");
export const MEASUREMENT_FILE_SCHEMA_PATH = path.join(schemaDir, "measurements.schema.json");

export class ConfigFileError extends Error {
  constructor(public readonly filePath: string, public readonly errors: string[]) {
    super(`Invalid config file ${filePath}:\n${errors.join("\n")}`);
    this.name = "ConfigFileError";
  }
}

function compileSchema<T>(schemaFilePath: string): ValidateFunction<T> {
  const schemaRaw = fs.readFileSync(schemaFilePath, "utf-8");
  const schema = JSON.parse(schemaRaw);
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  return ajv.compile<T>(schema);
}

function describeErrors<T>(validateFn: ValidateFunction<T>): string[] {
  return validateFn.errors?.map(err => `${err.instancePath || "/"} ${err.message ?? "is invalid"}`) ?? [];
}

function runValidator<T>(validateFn: ValidateFunction<T>, data: unknown): ValidationResult {
  if (validateFn(data)) {
    return { valid: true };
  }
  return { valid: false, errors: describeErrors(validateFn) };
}

/**
 * Validates a parsed budget file against its JSON schema without throwing.
 */
export function validateBudgetFile(data: unknown, schemaFilePath: string = BUDGET_FILE_SCHEMA_PATH): ValidationResult {
  return runValidator(compileSchema<BudgetFile>(schemaFilePath), data);
}

/**
 * Validates a parsed measurements file against its JSON schema without throwing.
 */
export function validateMeasurementFile(
  data: unknown,
  schemaFilePath: string = MEASUREMENT_FILE_SCHEMA_PATH
): ValidationResult {
  return runValidator(compileSchema<MeasurementFile>(schemaFilePath), data);
}

function readJson(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigFileError(filePath, [error instanceof Error ? error.message : String(error)]);
  }
}

function readValidated<T>(filePath: string, schemaFilePath: string): T {
  const data = readJson(filePath);
  const validateFn = compileSchema<T>(schemaFilePath);
  if (!validateFn(data)) {
    throw new ConfigFileError(filePath, describeErrors(validateFn));
  }
  return data;
}

function toNanos(filePath: string, pointer: string, input: number | string): number {
  try {
    return parseDuration(input);
  } catch (error) {
    if (error instanceof DurationParseError) {
      throw new ConfigFileError(filePath, [`${pointer} ${error.message}`]);
    }
    throw error;
  }
}

/**
 * Reads a budget file, validates it and converts its entries to budgets.
 * Missing ceilings become 0 (no limit).
 */
export function loadBudgetFile(filePath: string, schemaFilePath: string = BUDGET_FILE_SCHEMA_PATH): Budget[] {
  const file = readValidated<BudgetFile>(filePath, schemaFilePath);
  return file.budgets.map((entry, index) => ({
    name: entry.name,
    maxDuration: toNanos(filePath, `/budgets/${index}/maxDuration`, entry.maxDuration),
    maxAllocations: entry.maxAllocations ?? 0,
    maxBytes: entry.maxBytes ?? 0,
    priority: entry.priority,
    description: entry.description ?? ""
  }));
}

export function loadMeasurementFile(
  filePath: string,
  schemaFilePath: string = MEASUREMENT_FILE_SCHEMA_PATH
): Measurement[] {
  const file = readValidated<MeasurementFile>(filePath, schemaFilePath);
  return file.measurements.map((entry, index) => ({
    operation: entry.operation,
    duration: toNanos(filePath, `/measurements/${index}/duration`, entry.duration),
    allocations: entry.allocations ?? 0,
    bytes: entry.bytes ?? 0
  }));
}
