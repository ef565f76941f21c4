import { readFileSync } from "node:fs";
import { parse } from "dotenv";
import {
  EnvValidationError,
  LogLevel,
  getMissingEnvVars,
  parseLogLevel,
  readListEnv,
  readOptionalEnv,
  type EnvSource,
  type Priority
} from "@perf-budgets/shared";

export const DEFAULT_FAIL_ON: readonly Priority[] = ["P0"];

export interface CheckFlags {
  measurements?: string;
  budgets?: string;
  failOn?: string[];
  report?: string;
  logDir?: string;
  logLevel?: string;
  logFormat?: string;
}

export interface CheckSettings {
  measurementsFile: string;
  budgetsFile?: string;
  failOn: Priority[];
  reportPath?: string;
}

/**
 * Builds the environment the CLI reads. Values from `envFile` fill in
 * variables the process environment does not already set.
 */
export function loadEnvSource(envFile?: string, base: EnvSource = process.env): EnvSource {
  if (!envFile) {
    return { ...base };
  }
  const fromFile = parse(readFileSync(envFile, "utf8"));
  return { ...fromFile, ...base };
}

export function resolveLogLevel(flag: string | undefined, env: EnvSource): LogLevel {
  return parseLogLevel(flag ?? readOptionalEnv("PERF_LOG_LEVEL", env));
}

export function resolveLogDir(flag: string | undefined, env: EnvSource): string | undefined {
  return flag ?? readOptionalEnv("PERF_LOG_DIR", env);
}

/**
 * Flags win over environment variables. Logging settings are resolved
 * separately so a failure here can still be logged.
 */
export function resolveCheckSettings(flags: CheckFlags, env: EnvSource): CheckSettings {
  const measurementsFile = flags.measurements ?? readOptionalEnv("PERF_MEASUREMENTS_FILE", env);
  if (!measurementsFile) {
    throw new EnvValidationError("check", getMissingEnvVars("check", env));
  }
  return {
    measurementsFile,
    budgetsFile: flags.budgets ?? readOptionalEnv("PERF_BUDGETS_FILE", env),
    failOn: flags.failOn ?? readListEnv("PERF_FAIL_ON", env) ?? [...DEFAULT_FAIL_ON],
    reportPath: flags.report ?? readOptionalEnv("PERF_REPORT_PATH", env)
  };
}
