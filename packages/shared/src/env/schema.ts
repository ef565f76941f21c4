export type EnvSchema = {
  required: string[];
  /** Read when present; listed for `.env.example` and documentation. */
  optional?: string[];
};

export type EnvService = "check" | "logger";

export const ENV_SCHEMAS: Record<EnvService, EnvSchema> = {
  check: {
    required: ["PERF_MEASUREMENTS_FILE"],
    optional: ["PERF_BUDGETS_FILE", "PERF_FAIL_ON", "PERF_REPORT_PATH"]
  },
  logger: {
    required: [],
    optional: ["PERF_LOG_LEVEL", "PERF_LOG_DIR"]
  }
};
