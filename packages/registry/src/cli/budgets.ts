#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import type { EnvSource } from "@perf-budgets/shared";
import { runCheck, runList } from "./commands";
import { loadEnvSource } from "./settings";

function splitList(value: string | string[] | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return (Array.isArray(value) ? value : [value])
    .flatMap(part => part.split(","))
    .map(part => part.trim())
    .filter(part => part.length > 0);
}

function readEnvFile(envFile: string | undefined): EnvSource | undefined {
  try {
    return loadEnvSource(envFile);
  } catch (error) {
    console.error(`[perf-budgets] cannot read env file ${envFile}:`, error);
    process.exitCode = 1;
    return undefined;
  }
}

yargs(hideBin(process.argv))
  .scriptName("perf-budgets")
  .option("env-file", {
    type: "string",
    describe: "dotenv file supplying PERF_* variables the environment does not set"
  })
  .command(
    "list",
    "Print the budget catalog",
    builder => builder
      .option("budgets", {
        type: "string",
        describe: "Budget file whose entries override or extend the standard set (defaults to PERF_BUDGETS_FILE)"
      })
      .option("priority", {
        type: "string",
        describe: "Only budgets with this priority (e.g. P0)"
      })
      .option("json", {
        type: "boolean",
        default: false,
        describe: "Print JSON instead of tab-separated lines"
      }),
    args => {
      const env = readEnvFile(args.envFile);
      if (!env) {
        return;
      }
      runList({
        budgets: args.budgets,
        priority: args.priority,
        json: args.json,
        env,
        write: text => console.log(text)
      });
    }
  )
  .command(
    "check [measurements]",
    "Evaluate a measurements file against the budget catalog",
    builder => builder
      .positional("measurements", {
        type: "string",
        describe: "Measurements JSON file (defaults to PERF_MEASUREMENTS_FILE)"
      })
      .option("budgets", {
        type: "string",
        describe: "Budget file (defaults to PERF_BUDGETS_FILE)"
      })
      .option("fail-on", {
        type: "string",
        array: true,
        coerce: splitList,
        describe: "Priorities whose violations fail the run (default P0, or PERF_FAIL_ON)"
      })
      .option("report", {
        type: "string",
        describe: "Write the JSON report here (defaults to PERF_REPORT_PATH)"
      })
      .option("log-dir", {
        type: "string",
        describe: "Also write JSONL logs to this directory (defaults to PERF_LOG_DIR)"
      })
      .option("log-level", {
        type: "string",
        choices: ["debug", "info", "warn", "error", "critical"],
        describe: "Minimum log level (defaults to PERF_LOG_LEVEL or info)"
      })
      .option("log-format", {
        type: "string",
        choices: ["json", "text"],
        default: "json",
        describe: "Console log format"
      }),
    async args => {
      const env = readEnvFile(args.envFile);
      if (!env) {
        return;
      }
      try {
        const { outcome } = await runCheck(
          {
            measurements: args.measurements,
            budgets: args.budgets,
            failOn: args.failOn,
            report: args.report,
            logDir: args.logDir,
            logLevel: args.logLevel,
            logFormat: args.logFormat
          },
          { env }
        );
        process.exitCode = outcome.passed ? 0 : 1;
      } catch (error) {
        console.error("[perf-budgets] check failed", error);
        process.exitCode = 1;
      }
    }
  )
  .demandCommand()
  .help()
  .strict()
  .parseAsync()
  .catch(error => {
    console.error("[perf-budgets] command failed", error);
    process.exitCode = 1;
  });
