import {
  LogLevel,
  formatDuration,
  loadBudgetFile,
  loadMeasurementFile,
  readOptionalEnv,
  type Budget,
  type BudgetReport,
  type EnvSource
} from "@perf-budgets/shared";
import {
  BudgetReporter,
  StructuredLogger,
  createConsoleSink,
  createFileSink,
  type BudgetReporterOutcome,
  type LogSink
} from "@perf-budgets/logger";
import { createBudgetCatalog } from "../catalog";
import { measureAll } from "../evaluator";
import { buildBudgetReport } from "../report";
import { resolveCheckSettings, resolveLogDir, resolveLogLevel, type CheckFlags } from "./settings";

export interface ListOptions {
  /** Budget file; falls back to PERF_BUDGETS_FILE in `env`. */
  budgets?: string;
  env?: EnvSource;
  priority?: string;
  json?: boolean;
  write: (text: string) => void;
}

export function formatBudgetLine(budget: Budget): string {
  return [budget.name, formatDuration(budget.maxDuration), budget.priority, budget.description].join("\t");
}

/**
 * Prints the standard catalog plus any budget file overrides, sorted by name.
 */
export function runList(options: ListOptions): Budget[] {
  const budgetsFile = options.budgets ?? readOptionalEnv("PERF_BUDGETS_FILE", options.env ?? {});
  const catalog = createBudgetCatalog({
    budgets: budgetsFile ? loadBudgetFile(budgetsFile) : []
  });
  const budgets = (options.priority ? catalog.listByPriority(options.priority) : catalog.listBudgets()).sort(
    (a, b) => a.name.localeCompare(b.name)
  );
  if (options.json) {
    options.write(JSON.stringify(budgets, null, 2));
  } else {
    budgets.forEach(budget => options.write(formatBudgetLine(budget)));
  }
  return budgets;
}

export interface CheckDependencies {
  env: EnvSource;
  runId?: string;
  /** Replaces the default console sink. */
  sinks?: LogSink[];
}

export interface CheckOutcome {
  report: BudgetReport;
  outcome: BudgetReporterOutcome;
}

export async function runCheck(flags: CheckFlags, deps: CheckDependencies): Promise<CheckOutcome> {
  const level = resolveLogLevel(flags.logLevel, deps.env);
  const runId = deps.runId ?? `check-${Date.now()}`;
  const format = flags.logFormat === "text" ? "text" : "json";
  const sinks = [...(deps.sinks ?? [createConsoleSink({ level, format })])];
  const logDir = resolveLogDir(flags.logDir, deps.env);
  if (logDir) {
    sinks.push(createFileSink({ runId, level, outputDir: logDir }));
  }
  const logger = new StructuredLogger({ runId, baseComponent: "budgets.cli", level, sinks });

  try {
    await logger.start();
    const settings = resolveCheckSettings(flags, deps.env);

    const catalog = createBudgetCatalog({
      budgets: settings.budgetsFile ? loadBudgetFile(settings.budgetsFile) : []
    });
    const measurements = loadMeasurementFile(settings.measurementsFile);
    logger.log(LogLevel.DEBUG, "budget_check_started", {
      measurementsFile: settings.measurementsFile,
      budgetsFile: settings.budgetsFile,
      measurements: measurements.length,
      budgets: catalog.size,
      failOn: settings.failOn
    });

    const report = buildBudgetReport(catalog, measureAll(catalog, measurements));
    const reporter = new BudgetReporter({
      logger: logger.child("budgets.check"),
      failOn: settings.failOn,
      reportFilePath: settings.reportPath
    });
    const outcome = await reporter.publish(report);
    return { report, outcome };
  } catch (error) {
    logger.log(LogLevel.ERROR, "budget_check_failed", {
      error: error instanceof Error ? error.message : String(error),
      errorName: error instanceof Error ? error.name : undefined
    });
    throw error;
  } finally {
    await logger.stop();
  }
}
