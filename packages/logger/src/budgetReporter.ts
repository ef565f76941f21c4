import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import {
  LogLevel,
  formatDuration,
  type BudgetReport,
  type BudgetViolation,
  type Priority
} from "@perf-budgets/shared";
import type { ComponentLogger } from "./structuredLogger";

export interface BudgetReporterOptions {
  /** Events are logged under this logger's component. */
  logger: ComponentLogger;
  /** Priorities whose violations fail the run; others are logged as warnings. */
  failOn: readonly Priority[];
  reportFilePath?: string;
  now?: () => Date;
}

export interface BudgetReporterOutcome {
  passed: boolean;
  gatingFailures: number;
  warnings: number;
}

export interface PersistedBudgetReport {
  generatedAt: string;
  failOn: Priority[];
  outcome: BudgetReporterOutcome;
  report: BudgetReport;
}

export class BudgetReporter {
  private readonly failOn: ReadonlySet<string>;
  private readonly now: () => Date;

  constructor(private readonly options: BudgetReporterOptions) {
    this.failOn = new Set(options.failOn);
    this.now = options.now ?? (() => new Date());
  }

  isGating(priority: Priority): boolean {
    return this.failOn.has(priority);
  }

  async publish(report: BudgetReport): Promise<BudgetReporterOutcome> {
    let gatingFailures = 0;
    let warnings = 0;

    for (const violation of report.violations) {
      const gating = this.isGating(violation.budget.priority);
      if (gating) {
        gatingFailures += 1;
      } else {
        warnings += 1;
      }
      this.logViolation(violation, gating ? LogLevel.ERROR : LogLevel.WARN);
    }

    const outcome: BudgetReporterOutcome = {
      passed: gatingFailures === 0,
      gatingFailures,
      warnings
    };

    this.options.logger.log(
      LogLevel.INFO,
      "budget_check_summary",
      {
        total: report.total,
        passed: report.passed,
        failed: report.failed,
        unbudgeted: report.unbudgeted,
        byPriority: report.byPriority,
        ...outcome
      }
    );

    if (this.options.reportFilePath) {
      await this.persist(this.options.reportFilePath, { report, outcome });
    }
    return outcome;
  }

  private logViolation(violation: BudgetViolation, level: LogLevel) {
    const { result, budget, failed } = violation;
    this.options.logger.log(
      level,
      "budget_violation",
      {
        operation: result.operation,
        priority: budget.priority,
        failed,
        duration: result.duration,
        maxDuration: budget.maxDuration,
        durationText: `${formatDuration(result.duration)} / ${formatDuration(budget.maxDuration)}`,
        allocations: result.allocations,
        maxAllocations: budget.maxAllocations,
        bytes: result.bytes,
        maxBytes: budget.maxBytes
      },
      {
        dedupParts: [result.operation, ...failed],
        tags: [budget.priority]
      }
    );
  }

  private async persist(filePath: string, data: { report: BudgetReport; outcome: BudgetReporterOutcome }) {
    const payload: PersistedBudgetReport = {
      generatedAt: this.now().toISOString(),
      failOn: [...this.options.failOn],
      outcome: data.outcome,
      report: data.report
    };
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, JSON.stringify(payload, null, 2), "utf-8");
  }
}
