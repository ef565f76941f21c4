export class BudgetRegistryError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "BudgetRegistryError";
  }
}

/**
 * Thrown by `mustGetBudget` when the caller asked for a budget that was
 * never registered. This is a setup bug, not a runtime condition.
 */
export class BudgetNotFoundError extends BudgetRegistryError {
  readonly budgetName: string;
  readonly knownNames: string[];

  constructor(budgetName: string, knownNames: string[]) {
    super(
      `Performance budget '${budgetName}' is not registered. Known budgets: ${
        knownNames.length ? knownNames.join(", ") : "(none)"
      }`
    );
    this.name = "BudgetNotFoundError";
    this.budgetName = budgetName;
    this.knownNames = knownNames;
  }
}
