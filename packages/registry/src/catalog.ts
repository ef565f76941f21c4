import type { Budget, Priority } from "@perf-budgets/shared";
import { BudgetNotFoundError } from "./errors";
import { STANDARD_BUDGETS } from "./standard";

export type BudgetLookup =
  | { found: true; budget: Budget }
  | { found: false; budget: undefined };

/**
 * In-memory catalog of performance budgets keyed by operation name.
 *
 * Entries are stored as frozen copies, so neither the object passed to
 * `registerBudget` nor one returned from a lookup can change the catalog
 * afterwards. Listing returns a new array each call, in registration order.
 */
export class BudgetCatalog {
  private readonly entries = new Map<string, Readonly<Budget>>();

  constructor(budgets: Iterable<Budget> = []) {
    this.registerBudgets(budgets);
  }

  get size(): number {
    return this.entries.size;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  getBudget(name: string): BudgetLookup {
    const budget = this.entries.get(name);
    if (!budget) {
      return { found: false, budget: undefined };
    }
    return { found: true, budget };
  }

  /**
   * Lookup for callers that own the name, such as benchmark setup. A miss
   * throws `BudgetNotFoundError` instead of returning an empty result.
   */
  mustGetBudget(name: string): Budget {
    const budget = this.entries.get(name);
    if (!budget) {
      throw new BudgetNotFoundError(name, [...this.entries.keys()]);
    }
    return budget;
  }

  /** Inserts or replaces the entry for `budget.name`. Values are not validated. */
  registerBudget(budget: Budget): void {
    this.entries.set(budget.name, Object.freeze({ ...budget }));
  }

  registerBudgets(budgets: Iterable<Budget>): void {
    for (const budget of budgets) {
      this.registerBudget(budget);
    }
  }

  listBudgets(): Budget[] {
    return [...this.entries.values()];
  }

  listByPriority(priority: Priority): Budget[] {
    return this.listBudgets().filter(budget => budget.priority === priority);
  }
}

export interface CreateBudgetCatalogOptions {
  /** Seed with `STANDARD_BUDGETS` first. Defaults to true. */
  includeStandard?: boolean;
  /** Registered after the standard set, overriding entries with the same name. */
  budgets?: Iterable<Budget>;
}

export function createBudgetCatalog(options: CreateBudgetCatalogOptions = {}): BudgetCatalog {
  const catalog = new BudgetCatalog(options.includeStandard === false ? [] : STANDARD_BUDGETS);
  if (options.budgets) {
    catalog.registerBudgets(options.budgets);
  }
  return catalog;
}
