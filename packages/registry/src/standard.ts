import { KIB, MIB, MICROSECOND, MILLISECOND, NANOSECOND, type Budget } from "@perf-budgets/shared";

const standardBudgets: Budget[] = [
  {
    name: "context_detection",
    maxDuration: 100 * MILLISECOND,
    maxAllocations: 200,
    maxBytes: 50 * KIB,
    description: "Time to detect project context (git root, frameworks, worktree mode)",
    priority: "P0"
  },
  {
    name: "config_load",
    maxDuration: 50 * MILLISECOND,
    maxAllocations: 150,
    maxBytes: 20 * KIB,
    description: "Time to load a single configuration file",
    priority: "P1"
  },
  {
    name: "config_merge_single",
    maxDuration: 30 * MILLISECOND,
    maxAllocations: 150,
    maxBytes: 15 * KIB,
    description: "Time to merge a single configuration file",
    priority: "P1"
  },
  {
    name: "config_merge_multiple",
    maxDuration: 100 * MILLISECOND,
    maxAllocations: 600,
    maxBytes: 50 * KIB,
    description: "Time to merge multiple (5+) configuration files",
    priority: "P1"
  },
  {
    name: "plugin_discovery",
    maxDuration: 500 * MILLISECOND,
    maxAllocations: 10_000,
    maxBytes: 2 * MIB,
    description: "Time to discover and enumerate all available plugins",
    priority: "P0"
  },
  {
    name: "plugin_load",
    maxDuration: 200 * MILLISECOND,
    maxAllocations: 1000,
    maxBytes: 512 * KIB,
    description: "Time to load and initialize a single plugin",
    priority: "P1"
  },
  {
    name: "plugin_cache_get",
    maxDuration: 10 * MICROSECOND,
    maxAllocations: 0,
    maxBytes: 0,
    description: "Time to retrieve a plugin from cache",
    priority: "P2"
  },
  {
    name: "startup_total",
    maxDuration: 300 * MILLISECOND,
    maxAllocations: 10_000,
    maxBytes: 5 * MIB,
    description: "Total time from start to ready state (excluding plugins)",
    priority: "P0"
  },
  {
    name: "command_lookup",
    maxDuration: 1 * MILLISECOND,
    maxAllocations: 10,
    maxBytes: 1 * KIB,
    description: "Time to look up a command by name",
    priority: "P1"
  },
  {
    name: "error_creation",
    maxDuration: 1 * MICROSECOND,
    maxAllocations: 5,
    maxBytes: 1 * KIB,
    description: "Time to create a structured error",
    priority: "P2"
  },
  {
    name: "error_wrap",
    maxDuration: 500 * NANOSECOND,
    maxAllocations: 5,
    maxBytes: 512,
    description: "Time to wrap an existing error",
    priority: "P2"
  },
  {
    name: "path_validation",
    maxDuration: 50 * MICROSECOND,
    maxAllocations: 100,
    maxBytes: 10 * KIB,
    description: "Time to validate a file path for security",
    priority: "P1"
  },
  // duration-only: no allocation or byte ceiling
  {
    name: "registry_get",
    maxDuration: 100 * NANOSECOND,
    maxAllocations: 0,
    maxBytes: 0,
    description: "Time to retrieve an item from registry",
    priority: "P2"
  },
  {
    name: "registry_list",
    maxDuration: 10 * MICROSECOND,
    maxAllocations: 5,
    maxBytes: 4 * KIB,
    description: "Time to list all items in registry (100 items)",
    priority: "P2"
  }
];

/**
 * Budgets every catalog starts with. Downstream tooling keys on these names,
 * so renaming or removing one is a breaking change.
 */
export const STANDARD_BUDGETS: ReadonlyArray<Readonly<Budget>> = Object.freeze(
  standardBudgets.map(budget => Object.freeze(budget))
);
