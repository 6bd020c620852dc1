import {
  BudgetCategory,
  BudgetEntry,
  BudgetGrouping,
  BudgetStatus,
  BudgetVarianceResult,
  VarianceFigures,
  VarianceGroup
} from "../models/_types";
import { compareKeys, roundTo, sum } from "../utils/math";

type GroupDescriptor = {
  key: string;
  projectId?: string;
  category?: BudgetCategory;
};

export function budgetStatus(variance: number): BudgetStatus {
  if (variance > 0) {
    return "OVER";
  }
  return variance < 0 ? "UNDER" : "ON_TRACK";
}

/** Null percentage when nothing was planned; never zero or Infinity. */
export function computeVariance(entries: readonly BudgetEntry[]): VarianceFigures {
  const totalPlanned = sum(entries.map((entry) => entry.plannedAmount));
  const totalActual = sum(entries.map((entry) => entry.actualAmount));
  const planned = roundTo(totalPlanned);
  const actual = roundTo(totalActual);
  const variance = roundTo(actual - planned);
  return {
    planned,
    actual,
    variance,
    variancePercentage: totalPlanned === 0 ? null : roundTo(((totalActual - totalPlanned) / totalPlanned) * 100),
    overBudget: actual > planned,
    status: budgetStatus(variance),
    entryCount: entries.length,
    currencies: Array.from(new Set(entries.map((entry) => entry.currency))).sort(compareKeys)
  };
}

function describeGroup(entry: BudgetEntry, groupBy: BudgetGrouping): GroupDescriptor {
  switch (groupBy) {
    case "project":
      return { key: entry.projectId, projectId: entry.projectId };
    case "category":
      return { key: entry.category, category: entry.category };
    case "project-category":
      return { key: `${entry.projectId}/${entry.category}`, projectId: entry.projectId, category: entry.category };
    case "none":
    default:
      return { key: "all" };
  }
}

/**
 * Planned against actual per group and in total. Groups come back sorted by
 * key; `none` yields totals only.
 */
export function analyzeBudgetVariance(
  entries: readonly BudgetEntry[],
  groupBy: BudgetGrouping = "none"
): BudgetVarianceResult {
  const groups: VarianceGroup[] = [];
  if (groupBy !== "none") {
    const buckets = new Map<string, { descriptor: GroupDescriptor; entries: BudgetEntry[] }>();
    for (const entry of entries) {
      const descriptor = describeGroup(entry, groupBy);
      const bucket = buckets.get(descriptor.key);
      if (bucket) {
        bucket.entries.push(entry);
      } else {
        buckets.set(descriptor.key, { descriptor, entries: [entry] });
      }
    }
    for (const { descriptor, entries: grouped } of buckets.values()) {
      groups.push({ ...descriptor, ...computeVariance(grouped) });
    }
    groups.sort((a, b) => compareKeys(a.key, b.key));
  }
  return {
    groupBy,
    groups,
    totals: computeVariance(entries)
  };
}

/** Project groups whose overrun exceeds `threshold` (a ratio, 0.2 for 20%). */
export function findOverBudgetProjects(entries: readonly BudgetEntry[], threshold: number): VarianceGroup[] {
  return analyzeBudgetVariance(entries, "project").groups.filter(
    (group) => group.variancePercentage !== null && group.variancePercentage > threshold * 100
  );
}
