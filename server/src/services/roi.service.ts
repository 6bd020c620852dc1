import { AnalyticsConfig, monetaryValue } from "../config/analyticsConfig";
import {
  BudgetEntry,
  ItemError,
  KpiEntry,
  PortfolioSnapshot,
  Project,
  RoiMethod,
  RoiResult
} from "../models/_types";
import { daysBetween } from "../utils/date";
import { DomainError } from "../utils/errors";
import { achievementRate, cappedAchievement, latestKpiEntries } from "../utils/kpi";
import { mean, roundTo, sum } from "../utils/math";
import { groupByProject, mapProjects } from "../utils/perProject";

const DAYS_PER_MONTH = 30;

export type RoiOptions = {
  /** Expected return per month; needs `asOf` to know how long the project has run. */
  monthlyReturnEstimate?: number;
  asOf?: string;
};

export type PortfolioRoiOptions = {
  monthlyReturnEstimates?: Record<string, number>;
  asOf?: string;
};

type GeneratedValue = {
  value: number;
  method: RoiMethod;
  paybackMonths: number | null;
};

/**
 * ROI of one project: `(valueGenerated - totalActualCost) / totalActualCost`.
 * Without budget data, or with nothing spent, the ratio is undefined rather
 * than zero.
 */
export function computeProjectRoi(
  project: Project,
  budgets: readonly BudgetEntry[],
  kpis: readonly KpiEntry[],
  config: AnalyticsConfig,
  options: RoiOptions = {}
): RoiResult {
  const projectBudgets = budgets.filter((entry) => entry.projectId === project.id);
  const projectKpis = kpis.filter((entry) => entry.projectId === project.id);
  const actualCost = sum(projectBudgets.map((entry) => entry.actualAmount));
  const generated = estimateValue(project, projectKpis, actualCost, config, options);
  const totalActualCost = roundTo(actualCost);
  const valueGenerated = roundTo(generated.value);

  if (!projectBudgets.length) {
    return {
      status: "undefined",
      reason: "NO_BUDGET_DATA",
      projectId: project.id,
      projectName: project.name,
      valueGenerated,
      totalActualCost
    };
  }
  if (actualCost <= 0) {
    return {
      status: "undefined",
      reason: "ZERO_COST",
      projectId: project.id,
      projectName: project.name,
      valueGenerated,
      totalActualCost
    };
  }

  const roi = (generated.value - actualCost) / actualCost;
  return {
    status: "ok",
    projectId: project.id,
    projectName: project.name,
    roi: roundTo(roi, 4),
    roiPercentage: roundTo(roi * 100, 2),
    valueGenerated,
    totalActualCost,
    method: generated.method,
    paybackMonths: generated.paybackMonths
  };
}

export function computePortfolioRoi(
  snapshot: PortfolioSnapshot,
  config: AnalyticsConfig,
  options: PortfolioRoiOptions = {}
): Array<RoiResult | ItemError> {
  const budgetsByProject = groupByProject(snapshot.budgets);
  const kpisByProject = groupByProject(snapshot.kpis);
  return mapProjects(snapshot.projects, "RoiCalculator", (project) =>
    computeProjectRoi(project, budgetsByProject.get(project.id) ?? [], kpisByProject.get(project.id) ?? [], config, {
      monthlyReturnEstimate: options.monthlyReturnEstimates?.[project.id],
      asOf: options.asOf
    })
  );
}

function estimateValue(
  project: Project,
  kpis: readonly KpiEntry[],
  totalActualCost: number,
  config: AnalyticsConfig,
  options: RoiOptions
): GeneratedValue {
  const monthly = options.monthlyReturnEstimate ?? 0;
  if (monthly > 0) {
    if (!options.asOf) {
      throw new DomainError("INVALID_INPUT", "asOf is required when a monthly return estimate is given.");
    }
    const monthsActive = Math.max(1, daysBetween(project.startDate, options.asOf) / DAYS_PER_MONTH);
    return {
      value: monthly * monthsActive,
      method: "monthly-estimate",
      paybackMonths: totalActualCost > 0 ? roundTo(totalActualCost / monthly, 1) : null
    };
  }

  const current = latestKpiEntries(kpis);
  const monetized = current.flatMap((entry) => {
    const unitValue = monetaryValue(config, entry.metricName);
    return unitValue === undefined ? [] : [entry.actualValue * unitValue];
  });
  if (monetized.length) {
    return {
      value: sum(monetized),
      method: "monetary",
      paybackMonths: null
    };
  }

  const rates = current
    .map((entry) => achievementRate(entry, config))
    .filter((rate): rate is number => rate !== null)
    .map((rate) => cappedAchievement(rate, config));
  return {
    value: totalActualCost * (mean(rates) ?? 0),
    method: "achievement-proxy",
    paybackMonths: null
  };
}
