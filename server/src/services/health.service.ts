import { AnalyticsConfig, assertValidWeights } from "../config/analyticsConfig";
import {
  BudgetEntry,
  DimensionScores,
  HealthBand,
  HealthDimension,
  ItemError,
  KpiEntry,
  PortfolioHealth,
  PortfolioSnapshot,
  Project,
  ProjectHealth,
  RiskEntry
} from "../models/_types";
import { achievementRate, cappedAchievement, latestKpiEntries } from "../utils/kpi";
import { clamp, mean, roundTo, sum } from "../utils/math";
import { groupByProject, mapProjects } from "../utils/perProject";
import { scoreRisk } from "./riskMatrix.service";

export const HEALTH_DIMENSIONS: readonly HealthDimension[] = ["status", "risk", "budget", "kpi"];

export type ProjectRecords = {
  kpis: readonly KpiEntry[];
  budgets: readonly BudgetEntry[];
  risks: readonly RiskEntry[];
};

/** 100 minus the mean normalized score of open risks; null without any risk on record. */
export function scoreRiskDimension(risks: readonly RiskEntry[]): number | null {
  if (!risks.length) {
    return null;
  }
  const open = risks.filter((risk) => risk.status !== "RESOLVED");
  const average = mean(open.map((risk) => scoreRisk(risk).normalizedScore));
  return average === null ? 100 : 100 - average * 100;
}

/**
 * Inverse of `|actual - planned| / planned`, reaching 0 at the saturation
 * ratio. Null when nothing was planned or spent.
 */
export function scoreBudgetDimension(budgets: readonly BudgetEntry[], config: AnalyticsConfig): number | null {
  if (!budgets.length) {
    return null;
  }
  const planned = sum(budgets.map((entry) => entry.plannedAmount));
  const actual = sum(budgets.map((entry) => entry.actualAmount));
  if (planned === 0) {
    return actual === 0 ? null : 0;
  }
  const ratio = Math.abs(actual - planned) / planned;
  return 100 * (1 - Math.min(ratio, config.budgetSaturation) / config.budgetSaturation);
}

export function scoreKpiDimension(kpis: readonly KpiEntry[], config: AnalyticsConfig): number | null {
  const rates = latestKpiEntries(kpis)
    .map((entry) => achievementRate(entry, config))
    .filter((rate): rate is number => rate !== null)
    .map((rate) => cappedAchievement(rate, config));
  const average = mean(rates);
  return average === null ? null : Math.min(100, average * 100);
}

export function healthBand(score: number): HealthBand {
  if (score >= 80) {
    return "Excellent";
  }
  if (score >= 60) {
    return "Good";
  }
  if (score >= 40) {
    return "Fair";
  }
  return "Needs Attention";
}

export function computeProjectHealth(
  project: Project,
  records: ProjectRecords,
  config: AnalyticsConfig
): ProjectHealth {
  assertValidWeights(config.weights);
  const measured: DimensionScores = {
    status: config.statusScores[project.status],
    risk: scoreRiskDimension(records.risks),
    budget: scoreBudgetDimension(records.budgets, config),
    kpi: scoreKpiDimension(records.kpis, config)
  };
  const noData = HEALTH_DIMENSIONS.filter((dimension) => measured[dimension] === null);
  const dimensions = applyNoDataPolicy(measured, config);

  let weighted = 0;
  let totalWeight = 0;
  for (const dimension of HEALTH_DIMENSIONS) {
    const value = dimensions[dimension];
    if (value === null) {
      continue;
    }
    weighted += config.weights[dimension] * value;
    totalWeight += config.weights[dimension];
  }
  // only the exclude policy leaves weights that do not add up to 1
  const raw = config.noDataPolicy === "exclude" && totalWeight > 0 ? weighted / totalWeight : weighted;
  const score = clamp(Math.round(raw), 0, 100);

  return {
    status: "ok",
    projectId: project.id,
    projectName: project.name,
    score,
    band: healthBand(score),
    dimensions: roundDimensions(dimensions),
    noData
  };
}

/**
 * Per-project scores and their mean. An empty portfolio, or one where no
 * project could be scored, is reported as insufficient data.
 */
export function computePortfolioHealth(snapshot: PortfolioSnapshot, config: AnalyticsConfig): PortfolioHealth {
  assertValidWeights(config.weights);
  const kpisByProject = groupByProject(snapshot.kpis);
  const budgetsByProject = groupByProject(snapshot.budgets);
  const risksByProject = groupByProject(snapshot.risks);
  const projects: Array<ProjectHealth | ItemError> = mapProjects(snapshot.projects, "PortfolioHealth", (project) =>
    computeProjectHealth(
      project,
      {
        kpis: kpisByProject.get(project.id) ?? [],
        budgets: budgetsByProject.get(project.id) ?? [],
        risks: risksByProject.get(project.id) ?? []
      },
      config
    )
  );

  if (!snapshot.projects.length) {
    return { status: "insufficient_data", reason: "No projects in the portfolio.", projects };
  }
  const scored = projects.filter((item): item is ProjectHealth => item.status === "ok");
  const score = mean(scored.map((item) => item.score));
  if (score === null) {
    return { status: "insufficient_data", reason: "No project could be scored.", projects };
  }

  const dimensions = averageDimensions(scored);
  const rounded = roundTo(score, 1);
  return {
    status: "ok",
    score: rounded,
    band: healthBand(rounded),
    dimensions,
    details: describeDimensions(dimensions),
    projects
  };
}

function applyNoDataPolicy(measured: DimensionScores, config: AnalyticsConfig): DimensionScores {
  const fallback = config.noDataPolicy === "neutral" ? 100 : config.noDataPolicy === "penalize" ? 0 : null;
  return {
    status: measured.status ?? fallback,
    risk: measured.risk ?? fallback,
    budget: measured.budget ?? fallback,
    kpi: measured.kpi ?? fallback
  };
}

function roundDimensions(dimensions: DimensionScores): DimensionScores {
  const round = (value: number | null) => (value === null ? null : roundTo(value, 1));
  return {
    status: round(dimensions.status),
    risk: round(dimensions.risk),
    budget: round(dimensions.budget),
    kpi: round(dimensions.kpi)
  };
}

function averageDimensions(projects: readonly ProjectHealth[]): DimensionScores {
  const average = (dimension: HealthDimension) => {
    const values = projects
      .map((project) => project.dimensions[dimension])
      .filter((value): value is number => value !== null);
    const result = mean(values);
    return result === null ? null : roundTo(result, 1);
  };
  return {
    status: average("status"),
    risk: average("risk"),
    budget: average("budget"),
    kpi: average("kpi")
  };
}

const DIMENSION_DETAILS: Record<HealthDimension, [string, string, string]> = {
  status: [
    "Strong project pipeline with active production systems",
    "Healthy mix of projects across lifecycle stages",
    "Portfolio needs attention - many projects in early or retired stages"
  ],
  risk: ["Risk profile is well managed", "Some risks require attention", "Significant risks need immediate mitigation"],
  budget: [
    "Budget is on track or under planned spending",
    "Minor budget overruns detected",
    "Significant budget overruns require corrective action"
  ],
  kpi: ["KPIs are largely on target", "Some KPIs are below target", "Multiple KPIs significantly below target"]
};

function describeDimensions(dimensions: DimensionScores): Record<HealthDimension, string> {
  const describe = (dimension: HealthDimension) => {
    const value = dimensions[dimension];
    if (value === null) {
      return "No data recorded";
    }
    const [strong, fair, weak] = DIMENSION_DETAILS[dimension];
    return value >= 80 ? strong : value >= 60 ? fair : weak;
  };
  return {
    status: describe("status"),
    risk: describe("risk"),
    budget: describe("budget"),
    kpi: describe("kpi")
  };
}
