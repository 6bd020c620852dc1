import {
  AnalyticsConfig,
  AnalyticsConfigOverrides,
  createAnalyticsConfig,
  loadAnalyticsConfig
} from "../config/analyticsConfig";
import { filePortfolioStore } from "../data/repositories";
import {
  BudgetGrouping,
  PortfolioSnapshot,
  PortfolioStore,
  ReportDocument,
  ReportKind,
  SnapshotFilter
} from "../models/_types";
import { todayISODate } from "../utils/date";
import { analyzeBudgetVariance, findOverBudgetProjects } from "./budgetVariance.service";
import { computePortfolioHealth } from "./health.service";
import { ReportOptions, buildReport } from "./report.service";
import { PortfolioRoiOptions, computePortfolioRoi } from "./roi.service";
import { buildRiskMatrix } from "./riskMatrix.service";
import { analyzeKpiTrends, findTopPerformers, findUnderperformingKpis, summarizeTrends } from "./trend.service";

export type AnalyticsRequest = {
  filter?: SnapshotFilter;
  /** Per-request config overrides, validated against the loaded config. */
  overrides?: AnalyticsConfigOverrides;
};

let cachedConfig: AnalyticsConfig | null = null;

export function getAnalyticsConfig(): AnalyticsConfig {
  if (!cachedConfig) {
    cachedConfig = loadAnalyticsConfig();
  }
  return cachedConfig;
}

async function prepare(
  request: AnalyticsRequest,
  store: PortfolioStore
): Promise<{ snapshot: PortfolioSnapshot; config: AnalyticsConfig }> {
  const base = getAnalyticsConfig();
  const config = request.overrides ? createAnalyticsConfig(request.overrides, base) : base;
  const snapshot = await store.readSnapshot(request.filter);
  return { snapshot, config };
}

export async function getRoiAnalytics(
  request: AnalyticsRequest,
  options: PortfolioRoiOptions = {},
  store: PortfolioStore = filePortfolioStore
) {
  const { snapshot, config } = await prepare(request, store);
  return computePortfolioRoi(snapshot, config, options);
}

export async function getHealthAnalytics(request: AnalyticsRequest, store: PortfolioStore = filePortfolioStore) {
  const { snapshot, config } = await prepare(request, store);
  return computePortfolioHealth(snapshot, config);
}

export async function getTrendAnalytics(
  request: AnalyticsRequest,
  limit?: number,
  store: PortfolioStore = filePortfolioStore
) {
  const { snapshot, config } = await prepare(request, store);
  const trends = analyzeKpiTrends(snapshot.kpis, config);
  return {
    trends,
    summary: summarizeTrends(trends),
    underperforming: findUnderperformingKpis(snapshot.kpis, config),
    topPerformers: findTopPerformers(snapshot.kpis, config, limit)
  };
}

export async function getBudgetVarianceAnalytics(
  request: AnalyticsRequest,
  groupBy: BudgetGrouping = "project",
  store: PortfolioStore = filePortfolioStore
) {
  const { snapshot, config } = await prepare(request, store);
  return {
    variance: analyzeBudgetVariance(snapshot.budgets, groupBy),
    overBudget: findOverBudgetProjects(snapshot.budgets, config.overBudgetAlertThreshold)
  };
}

export async function getRiskMatrixAnalytics(request: AnalyticsRequest, store: PortfolioStore = filePortfolioStore) {
  const { snapshot } = await prepare(request, store);
  return buildRiskMatrix(snapshot.risks);
}

export async function generateReport(
  kind: ReportKind,
  request: AnalyticsRequest,
  options: Partial<ReportOptions> = {},
  store: PortfolioStore = filePortfolioStore
): Promise<ReportDocument> {
  const { snapshot, config } = await prepare(request, store);
  return buildReport(kind, snapshot, config, { ...options, asOf: options.asOf ?? todayISODate() });
}
