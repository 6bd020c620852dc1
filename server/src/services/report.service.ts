import { AnalyticsConfig } from "../config/analyticsConfig";
import {
  HealthDimension,
  ItemError,
  KpiTrend,
  PortfolioHealth,
  PortfolioSnapshot,
  Project,
  ProjectHealth,
  PROJECT_PRIORITIES,
  PROJECT_STATUSES,
  ReportBlock,
  ReportCell,
  ReportDocument,
  ReportKind,
  ReportSection,
  RiskMatrix,
  RoiResult,
  VarianceFigures
} from "../models/_types";
import { formatReportPeriod, isISODate } from "../utils/date";
import {
  formatAmount,
  formatSignedAmount,
  formatSignedPercent,
  pluralize,
  titleCase,
  truncate
} from "../utils/format";
import { DomainError } from "../utils/errors";
import { compareKeys, roundTo } from "../utils/math";
import { analyzeBudgetVariance, findOverBudgetProjects } from "./budgetVariance.service";
import { HEALTH_DIMENSIONS, computePortfolioHealth } from "./health.service";
import { computePortfolioRoi } from "./roi.service";
import { buildRiskMatrix } from "./riskMatrix.service";
import { RatedKpi, analyzeKpiTrends, findUnderperformingKpis, summarizeTrends } from "./trend.service";

export type ReportOptions = {
  /** ISO date the report is produced for. */
  asOf: string;
  /** Portfolio health score of the previous period. */
  previousHealthScore?: number;
  monthlyReturnEstimates?: Record<string, number>;
};

type ReportContext = {
  snapshot: PortfolioSnapshot;
  config: AnalyticsConfig;
  options: ReportOptions;
  asOf: string;
  projectNames: Map<string, string>;
};

const ACTIVE_STATUSES = new Set(["DEVELOPMENT", "TESTING", "PRODUCTION"]);
const DIMENSION_ALERT_THRESHOLD = 70;
const PLANNING_SHARE_ALERT = 0.4;

const DIMENSION_LABELS: Record<HealthDimension, string> = {
  status: "Status Distribution",
  risk: "Risk Profile",
  budget: "Budget Adherence",
  kpi: "KPI Achievement"
};

const STATUS_TAGS: Record<Project["status"], string> = {
  PLANNING: "[PLAN]",
  DEVELOPMENT: "[DEV]",
  TESTING: "[TEST]",
  PRODUCTION: "[PROD]",
  RETIRED: "[RET]"
};

const REPORT_BUILDERS: Record<ReportKind, (context: ReportContext) => ReportDocument> = {
  "portfolio-overview": buildPortfolioOverview,
  "budget-variance": buildBudgetVarianceReport,
  "risk-register": buildRiskRegisterReport,
  "executive-summary": buildExecutiveSummary
};

/**
 * Assembles one report document from a snapshot. The same snapshot, config and
 * options always produce the same document.
 */
export function buildReport(
  kind: ReportKind,
  snapshot: PortfolioSnapshot,
  config: AnalyticsConfig,
  options: ReportOptions
): ReportDocument {
  if (!isISODate(options.asOf)) {
    throw new DomainError("INVALID_INPUT", "asOf must be an ISO date (YYYY-MM-DD).");
  }
  return REPORT_BUILDERS[kind]({
    snapshot,
    config,
    options,
    asOf: options.asOf,
    projectNames: new Map(snapshot.projects.map((project): [string, string] => [project.id, project.name]))
  });
}

// Portfolio overview

function buildPortfolioOverview(context: ReportContext): ReportDocument {
  const { snapshot, config } = context;
  const health = computePortfolioHealth(snapshot, config);
  const roi = computePortfolioRoi(snapshot, config, {
    asOf: context.asOf,
    monthlyReturnEstimates: context.options.monthlyReturnEstimates
  });
  const scores = new Map(
    health.projects
      .filter((item): item is ProjectHealth => item.status === "ok")
      .map((item): [string, number] => [item.projectId, item.score])
  );
  const totals = analyzeBudgetVariance(snapshot.budgets).totals;

  return {
    kind: "portfolio-overview",
    title: "AI Portfolio Overview Report",
    subtitle: reportSubtitle(context),
    sections: [
      healthSection(health),
      {
        heading: "Projects",
        blocks: snapshot.projects.length
          ? [
              {
                type: "table",
                columns: ["Project", "Status", "Priority", "Owner", "Department", "Health"],
                rows: sortByPriority(snapshot.projects).map((project) => [
                  project.name,
                  `${STATUS_TAGS[project.status]} ${titleCase(project.status)}`,
                  titleCase(project.priority),
                  project.owner,
                  project.department,
                  scores.get(project.id) ?? null
                ])
              }
            ]
          : [{ type: "note", text: "No projects recorded." }]
      },
      roiSection(roi),
      {
        heading: "Quick Stats",
        blocks: [
          {
            type: "bullets",
            items: [
              `Total Projects: ${snapshot.projects.length}`,
              `Active Projects: ${countActive(snapshot.projects)}`,
              `Total Budget: ${formatAmount(totals.planned)} planned / ${formatAmount(totals.actual)} actual`,
              `Open Risks: ${snapshot.risks.filter((risk) => risk.status !== "RESOLVED").length}`,
              `KPIs Tracked: ${snapshot.kpis.length}`
            ]
          }
        ]
      }
    ]
  };
}

function healthSection(health: PortfolioHealth): ReportSection {
  if (health.status === "insufficient_data") {
    return {
      heading: "Health Score",
      blocks: [{ type: "note", text: `Insufficient data: ${health.reason}` }, ...errorNotes(health.projects)]
    };
  }
  return {
    heading: "Health Score",
    blocks: [
      { type: "paragraph", text: `Portfolio health score: ${health.score}/100 (${health.band}).` },
      {
        type: "table",
        columns: ["Component", "Score", "Assessment"],
        rows: HEALTH_DIMENSIONS.map((dimension) => [
          DIMENSION_LABELS[dimension],
          health.dimensions[dimension],
          health.details[dimension]
        ])
      },
      ...errorNotes(health.projects)
    ]
  };
}

function roiSection(results: Array<RoiResult | ItemError>): ReportSection {
  if (!results.length) {
    return { heading: "Return on Investment", blocks: [{ type: "note", text: "No projects recorded." }] };
  }
  const rows: ReportCell[][] = [];
  const notes: ReportBlock[] = [];
  for (const result of results) {
    if (result.status === "error") {
      continue;
    }
    if (result.status === "undefined") {
      rows.push([result.projectName, null, formatAmount(result.valueGenerated), formatAmount(result.totalActualCost), null, null]);
      notes.push({
        type: "note",
        text: `ROI undefined for ${result.projectName}: ${
          result.reason === "NO_BUDGET_DATA" ? "no budget data recorded" : "no actual spend recorded"
        }.`
      });
      continue;
    }
    rows.push([
      result.projectName,
      titleCase(result.method.replace("-", "_")),
      formatAmount(result.valueGenerated),
      formatAmount(result.totalActualCost),
      formatSignedPercent(result.roiPercentage),
      result.paybackMonths
    ]);
  }
  return {
    heading: "Return on Investment",
    blocks: [
      {
        type: "table",
        columns: ["Project", "Method", "Value", "Cost", "ROI", "Payback (months)"],
        rows
      },
      ...notes,
      ...errorNotes(results)
    ]
  };
}

// Budget variance

function buildBudgetVarianceReport(context: ReportContext): ReportDocument {
  const { snapshot, config, projectNames } = context;
  const report: ReportDocument = {
    kind: "budget-variance",
    title: "Budget Variance Report",
    subtitle: reportSubtitle(context),
    sections: []
  };
  if (!snapshot.budgets.length) {
    report.sections.push({ heading: "Overall Summary", blocks: [{ type: "note", text: "No budget data recorded." }] });
    return report;
  }

  const byProject = analyzeBudgetVariance(snapshot.budgets, "project");
  const byCategory = analyzeBudgetVariance(snapshot.budgets, "category");
  const overBudget = findOverBudgetProjects(snapshot.budgets, config.overBudgetAlertThreshold);
  const thresholdLabel = `${roundTo(config.overBudgetAlertThreshold * 100, 1)}%`;

  report.sections.push(
    {
      heading: "Overall Summary",
      blocks: [
        {
          type: "table",
          columns: ["Metric", "Amount"],
          rows: [
            ["Total Planned", formatAmount(byProject.totals.planned)],
            ["Total Actual", formatAmount(byProject.totals.actual)],
            ["Variance", formatSignedAmount(byProject.totals.variance)],
            ["Variance %", formatSignedPercent(byProject.totals.variancePercentage)],
            ["Currencies", byProject.totals.currencies.join(", ")]
          ]
        },
        ...plannedZeroNote(byProject.totals, "the portfolio")
      ]
    },
    {
      heading: "By Project",
      blocks: [
        {
          type: "table",
          columns: ["Project", "Planned", "Actual", "Variance", "Variance %", "Status"],
          rows: byProject.groups.map((group) => [
            projectNames.get(group.key) ?? group.key,
            ...varianceCells(group),
            titleCase(group.status)
          ])
        }
      ]
    },
    {
      heading: "By Category",
      blocks: [
        {
          type: "table",
          columns: ["Category", "Planned", "Actual", "Variance", "Variance %"],
          rows: byCategory.groups.map((group) => [titleCase(group.key), ...varianceCells(group)])
        }
      ]
    },
    {
      heading: "Over Budget Projects",
      blocks: overBudget.length
        ? [
            {
              type: "bullets",
              items: overBudget.map(
                (group) =>
                  `${projectNames.get(group.key) ?? group.key}: ${formatSignedPercent(group.variancePercentage)} (${formatSignedAmount(group.variance)})`
              )
            }
          ]
        : [{ type: "paragraph", text: `No project exceeds the ${thresholdLabel} overrun threshold.` }]
    }
  );
  return report;
}

function varianceCells(figures: VarianceFigures): ReportCell[] {
  return [
    formatAmount(figures.planned),
    formatAmount(figures.actual),
    formatSignedAmount(figures.variance),
    formatSignedPercent(figures.variancePercentage)
  ];
}

function plannedZeroNote(figures: VarianceFigures, subject: string): ReportBlock[] {
  return figures.variancePercentage === null
    ? [{ type: "note", text: `Variance percentage is undefined for ${subject}: nothing was planned.` }]
    : [];
}

// Risk register

function buildRiskRegisterReport(context: ReportContext): ReportDocument {
  const { snapshot, projectNames } = context;
  const matrix = buildRiskMatrix(snapshot.risks);
  const report: ReportDocument = {
    kind: "risk-register",
    title: "Risk Register Report",
    subtitle: reportSubtitle(context),
    sections: [riskSummarySection(matrix)]
  };
  if (!snapshot.risks.length) {
    return report;
  }

  report.sections.push(
    {
      heading: "Risk Matrix (Probability x Impact)",
      blocks: [
        {
          type: "table",
          columns: ["", "Impact 1", "Impact 2", "Impact 3", "Impact 4", "Impact 5"],
          rows: matrix.cells.map((row, index) => [`P${5 - index}`, ...row.map((count) => (count > 0 ? count : null))])
        }
      ]
    },
    {
      heading: "Risk Details",
      blocks: [
        {
          type: "table",
          columns: ["Project", "Risk", "P", "I", "Score", "Level", "Status", "Mitigation"],
          rows: matrix.register.map(({ risk, score, level }) => [
            projectNames.get(risk.projectId) ?? risk.projectId,
            truncate(risk.description, 40),
            risk.probability,
            risk.impact,
            score,
            titleCase(level),
            titleCase(risk.status),
            truncate(risk.mitigation, 50)
          ])
        }
      ]
    }
  );
  return report;
}

function riskSummarySection(matrix: RiskMatrix): ReportSection {
  const total = matrix.statusCounts.OPEN + matrix.statusCounts.MITIGATING + matrix.statusCounts.RESOLVED;
  if (!total) {
    return { heading: "Summary", blocks: [{ type: "note", text: "No risks recorded." }] };
  }
  return {
    heading: "Summary",
    blocks: [
      {
        type: "bullets",
        items: [
          `Total Risks: ${total}`,
          `Open: ${matrix.statusCounts.OPEN}`,
          `Mitigating: ${matrix.statusCounts.MITIGATING}`,
          `Resolved: ${matrix.statusCounts.RESOLVED}`,
          `Critical Open: ${matrix.criticalOpen.length}`
        ]
      }
    ]
  };
}

// Executive summary

function buildExecutiveSummary(context: ReportContext): ReportDocument {
  const { snapshot, config } = context;
  const health = computePortfolioHealth(snapshot, config);
  const trends = analyzeKpiTrends(snapshot.kpis, config);
  const underperforming = findUnderperformingKpis(snapshot.kpis, config);
  const matrix = buildRiskMatrix(snapshot.risks);

  return {
    kind: "executive-summary",
    title: "Executive Summary - AI Portfolio",
    subtitle: reportSubtitle(context),
    sections: [
      overviewSection(snapshot.projects, health),
      statusSection(snapshot.projects),
      budgetSummarySection(snapshot),
      kpiSection(context, trends, underperforming),
      riskProfileSection(matrix),
      {
        heading: "Recommendations",
        blocks: [{ type: "bullets", items: recommendations(context, health, trends, underperforming, matrix) }]
      }
    ],
    footer: "Generated by the AI portfolio analytics engine from the current record snapshot."
  };
}

function overviewSection(projects: readonly Project[], health: PortfolioHealth): ReportSection {
  const intro = `The AI portfolio consists of ${pluralize(projects.length, "project")} (${countActive(projects)} active in development, testing or production).`;
  if (health.status === "insufficient_data") {
    return {
      heading: "Portfolio Overview",
      blocks: [
        { type: "paragraph", text: intro },
        { type: "note", text: `Portfolio health score unavailable: ${health.reason}` }
      ]
    };
  }
  return {
    heading: "Portfolio Overview",
    blocks: [
      {
        type: "paragraph",
        text: `${intro} The overall portfolio health score is ${health.score}/100 (${health.band}).`
      },
      ...errorNotes(health.projects)
    ]
  };
}

function statusSection(projects: readonly Project[]): ReportSection {
  const items = PROJECT_STATUSES.map((status) => ({
    status,
    count: projects.filter((project) => project.status === status).length
  }))
    .filter(({ count }) => count > 0)
    .map(({ status, count }) => `${titleCase(status)}: ${pluralize(count, "project")}`);
  const critical = projects.filter((project) => project.priority === "CRITICAL").map((project) => project.name);

  const blocks: ReportBlock[] = items.length
    ? [{ type: "bullets", items }]
    : [{ type: "note", text: "No projects recorded." }];
  if (critical.length) {
    blocks.push({ type: "paragraph", text: `Critical priority projects: ${critical.join(", ")}.` });
  }
  return { heading: "Project Status Distribution", blocks };
}

function budgetSummarySection(snapshot: PortfolioSnapshot): ReportSection {
  if (!snapshot.budgets.length) {
    return { heading: "Budget Summary", blocks: [{ type: "note", text: "No budget data recorded." }] };
  }
  const { totals } = analyzeBudgetVariance(snapshot.budgets);
  const direction = totals.variance > 0 ? "over budget" : "under budget";
  const varianceLine =
    totals.variancePercentage === null
      ? `Variance: ${formatSignedAmount(totals.variance)}`
      : `Variance: ${formatAmount(Math.abs(totals.variance))} (${Math.abs(totals.variancePercentage).toFixed(1)}% ${direction})`;
  return {
    heading: "Budget Summary",
    blocks: [
      {
        type: "bullets",
        items: [`Total Planned: ${formatAmount(totals.planned)}`, `Total Actual: ${formatAmount(totals.actual)}`, varianceLine]
      },
      ...plannedZeroNote(totals, "the portfolio")
    ]
  };
}

function kpiSection(context: ReportContext, trends: readonly KpiTrend[], underperforming: readonly RatedKpi[]): ReportSection {
  const { snapshot } = context;
  if (!snapshot.kpis.length) {
    return { heading: "KPI Performance", blocks: [{ type: "note", text: "No KPI data recorded." }] };
  }
  const counts = summarizeTrends(trends);
  const blocks: ReportBlock[] = [
    {
      type: "bullets",
      items: [
        `KPI series tracked: ${trends.length}`,
        `Trends: ${counts.IMPROVING} improving, ${counts.STABLE} stable, ${counts.DECLINING} declining`
      ]
    }
  ];
  if (underperforming.length) {
    blocks.push({
      type: "paragraph",
      text: `Attention needed: ${pluralize(underperforming.length, "KPI")} below ${thresholdPercent(context.config.underperformingThreshold)} of target.`
    });
  }
  if (counts.INSUFFICIENT_DATA) {
    blocks.push({
      type: "note",
      text: `${pluralize(counts.INSUFFICIENT_DATA, "KPI series", "KPI series")} with fewer than two data points; trend direction is not assessed.`
    });
  }
  return { heading: "KPI Performance", blocks };
}

function riskProfileSection(matrix: RiskMatrix): ReportSection {
  const { OPEN, MITIGATING, RESOLVED } = matrix.statusCounts;
  if (!OPEN && !MITIGATING && !RESOLVED) {
    return { heading: "Risk Profile", blocks: [{ type: "note", text: "No risks recorded." }] };
  }
  const blocks: ReportBlock[] = [
    { type: "bullets", items: [`Open risks: ${OPEN}`, `Being mitigated: ${MITIGATING}`, `Resolved: ${RESOLVED}`] }
  ];
  if (matrix.criticalOpen.length) {
    blocks.push({
      type: "paragraph",
      text: `Critical risks (${matrix.criticalOpen.length}) require immediate attention.`
    });
  }
  return { heading: "Risk Profile", blocks };
}

function recommendations(
  context: ReportContext,
  health: PortfolioHealth,
  trends: readonly KpiTrend[],
  underperforming: readonly RatedKpi[],
  matrix: RiskMatrix
): string[] {
  const { snapshot, config, options, projectNames } = context;
  const items: string[] = [];

  const overBudget = findOverBudgetProjects(snapshot.budgets, config.overBudgetAlertThreshold);
  if (overBudget.length) {
    const names = overBudget.map((group) => projectNames.get(group.key) ?? group.key);
    items.push(
      `Budget Overrun: ${pluralize(overBudget.length, "project")} over budget by more than ${thresholdPercent(config.overBudgetAlertThreshold)}: ${names.join(", ")}.`
    );
  }

  if (health.status === "ok") {
    if (options.previousHealthScore !== undefined && health.score < options.previousHealthScore) {
      items.push(
        `Health Decline: Portfolio health declined from ${options.previousHealthScore} to ${health.score} vs. last period: investigate ${weakestDimension(health)}.`
      );
    }
    if (health.dimensions.budget !== null && health.dimensions.budget < DIMENSION_ALERT_THRESHOLD) {
      items.push(
        "Budget Review: Conduct an immediate review of projects exceeding planned budgets and implement cost controls."
      );
    }
    if (health.dimensions.risk !== null && health.dimensions.risk < DIMENSION_ALERT_THRESHOLD) {
      items.push("Risk Mitigation: Prioritize mitigation plans for high-impact risks in the active portfolio.");
    }
  }

  if (underperforming.length) {
    const metrics = underperforming.map(
      ({ entry }) => `${entry.metricName} (${projectNames.get(entry.projectId) ?? entry.projectId})`
    );
    items.push(
      `KPI Improvement: ${pluralize(underperforming.length, "KPI")} significantly below target: ${metrics.join(", ")}. Consider resource reallocation or scope adjustment.`
    );
  }

  const declining = trends.filter((trend) => trend.direction === "DECLINING");
  if (declining.length) {
    const metrics = declining.map(
      (trend) => `${trend.metricName} (${projectNames.get(trend.projectId) ?? trend.projectId})`
    );
    items.push(`Declining Trends: ${pluralize(declining.length, "KPI")} trending down: ${metrics.join(", ")}.`);
  }

  if (matrix.criticalOpen.length) {
    items.push(`Critical Risks: Assign mitigation owners to ${pluralize(matrix.criticalOpen.length, "open critical risk")}.`);
  }

  const planning = snapshot.projects.filter((project) => project.status === "PLANNING").length;
  if (snapshot.projects.length && planning > snapshot.projects.length * PLANNING_SHARE_ALERT) {
    items.push(
      "Pipeline Acceleration: A large portion of the portfolio is still in planning. Consider accelerating development timelines."
    );
  }

  if (health.status === "insufficient_data") {
    items.push(`Insufficient Data: ${health.reason} Record project data before relying on the health score.`);
  }
  const thinSeries = trends.filter((trend) => trend.direction === "INSUFFICIENT_DATA").length;
  if (thinSeries) {
    items.push(
      `Insufficient Data: ${pluralize(thinSeries, "KPI series", "KPI series")} with a single data point; record more history to assess trends.`
    );
  }

  if (!items.length) {
    items.push("Portfolio is performing well. Continue current trajectory.");
  }
  return items;
}

/** Lowest-scoring health dimension, first in dimension order on ties. */
function weakestDimension(health: Extract<PortfolioHealth, { status: "ok" }>): string {
  let weakest: { dimension: HealthDimension; score: number } | null = null;
  for (const dimension of HEALTH_DIMENSIONS) {
    const score = health.dimensions[dimension];
    if (score !== null && (weakest === null || score < weakest.score)) {
      weakest = { dimension, score };
    }
  }
  return weakest ? `${DIMENSION_LABELS[weakest.dimension]} (${weakest.score})` : "the project records";
}

// Shared pieces

function reportSubtitle(context: ReportContext): string[] {
  return [`Report period: ${formatReportPeriod(context.asOf)}`, `Projects in scope: ${context.snapshot.projects.length}`];
}

function errorNotes(items: ReadonlyArray<{ status: string } | ItemError>): ReportBlock[] {
  return items
    .filter((item): item is ItemError => item.status === "error")
    .map((item): ReportBlock => ({ type: "note", text: `${item.projectName} could not be evaluated: ${item.message}` }));
}

function countActive(projects: readonly Project[]): number {
  return projects.filter((project) => ACTIVE_STATUSES.has(project.status)).length;
}

function sortByPriority(projects: readonly Project[]): Project[] {
  return [...projects].sort(
    (a, b) =>
      PROJECT_PRIORITIES.indexOf(a.priority) - PROJECT_PRIORITIES.indexOf(b.priority) ||
      compareKeys(a.name, b.name) ||
      compareKeys(a.id, b.id)
  );
}

function thresholdPercent(ratio: number): string {
  return `${roundTo(ratio * 100, 1)}%`;
}
