export type ProjectStatus = "PLANNING" | "DEVELOPMENT" | "TESTING" | "PRODUCTION" | "RETIRED";
export type ProjectPriority = "CRITICAL" | "HIGH" | "MEDIUM" | "LOW";
export type BudgetCategory = "COMPUTE" | "API_CALLS" | "PERSONNEL" | "INFRASTRUCTURE" | "OTHER";
export type RiskStatus = "OPEN" | "MITIGATING" | "RESOLVED";
export type RiskLevel = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";

export const PROJECT_STATUSES = ["PLANNING", "DEVELOPMENT", "TESTING", "PRODUCTION", "RETIRED"] as const;
export const PROJECT_PRIORITIES = ["CRITICAL", "HIGH", "MEDIUM", "LOW"] as const;
export const BUDGET_CATEGORIES = ["COMPUTE", "API_CALLS", "PERSONNEL", "INFRASTRUCTURE", "OTHER"] as const;
export const RISK_STATUSES = ["OPEN", "MITIGATING", "RESOLVED"] as const;

export interface BaseEntity {
  readonly id: string;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface Project extends BaseEntity {
  readonly name: string;
  readonly description: string;
  readonly status: ProjectStatus;
  readonly priority: ProjectPriority;
  readonly owner: string;
  readonly department: string;
  readonly modelUsed: string;
  readonly useCase: string;
  readonly startDate: string;
  readonly targetDate?: string;
  readonly completionDate?: string;
}

export interface KpiEntry extends BaseEntity {
  readonly projectId: string;
  readonly metricName: string;
  readonly targetValue: number;
  readonly actualValue: number;
  readonly unit: string;
  readonly recordedDate: string;
}

export interface BudgetEntry extends BaseEntity {
  readonly projectId: string;
  readonly category: BudgetCategory;
  readonly plannedAmount: number;
  readonly actualAmount: number;
  readonly currency: string;
  /** Calendar month the entry belongs to, `YYYY-MM`. */
  readonly period: string;
}

export interface RiskEntry extends BaseEntity {
  readonly projectId: string;
  readonly description: string;
  readonly probability: number;
  readonly impact: number;
  readonly mitigation: string;
  readonly status: RiskStatus;
}

export interface DatabaseSchema {
  projects: Project[];
  kpis: KpiEntry[];
  budgets: BudgetEntry[];
  risks: RiskEntry[];
}

export function createEmptyDatabaseState(): DatabaseSchema {
  return {
    projects: [],
    kpis: [],
    budgets: [],
    risks: []
  };
}

/**
 * One consistent read of every record kind. Analytics computations take a
 * snapshot and never go back to the store.
 */
export interface PortfolioSnapshot {
  readonly projects: readonly Project[];
  readonly kpis: readonly KpiEntry[];
  readonly budgets: readonly BudgetEntry[];
  readonly risks: readonly RiskEntry[];
}

export type SnapshotFilter = {
  projectId?: string;
  department?: string;
  status?: ProjectStatus;
  /** Inclusive ISO date; KPIs by `recordedDate`, budgets by `period` month. */
  from?: string;
  to?: string;
};

export type ProjectFilter = Pick<SnapshotFilter, "department" | "status">;

export interface PortfolioStore {
  getAllProjects(filter?: ProjectFilter): Promise<Project[]>;
  getAllKpis(projectId?: string): Promise<KpiEntry[]>;
  getAllBudgets(projectId?: string): Promise<BudgetEntry[]>;
  getAllRisks(projectId?: string): Promise<RiskEntry[]>;
  readSnapshot(filter?: SnapshotFilter): Promise<PortfolioSnapshot>;
}

// Analytics outcomes

export type UndefinedOutcome = {
  status: "undefined";
  reason: string;
};

export type InsufficientDataOutcome = {
  status: "insufficient_data";
  reason: string;
};

export type ItemError = {
  status: "error";
  projectId: string;
  projectName: string;
  message: string;
};

export type RoiMethod = "monthly-estimate" | "monetary" | "achievement-proxy";

export type RoiValue = {
  status: "ok";
  projectId: string;
  projectName: string;
  /** Signed ratio, `(value - cost) / cost`. */
  roi: number;
  roiPercentage: number;
  valueGenerated: number;
  totalActualCost: number;
  method: RoiMethod;
  paybackMonths: number | null;
};

export type RoiResult =
  | RoiValue
  | (UndefinedOutcome & {
      projectId: string;
      projectName: string;
      valueGenerated: number;
      totalActualCost: number;
    });

export type HealthDimension = "status" | "risk" | "budget" | "kpi";

export type HealthBand = "Excellent" | "Good" | "Fair" | "Needs Attention";

/** Null only when the dimension had no data and the policy excludes it. */
export type DimensionScores = Record<HealthDimension, number | null>;

export type ProjectHealth = {
  status: "ok";
  projectId: string;
  projectName: string;
  score: number;
  band: HealthBand;
  dimensions: DimensionScores;
  /** Dimensions that had no data and were scored by the no-data policy. */
  noData: HealthDimension[];
};

export type PortfolioHealth =
  | {
      status: "ok";
      score: number;
      band: HealthBand;
      dimensions: DimensionScores;
      details: Record<HealthDimension, string>;
      projects: Array<ProjectHealth | ItemError>;
    }
  | (InsufficientDataOutcome & { projects: Array<ProjectHealth | ItemError> });

export type TrendDirection = "IMPROVING" | "DECLINING" | "STABLE" | "INSUFFICIENT_DATA";

export type TrendResult = {
  direction: TrendDirection;
  points: number;
  first: number | null;
  last: number | null;
  delta: number | null;
  /** `delta / |first|`; null when there is no first value or it is zero. */
  relativeChange: number | null;
  /** Least-squares slope per step of the series. */
  slope: number | null;
};

export type KpiTrend = TrendResult & {
  projectId: string;
  metricName: string;
  unit: string;
  higherIsBetter: boolean;
};

export type BudgetGrouping = "none" | "project" | "category" | "project-category";

export type BudgetStatus = "OVER" | "UNDER" | "ON_TRACK";

export type VarianceFigures = {
  planned: number;
  actual: number;
  variance: number;
  /** Null when nothing was planned. */
  variancePercentage: number | null;
  overBudget: boolean;
  status: BudgetStatus;
  entryCount: number;
  currencies: string[];
};

export type VarianceGroup = VarianceFigures & {
  key: string;
  projectId?: string;
  category?: BudgetCategory;
};

export type BudgetVarianceResult = {
  groupBy: BudgetGrouping;
  groups: VarianceGroup[];
  totals: VarianceFigures;
};

export type ScoredRisk = {
  risk: RiskEntry;
  score: number;
  normalizedScore: number;
  level: RiskLevel;
};

export type RiskMatrix = {
  /** Rows are probability 5..1, columns impact 1..5; counts of active risks. */
  cells: number[][];
  statusCounts: Record<RiskStatus, number>;
  register: ScoredRisk[];
  criticalOpen: ScoredRisk[];
};

// Report document model

export type ReportKind = "portfolio-overview" | "budget-variance" | "risk-register" | "executive-summary";

export const REPORT_KINDS = ["portfolio-overview", "budget-variance", "risk-register", "executive-summary"] as const;

export type ReportCell = string | number | null;

export type ReportBlock =
  | { type: "paragraph"; text: string }
  | { type: "bullets"; items: string[] }
  | { type: "table"; columns: string[]; rows: ReportCell[][] }
  | { type: "note"; text: string };

export type ReportSection = {
  heading: string;
  blocks: ReportBlock[];
};

export type ReportDocument = {
  kind: ReportKind;
  title: string;
  subtitle: string[];
  sections: ReportSection[];
  footer?: string;
};
