import { readFileSync } from "node:fs";
import { z } from "zod";
import { InvalidConfigError, formatIssues } from "../middleware/httpError";
import { HealthDimension, ProjectStatus } from "../models/_types";
import { resolveFromRoot } from "./env";

export type NoDataPolicy = "neutral" | "penalize" | "exclude";
export type MetricDirection = "higher" | "lower";
export type HealthWeights = Record<HealthDimension, number>;

export type AnalyticsConfig = {
  readonly weights: Readonly<HealthWeights>;
  /** How a health dimension with no records is scored. */
  readonly noDataPolicy: NoDataPolicy;
  /** Relative change within which a KPI trend is stable. */
  readonly trendTolerance: number;
  /** Budget variance ratio at which the budget dimension reaches 0. */
  readonly budgetSaturation: number;
  readonly kpiAchievementCap: number;
  readonly underperformingThreshold: number;
  readonly overBudgetAlertThreshold: number;
  readonly metricDirections: Readonly<Record<string, MetricDirection>>;
  /** Currency value of one unit of a metric, used for ROI. */
  readonly kpiMonetaryValues: Readonly<Record<string, number>>;
  readonly statusScores: Readonly<Record<ProjectStatus, number>>;
};

const WEIGHT_SUM_TOLERANCE = 1e-9;

const unitInterval = z.number().finite().min(0).max(1);
const dimensionScore = z.number().finite().min(0).max(100);

const weightsSchema = z
  .object({
    status: unitInterval,
    risk: unitInterval,
    budget: unitInterval,
    kpi: unitInterval
  })
  .strict()
  .refine(
    (weights) => Math.abs(weights.status + weights.risk + weights.budget + weights.kpi - 1) <= WEIGHT_SUM_TOLERANCE,
    "Health score weights must sum to 1.0."
  );

const statusScoresShape = {
  PLANNING: dimensionScore,
  DEVELOPMENT: dimensionScore,
  TESTING: dimensionScore,
  PRODUCTION: dimensionScore,
  RETIRED: dimensionScore
} satisfies Record<ProjectStatus, typeof dimensionScore>;

const analyticsConfigSchema = z.object({
  weights: weightsSchema,
  noDataPolicy: z.enum(["neutral", "penalize", "exclude"]),
  trendTolerance: z.number().finite().min(0),
  budgetSaturation: z.number().finite().positive(),
  kpiAchievementCap: z.number().finite().min(1).max(1.5),
  underperformingThreshold: z.number().finite().min(0),
  overBudgetAlertThreshold: z.number().finite().min(0),
  metricDirections: z.record(z.string(), z.enum(["higher", "lower"])),
  kpiMonetaryValues: z.record(z.string(), z.number().finite().nonnegative()),
  statusScores: z.object(statusScoresShape).strict()
});

export const analyticsOverridesSchema = z
  .object({
    weights: z.object({
      status: z.number(),
      risk: z.number(),
      budget: z.number(),
      kpi: z.number()
    }),
    noDataPolicy: z.enum(["neutral", "penalize", "exclude"]),
    trendTolerance: z.number(),
    budgetSaturation: z.number(),
    kpiAchievementCap: z.number(),
    underperformingThreshold: z.number(),
    overBudgetAlertThreshold: z.number(),
    metricDirections: z.record(z.string(), z.enum(["higher", "lower"])),
    kpiMonetaryValues: z.record(z.string(), z.number()),
    statusScores: z.object(statusScoresShape).partial()
  })
  .partial()
  .strict();

export type AnalyticsConfigOverrides = z.infer<typeof analyticsOverridesSchema>;

export const DEFAULT_STATUS_SCORES: Readonly<Record<ProjectStatus, number>> = Object.freeze({
  PRODUCTION: 100,
  TESTING: 80,
  DEVELOPMENT: 60,
  PLANNING: 40,
  RETIRED: 0
});

export const DEFAULT_ANALYTICS_CONFIG: AnalyticsConfig = freezeConfig({
  weights: { status: 0.25, risk: 0.25, budget: 0.25, kpi: 0.25 },
  noDataPolicy: "neutral",
  trendTolerance: 0.05,
  budgetSaturation: 0.5,
  kpiAchievementCap: 1.2,
  underperformingThreshold: 0.7,
  overBudgetAlertThreshold: 0.2,
  metricDirections: {},
  kpiMonetaryValues: {},
  statusScores: DEFAULT_STATUS_SCORES
});

/**
 * Layers overrides onto a base config and validates the result. Weights are
 * replaced as a whole; the metric maps and status table are merged.
 */
export function createAnalyticsConfig(
  overrides: AnalyticsConfigOverrides = {},
  base: AnalyticsConfig = DEFAULT_ANALYTICS_CONFIG
): AnalyticsConfig {
  const candidate = {
    ...base,
    ...overrides,
    weights: overrides.weights ?? base.weights,
    metricDirections: { ...base.metricDirections, ...overrides.metricDirections },
    kpiMonetaryValues: { ...base.kpiMonetaryValues, ...overrides.kpiMonetaryValues },
    statusScores: { ...base.statusScores, ...overrides.statusScores }
  };
  const result = analyticsConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new InvalidConfigError("Invalid analytics configuration.", formatIssues(result.error));
  }
  return freezeConfig(result.data);
}

/** Health computations call this first so hand-built configs are held to the same rule. */
export function assertValidWeights(weights: Readonly<HealthWeights>): void {
  const result = weightsSchema.safeParse(weights);
  if (!result.success) {
    throw new InvalidConfigError("Invalid health score weights.", formatIssues(result.error));
  }
}

// metric names are free text, so only own keys count
const ownEntry = <T>(record: Readonly<Record<string, T>>, key: string): T | undefined =>
  Object.hasOwn(record, key) ? record[key] : undefined;

export function isHigherBetter(config: AnalyticsConfig, metricName: string): boolean {
  return (ownEntry(config.metricDirections, metricName) ?? "higher") === "higher";
}

/** Currency value of one unit of the metric, if one is configured. */
export function monetaryValue(config: AnalyticsConfig, metricName: string): number | undefined {
  return ownEntry(config.kpiMonetaryValues, metricName);
}

/**
 * Reads `ANALYTICS_CONFIG_FILE` (JSON) and the environment overrides on top
 * of the defaults.
 */
export function loadAnalyticsConfig(source: NodeJS.ProcessEnv = process.env): AnalyticsConfig {
  const fromFile = source.ANALYTICS_CONFIG_FILE ? readOverridesFile(source.ANALYTICS_CONFIG_FILE) : {};
  const fileConfig = createAnalyticsConfig(fromFile);
  return createAnalyticsConfig(readEnvOverrides(source), fileConfig);
}

function readOverridesFile(filePath: string): AnalyticsConfigOverrides {
  const raw = readFileSync(resolveFromRoot(filePath), "utf-8");
  const result = analyticsOverridesSchema.safeParse(JSON.parse(raw));
  if (!result.success) {
    throw new InvalidConfigError(`Invalid analytics config file ${filePath}.`, formatIssues(result.error));
  }
  return result.data;
}

function readEnvOverrides(source: NodeJS.ProcessEnv): AnalyticsConfigOverrides {
  const overrides: AnalyticsConfigOverrides = {};
  if (source.HEALTH_WEIGHTS) {
    const [status, risk, budget, kpi] = source.HEALTH_WEIGHTS.split(",").map((part) =>
      parseNumber("HEALTH_WEIGHTS", part)
    );
    overrides.weights = { status, risk, budget, kpi };
  }
  if (source.TREND_TOLERANCE) {
    overrides.trendTolerance = parseNumber("TREND_TOLERANCE", source.TREND_TOLERANCE);
  }
  if (source.BUDGET_SATURATION) {
    overrides.budgetSaturation = parseNumber("BUDGET_SATURATION", source.BUDGET_SATURATION);
  }
  if (source.NO_DATA_POLICY) {
    overrides.noDataPolicy = parseNoDataPolicy(source.NO_DATA_POLICY);
  }
  return overrides;
}

function parseNumber(name: string, value: string | undefined): number {
  const parsed = Number(value?.trim());
  if (value === undefined || value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidConfigError(`${name} must be numeric.`);
  }
  return parsed;
}

function parseNoDataPolicy(value: string): NoDataPolicy {
  const result = z.enum(["neutral", "penalize", "exclude"]).safeParse(value.trim());
  if (!result.success) {
    throw new InvalidConfigError("NO_DATA_POLICY must be one of neutral, penalize, exclude.");
  }
  return result.data;
}

function freezeConfig(config: AnalyticsConfig): AnalyticsConfig {
  return Object.freeze({
    ...config,
    weights: Object.freeze({ ...config.weights }),
    metricDirections: Object.freeze({ ...config.metricDirections }),
    kpiMonetaryValues: Object.freeze({ ...config.kpiMonetaryValues }),
    statusScores: Object.freeze({ ...config.statusScores })
  });
}
