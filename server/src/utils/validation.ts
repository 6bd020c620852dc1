import { randomUUID } from "node:crypto";
import { z } from "zod";
import { RecordValidationError, formatIssues } from "../middleware/httpError";
import {
  BUDGET_CATEGORIES,
  BudgetEntry,
  KpiEntry,
  PROJECT_PRIORITIES,
  PROJECT_STATUSES,
  Project,
  RISK_STATUSES,
  RiskEntry
} from "../models/_types";
import { compareISODates, isISODate, isPeriod, nowISO } from "./date";

export const isoDateSchema = z
  .string({ message: "Date is required." })
  .trim()
  .refine(isISODate, "Must be a valid date (YYYY-MM-DD).");

const idSchema = z.string().trim().min(1);
const finiteNumber = z.number().finite();

export const projectFieldsSchema = z.object({
  name: z.string({ message: "name is required." }).trim().min(1).max(200),
  description: z.string().trim().max(2000).default(""),
  status: z.enum(PROJECT_STATUSES).default("PLANNING"),
  priority: z.enum(PROJECT_PRIORITIES).default("MEDIUM"),
  owner: z.string({ message: "owner is required." }).trim().min(1).max(100),
  department: z.string().trim().max(100).default(""),
  modelUsed: z.string().trim().max(200).default(""),
  useCase: z.string().trim().max(500).default(""),
  startDate: isoDateSchema,
  targetDate: isoDateSchema.optional(),
  completionDate: isoDateSchema.optional()
});

export const projectInputSchema = projectFieldsSchema.superRefine((project, ctx) => {
  if (project.targetDate && compareISODates(project.targetDate, project.startDate) < 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["targetDate"],
      message: "targetDate must not be before startDate."
    });
  }
  if (project.completionDate && compareISODates(project.completionDate, project.startDate) < 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["completionDate"],
      message: "completionDate must not be before startDate."
    });
  }
});

export const projectUpdateSchema = projectFieldsSchema.partial().strict();

export const kpiInputSchema = z.object({
  projectId: idSchema,
  metricName: z.string({ message: "metricName is required." }).trim().min(1).max(200),
  targetValue: finiteNumber,
  actualValue: finiteNumber,
  unit: z.string().trim().max(50).default(""),
  recordedDate: isoDateSchema
});

export const budgetInputSchema = z.object({
  projectId: idSchema,
  category: z.enum(BUDGET_CATEGORIES),
  plannedAmount: finiteNumber.nonnegative("plannedAmount must not be negative."),
  actualAmount: finiteNumber.nonnegative("actualAmount must not be negative.").default(0),
  currency: z
    .string()
    .trim()
    .toUpperCase()
    .regex(/^[A-Z]{3}$/, "currency must be a 3-letter code.")
    .default("USD"),
  period: z.string().trim().refine(isPeriod, "period must be a month (YYYY-MM).")
});

export const riskInputSchema = z.object({
  projectId: idSchema,
  description: z.string({ message: "description is required." }).trim().min(1).max(1000),
  probability: z.number().int().min(1).max(5),
  impact: z.number().int().min(1).max(5),
  mitigation: z.string().trim().max(1000).default(""),
  status: z.enum(RISK_STATUSES).default("OPEN")
});

export const riskUpdateSchema = riskInputSchema.omit({ projectId: true }).partial().strict();

// Request schemas

/** Body of the per-project entry routes; the project id comes from the path. */
export const entryBodySchema = z.object({}).passthrough();

const optionalText = z.string().trim().min(1).optional();

const weightsQuerySchema = z
  .string()
  .trim()
  .transform((value, ctx) => {
    const parts = value.split(",").map((part) => part.trim());
    const numbers = parts.map(Number);
    if (parts.length !== 4 || parts.some((part) => part === "") || numbers.some((n) => !Number.isFinite(n))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "weights must be four comma-separated numbers: status,risk,budget,kpi."
      });
      return z.NEVER;
    }
    const [status, risk, budget, kpi] = numbers;
    return { status, risk, budget, kpi };
  });

export const analyticsQuerySchema = z
  .object({
    projectId: optionalText,
    department: optionalText,
    status: z.enum(PROJECT_STATUSES).optional(),
    from: isoDateSchema.optional(),
    to: isoDateSchema.optional(),
    weights: weightsQuerySchema.optional(),
    noDataPolicy: z.enum(["neutral", "penalize", "exclude"]).optional(),
    trendTolerance: z.coerce.number().finite().min(0).optional(),
    groupBy: z.enum(["none", "project", "category", "project-category"]).optional(),
    limit: z.coerce.number().int().positive().optional(),
    asOf: isoDateSchema.optional(),
    previousHealthScore: z.coerce.number().finite().min(0).max(100).optional(),
    format: z.enum(["json", "markdown", "html"]).default("json")
  })
  .refine((query) => !query.from || !query.to || compareISODates(query.from, query.to) <= 0, {
    message: "from must not be after to.",
    path: ["from"]
  });

export type AnalyticsQuery = z.output<typeof analyticsQuerySchema>;

export const projectListQuerySchema = z.object({
  department: optionalText,
  status: z.enum(PROJECT_STATUSES).optional()
});

export type ProjectInput = z.input<typeof projectInputSchema>;
export type ProjectUpdate = z.input<typeof projectUpdateSchema>;
export type KpiInput = z.input<typeof kpiInputSchema>;
export type BudgetInput = z.input<typeof budgetInputSchema>;
export type RiskInput = z.input<typeof riskInputSchema>;
export type RiskUpdate = z.input<typeof riskUpdateSchema>;

type RecordMeta = {
  id?: string;
  createdAt?: string;
  updatedAt?: string;
};

function parseRecord<T>(kind: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new RecordValidationError(kind, formatIssues(result.error));
  }
  return result.data;
}

function stamp(meta: RecordMeta) {
  const timestamp = nowISO();
  return {
    id: meta.id ?? randomUUID(),
    createdAt: meta.createdAt ?? timestamp,
    updatedAt: meta.updatedAt ?? timestamp
  };
}

export function buildProject(input: unknown, meta: RecordMeta = {}): Project {
  return { ...stamp(meta), ...parseRecord("project", projectInputSchema, input) };
}

export function buildKpiEntry(input: unknown, meta: RecordMeta = {}): KpiEntry {
  return { ...stamp(meta), ...parseRecord("KPI", kpiInputSchema, input) };
}

export function buildBudgetEntry(input: unknown, meta: RecordMeta = {}): BudgetEntry {
  return { ...stamp(meta), ...parseRecord("budget", budgetInputSchema, input) };
}

export function buildRiskEntry(input: unknown, meta: RecordMeta = {}): RiskEntry {
  return { ...stamp(meta), ...parseRecord("risk", riskInputSchema, input) };
}
