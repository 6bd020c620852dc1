import { NextFunction, Request, Response } from "express";
import { AnalyticsConfigOverrides } from "../config/analyticsConfig";
import {
  AnalyticsRequest,
  getBudgetVarianceAnalytics,
  getHealthAnalytics,
  getRiskMatrixAnalytics,
  getRoiAnalytics,
  getTrendAnalytics
} from "../services/analytics.service";
import { AnalyticsQuery, analyticsQuerySchema } from "../utils/validation";

export function toAnalyticsRequest(query: AnalyticsQuery): AnalyticsRequest {
  const overrides: AnalyticsConfigOverrides = {};
  if (query.weights) {
    overrides.weights = query.weights;
  }
  if (query.noDataPolicy) {
    overrides.noDataPolicy = query.noDataPolicy;
  }
  if (query.trendTolerance !== undefined) {
    overrides.trendTolerance = query.trendTolerance;
  }
  return {
    filter: {
      projectId: query.projectId,
      department: query.department,
      status: query.status,
      from: query.from,
      to: query.to
    },
    overrides: Object.keys(overrides).length ? overrides : undefined
  };
}

export async function roiAnalyticsController(req: Request, res: Response, next: NextFunction) {
  try {
    const query = analyticsQuerySchema.parse(req.query);
    const results = await getRoiAnalytics(toAnalyticsRequest(query), { asOf: query.asOf });
    res.json({ results });
  } catch (error) {
    next(error);
  }
}

export async function healthAnalyticsController(req: Request, res: Response, next: NextFunction) {
  try {
    const query = analyticsQuerySchema.parse(req.query);
    const health = await getHealthAnalytics(toAnalyticsRequest(query));
    res.json({ health });
  } catch (error) {
    next(error);
  }
}

export async function trendAnalyticsController(req: Request, res: Response, next: NextFunction) {
  try {
    const query = analyticsQuerySchema.parse(req.query);
    const trends = await getTrendAnalytics(toAnalyticsRequest(query), query.limit);
    res.json(trends);
  } catch (error) {
    next(error);
  }
}

export async function budgetVarianceAnalyticsController(req: Request, res: Response, next: NextFunction) {
  try {
    const query = analyticsQuerySchema.parse(req.query);
    const result = await getBudgetVarianceAnalytics(toAnalyticsRequest(query), query.groupBy);
    res.json(result);
  } catch (error) {
    next(error);
  }
}

export async function riskMatrixAnalyticsController(req: Request, res: Response, next: NextFunction) {
  try {
    const query = analyticsQuerySchema.parse(req.query);
    const matrix = await getRiskMatrixAnalytics(toAnalyticsRequest(query));
    res.json({ matrix });
  } catch (error) {
    next(error);
  }
}
