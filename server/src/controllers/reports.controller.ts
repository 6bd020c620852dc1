import { NextFunction, Request, Response } from "express";
import { NotFoundError } from "../middleware/httpError";
import { REPORT_KINDS, ReportKind } from "../models/_types";
import { generateReport } from "../services/analytics.service";
import { renderHtml, renderMarkdown } from "../services/reportRenderers";
import { analyticsQuerySchema } from "../utils/validation";
import { toAnalyticsRequest } from "./analytics.controller";

function parseReportKind(value: string): ReportKind {
  const kind = REPORT_KINDS.find((candidate) => candidate === value);
  if (!kind) {
    throw new NotFoundError(`Unknown report kind: ${value}.`);
  }
  return kind;
}

export async function reportController(req: Request, res: Response, next: NextFunction) {
  try {
    const kind = parseReportKind(req.params.kind);
    const query = analyticsQuerySchema.parse(req.query);
    const report = await generateReport(kind, toAnalyticsRequest(query), {
      asOf: query.asOf,
      previousHealthScore: query.previousHealthScore
    });

    if (query.format === "markdown") {
      res.type("text/markdown; charset=utf-8");
      return res.send(renderMarkdown(report));
    }
    if (query.format === "html") {
      res.type("text/html; charset=utf-8");
      return res.send(renderHtml(report));
    }
    res.json({ report });
  } catch (error) {
    next(error);
  }
}
