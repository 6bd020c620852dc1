import { DEFAULT_ANALYTICS_CONFIG, createAnalyticsConfig } from "../src/config/analyticsConfig";
import { computePortfolioRoi, computeProjectRoi } from "../src/services/roi.service";
import { DomainError } from "../src/utils/errors";
import { makeBudget, makeKpi, makeProject } from "./fixtures";

const config = DEFAULT_ANALYTICS_CONFIG;

describe("ROI calculator", () => {
  const project = makeProject("p1", { name: "Support Bot" });

  it("is undefined without budget data", () => {
    const result = computeProjectRoi(project, [], [makeKpi("k1", "p1", "Accuracy", 100, 90)], config);
    expect(result).toEqual({
      status: "undefined",
      reason: "NO_BUDGET_DATA",
      projectId: "p1",
      projectName: "Support Bot",
      valueGenerated: 0,
      totalActualCost: 0
    });
  });

  it("is undefined when nothing has been spent", () => {
    const result = computeProjectRoi(project, [makeBudget("b1", "p1", 500, 0)], [], config);
    expect(result.status).toBe("undefined");
    expect(result).toMatchObject({ reason: "ZERO_COST", totalActualCost: 0 });
  });

  it("returns -1 when there are costs and no KPI value", () => {
    const result = computeProjectRoi(project, [makeBudget("b1", "p1", 800, 1000)], [], config);
    expect(result).toEqual({
      status: "ok",
      projectId: "p1",
      projectName: "Support Bot",
      roi: -1,
      roiPercentage: -100,
      valueGenerated: 0,
      totalActualCost: 1000,
      method: "achievement-proxy",
      paybackMonths: null
    });
  });

  it("values the project by KPI achievement when no monetary value is configured", () => {
    const result = computeProjectRoi(
      project,
      [makeBudget("b1", "p1", 1000, 1000)],
      [makeKpi("k1", "p1", "Accuracy", 100, 80)],
      config
    );
    expect(result).toMatchObject({ status: "ok", method: "achievement-proxy", valueGenerated: 800, roi: -0.2, roiPercentage: -20 });
  });

  it("uses the latest KPI value with configured monetary values", () => {
    const monetary = createAnalyticsConfig({ kpiMonetaryValues: { "Invoices Processed": 5 } });
    const kpis = [
      makeKpi("k2", "p1", "Invoices Processed", 400, 300, "2025-06-30"),
      makeKpi("k1", "p1", "Invoices Processed", 400, 100, "2025-05-31")
    ];
    const result = computeProjectRoi(project, [makeBudget("b1", "p1", 900, 1000)], kpis, monetary);
    expect(result).toMatchObject({ status: "ok", method: "monetary", valueGenerated: 1500, roi: 0.5, roiPercentage: 50 });
  });

  it("projects a monthly return estimate up to the as-of date", () => {
    const result = computeProjectRoi(project, [makeBudget("b1", "p1", 1000, 1000)], [], config, {
      monthlyReturnEstimate: 500,
      asOf: "2025-03-02"
    });
    expect(result).toMatchObject({
      status: "ok",
      method: "monthly-estimate",
      valueGenerated: 1000,
      roi: 0,
      roiPercentage: 0,
      paybackMonths: 2
    });
  });

  it("computes a ratio for any positive spend, however small", () => {
    const result = computeProjectRoi(project, [makeBudget("b1", "p1", 1, 0.004)], [], config);
    expect(result).toMatchObject({ status: "ok", roi: -1, roiPercentage: -100, totalActualCost: 0 });
  });

  it("does not treat inherited object keys as monetary values", () => {
    const result = computeProjectRoi(
      project,
      [makeBudget("b1", "p1", 1000, 1000)],
      [makeKpi("k1", "p1", "valueOf", 100, 90)],
      config
    );
    expect(result).toMatchObject({
      status: "ok",
      method: "achievement-proxy",
      valueGenerated: 900,
      roi: -0.1,
      roiPercentage: -10
    });
  });

  it("requires an as-of date for a monthly estimate", () => {
    expect(() =>
      computeProjectRoi(project, [makeBudget("b1", "p1", 100, 100)], [], config, { monthlyReturnEstimate: 50 })
    ).toThrow(DomainError);
  });

  it("marks a failing project without dropping the others", () => {
    const other = makeProject("p2", { name: "Forecasting" });
    const results = computePortfolioRoi(
      {
        projects: [project, other],
        kpis: [],
        budgets: [makeBudget("b1", "p1", 100, 100), makeBudget("b2", "p2", 100, 200)],
        risks: []
      },
      config,
      { monthlyReturnEstimates: { p1: 50 } }
    );
    expect(results[0]).toEqual({
      status: "error",
      projectId: "p1",
      projectName: "Support Bot",
      message: "asOf is required when a monthly return estimate is given."
    });
    expect(results[1]).toMatchObject({ status: "ok", projectId: "p2", roi: -1 });
  });
});
