import { DEFAULT_ANALYTICS_CONFIG, createAnalyticsConfig } from "../src/config/analyticsConfig";
import { InvalidConfigError } from "../src/middleware/httpError";
import {
  computePortfolioHealth,
  computeProjectHealth,
  healthBand,
  scoreBudgetDimension,
  scoreRiskDimension
} from "../src/services/health.service";
import { makeBudget, makeKpi, makeProject, makeRisk } from "./fixtures";

const noRecords = { kpis: [], budgets: [], risks: [] };

describe("portfolio health score", () => {
  it("matches the golden portfolio", () => {
    const config = createAnalyticsConfig({ weights: { status: 0.3, risk: 0.3, budget: 0.2, kpi: 0.2 } });
    const snapshot = {
      projects: [
        makeProject("p1", { status: "PRODUCTION" }),
        makeProject("p2", { status: "DEVELOPMENT" }),
        makeProject("p3", { status: "RETIRED" })
      ],
      kpis: [
        makeKpi("k1", "p1", "Accuracy", 100, 100),
        makeKpi("k2", "p2", "Accuracy", 100, 50),
        makeKpi("k3", "p3", "Accuracy", 100, 0)
      ],
      budgets: [],
      risks: []
    };

    const health = computePortfolioHealth(snapshot, config);

    expect(health.projects.map((project) => (project.status === "ok" ? project.score : null))).toEqual([100, 78, 50]);
    expect(health.projects[1]).toEqual({
      status: "ok",
      projectId: "p2",
      projectName: "Project p2",
      score: 78,
      band: "Good",
      dimensions: { status: 60, risk: 100, budget: 100, kpi: 50 },
      noData: ["risk", "budget"]
    });
    expect(health).toMatchObject({
      status: "ok",
      score: 76,
      band: "Good",
      dimensions: { status: 53.3, risk: 100, budget: 100, kpi: 50 },
      details: {
        status: "Portfolio needs attention - many projects in early or retired stages",
        risk: "Risk profile is well managed",
        budget: "Budget is on track or under planned spending",
        kpi: "Multiple KPIs significantly below target"
      }
    });
  });

  it("is deterministic for identical input", () => {
    const snapshot = {
      projects: [makeProject("p1", { status: "TESTING" })],
      kpis: [makeKpi("k1", "p1", "Accuracy", 90, 81)],
      budgets: [makeBudget("b1", "p1", 1000, 1100)],
      risks: [makeRisk("r1", "p1", 3, 4)]
    };
    expect(computePortfolioHealth(snapshot, DEFAULT_ANALYTICS_CONFIG)).toEqual(
      computePortfolioHealth(snapshot, DEFAULT_ANALYTICS_CONFIG)
    );
  });

  it("reports an empty portfolio as insufficient data", () => {
    const health = computePortfolioHealth({ projects: [], kpis: [], budgets: [], risks: [] }, DEFAULT_ANALYTICS_CONFIG);
    expect(health).toEqual({ status: "insufficient_data", reason: "No projects in the portfolio.", projects: [] });
  });

  it("applies the no-data policy to empty dimensions", () => {
    const project = makeProject("p1", { status: "PRODUCTION" });
    const neutral = computeProjectHealth(project, noRecords, DEFAULT_ANALYTICS_CONFIG);
    const penalize = computeProjectHealth(project, noRecords, createAnalyticsConfig({ noDataPolicy: "penalize" }));
    const exclude = computeProjectHealth(
      makeProject("p2", { status: "DEVELOPMENT" }),
      noRecords,
      createAnalyticsConfig({ noDataPolicy: "exclude" })
    );

    expect(neutral.score).toBe(100);
    expect(penalize.score).toBe(25);
    expect(penalize.dimensions).toEqual({ status: 100, risk: 0, budget: 0, kpi: 0 });
    expect(exclude.score).toBe(60);
    expect(exclude.dimensions).toEqual({ status: 60, risk: null, budget: null, kpi: null });
    expect(exclude.noData).toEqual(["risk", "budget", "kpi"]);
  });

  it("caps KPI over-achievement at 100", () => {
    const health = computeProjectHealth(
      makeProject("p1", { status: "PRODUCTION" }),
      { ...noRecords, kpis: [makeKpi("k1", "p1", "Accuracy", 100, 150)] },
      DEFAULT_ANALYTICS_CONFIG
    );
    expect(health.dimensions.kpi).toBe(100);
  });

  it("refuses weights that do not sum to one even on a hand-built config", () => {
    const config = { ...DEFAULT_ANALYTICS_CONFIG, weights: { status: 0.5, risk: 0.5, budget: 0.5, kpi: 0.5 } };
    expect(() =>
      computePortfolioHealth({ projects: [makeProject("p1")], kpis: [], budgets: [], risks: [] }, config)
    ).toThrow(InvalidConfigError);
  });
});

describe("health dimensions", () => {
  it("scores risk from open risks only", () => {
    expect(scoreRiskDimension([])).toBeNull();
    expect(scoreRiskDimension([makeRisk("r1", "p1", 5, 5, "RESOLVED")])).toBe(100);
    expect(scoreRiskDimension([makeRisk("r1", "p1", 5, 5)])).toBe(0);
    expect(scoreRiskDimension([makeRisk("r1", "p1", 1, 1, "MITIGATING")])).toBe(100);
  });

  it("scores budget adherence up to the saturation ratio", () => {
    const config = DEFAULT_ANALYTICS_CONFIG;
    expect(scoreBudgetDimension([], config)).toBeNull();
    expect(scoreBudgetDimension([makeBudget("b1", "p1", 100, 125)], config)).toBe(50);
    expect(scoreBudgetDimension([makeBudget("b1", "p1", 100, 75)], config)).toBe(50);
    expect(scoreBudgetDimension([makeBudget("b1", "p1", 100, 300)], config)).toBe(0);
    expect(scoreBudgetDimension([makeBudget("b1", "p1", 0, 10)], config)).toBe(0);
    expect(scoreBudgetDimension([makeBudget("b1", "p1", 0, 0)], config)).toBeNull();
  });

  it("labels score bands", () => {
    expect(healthBand(80)).toBe("Excellent");
    expect(healthBand(79.9)).toBe("Good");
    expect(healthBand(60)).toBe("Good");
    expect(healthBand(40)).toBe("Fair");
    expect(healthBand(39.9)).toBe("Needs Attention");
  });
});
