import { buildRiskMatrix, riskLevel, scoreRisk } from "../src/services/riskMatrix.service";
import { makeRisk } from "./fixtures";

describe("risk matrix", () => {
  const risks = [
    makeRisk("r3", "p2", 2, 2),
    makeRisk("r5", "p2", 3, 4),
    makeRisk("r1", "p1", 5, 5),
    makeRisk("r2", "p1", 3, 4, "MITIGATING"),
    makeRisk("r4", "p2", 5, 4, "RESOLVED")
  ];

  it("scores probability times impact", () => {
    const scored = scoreRisk(risks[1]);
    expect(scored.score).toBe(12);
    expect(scored.level).toBe("HIGH");
    expect(scored.normalizedScore).toBeCloseTo(11 / 24, 10);
    expect(scoreRisk(makeRisk("x", "p1", 1, 1)).normalizedScore).toBe(0);
    expect(scoreRisk(makeRisk("y", "p1", 5, 5)).normalizedScore).toBe(1);
  });

  it("maps scores to levels", () => {
    expect([25, 15, 14, 10, 9, 5, 4, 1].map(riskLevel)).toEqual([
      "CRITICAL",
      "CRITICAL",
      "HIGH",
      "HIGH",
      "MEDIUM",
      "MEDIUM",
      "LOW",
      "LOW"
    ]);
  });

  it("counts active risks by probability row and impact column", () => {
    const matrix = buildRiskMatrix(risks);
    expect(matrix.cells).toEqual([
      [0, 0, 0, 0, 1],
      [0, 0, 0, 0, 0],
      [0, 0, 0, 2, 0],
      [0, 1, 0, 0, 0],
      [0, 0, 0, 0, 0]
    ]);
    expect(matrix.statusCounts).toEqual({ OPEN: 3, MITIGATING: 1, RESOLVED: 1 });
  });

  it("orders the register by score then id and flags open critical risks", () => {
    const matrix = buildRiskMatrix(risks);
    expect(matrix.register.map((scored) => scored.risk.id)).toEqual(["r1", "r4", "r2", "r5", "r3"]);
    expect(matrix.criticalOpen.map((scored) => scored.risk.id)).toEqual(["r1"]);
  });
});
