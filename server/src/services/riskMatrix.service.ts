import { RiskEntry, RiskLevel, RiskMatrix, RiskStatus, ScoredRisk } from "../models/_types";
import { compareKeys } from "../utils/math";

const MAX_LEVEL = 5;
const MIN_SCORE = 1;
const MAX_SCORE = MAX_LEVEL * MAX_LEVEL;

export function riskLevel(score: number): RiskLevel {
  if (score >= 15) {
    return "CRITICAL";
  }
  if (score >= 10) {
    return "HIGH";
  }
  if (score >= 5) {
    return "MEDIUM";
  }
  return "LOW";
}

/** Probability x impact on the 1-25 scale, normalized so 1 maps to 0 and 25 to 1. */
export function scoreRisk(risk: RiskEntry): ScoredRisk {
  const score = risk.probability * risk.impact;
  return {
    risk,
    score,
    normalizedScore: (score - MIN_SCORE) / (MAX_SCORE - MIN_SCORE),
    level: riskLevel(score)
  };
}

function initStatusCounts(): Record<RiskStatus, number> {
  return {
    OPEN: 0,
    MITIGATING: 0,
    RESOLVED: 0
  };
}

const byScoreDescending = (a: ScoredRisk, b: ScoredRisk) => b.score - a.score || compareKeys(a.risk.id, b.risk.id);

export function buildRiskMatrix(risks: readonly RiskEntry[]): RiskMatrix {
  const cells = Array.from({ length: MAX_LEVEL }, () => Array.from({ length: MAX_LEVEL }, () => 0));
  const statusCounts = initStatusCounts();

  for (const risk of risks) {
    statusCounts[risk.status] += 1;
    if (risk.status === "RESOLVED") {
      continue;
    }
    cells[MAX_LEVEL - risk.probability][risk.impact - 1] += 1;
  }

  const register = risks.map(scoreRisk).sort(byScoreDescending);
  return {
    cells,
    statusCounts,
    register,
    criticalOpen: register.filter((scored) => scored.risk.status === "OPEN" && scored.level === "CRITICAL")
  };
}
