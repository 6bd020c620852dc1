import { BudgetCategory, BudgetEntry, KpiEntry, Project, RiskEntry, RiskStatus } from "../src/models/_types";
import { ProjectInput, buildBudgetEntry, buildKpiEntry, buildProject, buildRiskEntry } from "../src/utils/validation";

const FIXED_TIMESTAMP = "2025-01-01T00:00:00.000Z";
const meta = (id: string) => ({ id, createdAt: FIXED_TIMESTAMP, updatedAt: FIXED_TIMESTAMP });

export function makeProject(id: string, overrides: Partial<ProjectInput> = {}): Project {
  return buildProject(
    {
      name: `Project ${id}`,
      owner: "Test Owner",
      startDate: "2025-01-01",
      ...overrides
    },
    meta(id)
  );
}

export function makeKpi(
  id: string,
  projectId: string,
  metricName: string,
  targetValue: number,
  actualValue: number,
  recordedDate = "2025-06-30"
): KpiEntry {
  return buildKpiEntry({ projectId, metricName, targetValue, actualValue, unit: "", recordedDate }, meta(id));
}

export function makeBudget(
  id: string,
  projectId: string,
  plannedAmount: number,
  actualAmount: number,
  options: { category?: BudgetCategory; currency?: string; period?: string } = {}
): BudgetEntry {
  return buildBudgetEntry(
    {
      projectId,
      plannedAmount,
      actualAmount,
      category: options.category ?? "COMPUTE",
      currency: options.currency ?? "USD",
      period: options.period ?? "2025-06"
    },
    meta(id)
  );
}

export function makeRisk(
  id: string,
  projectId: string,
  probability: number,
  impact: number,
  status: RiskStatus = "OPEN"
): RiskEntry {
  return buildRiskEntry(
    { projectId, description: `Risk ${id}`, probability, impact, mitigation: "", status },
    meta(id)
  );
}
