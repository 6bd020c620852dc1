import { RecordValidationError } from "../src/middleware/httpError";
import { buildBudgetEntry, buildKpiEntry, buildProject, buildRiskEntry } from "../src/utils/validation";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw.");
}

describe("record validation", () => {
  it("applies project defaults and trims text", () => {
    const project = buildProject({ name: "  Churn Model  ", owner: "Ana", startDate: "2025-02-01" });
    expect(project.name).toBe("Churn Model");
    expect(project.status).toBe("PLANNING");
    expect(project.priority).toBe("MEDIUM");
    expect(project.description).toBe("");
    expect(project.id).toEqual(expect.any(String));
    expect(project.createdAt).toBe(project.updatedAt);
  });

  it("keeps the id and timestamps it is given", () => {
    const project = buildProject(
      { name: "Churn Model", owner: "Ana", startDate: "2025-02-01" },
      { id: "p-1", createdAt: "2025-01-01T00:00:00.000Z", updatedAt: "2025-01-02T00:00:00.000Z" }
    );
    expect(project.id).toBe("p-1");
    expect(project.createdAt).toBe("2025-01-01T00:00:00.000Z");
    expect(project.updatedAt).toBe("2025-01-02T00:00:00.000Z");
  });

  it("rejects a target date before the start date", () => {
    const error = captureError(() =>
      buildProject({ name: "Churn Model", owner: "Ana", startDate: "2025-02-01", targetDate: "2025-01-31" })
    );
    expect(error).toBeInstanceOf(RecordValidationError);
    expect(error).toMatchObject({
      status: 400,
      message: "Invalid project record.",
      details: [{ path: "targetDate", message: "targetDate must not be before startDate." }]
    });
  });

  it("rejects calendar dates that do not exist", () => {
    expect(() => buildProject({ name: "Churn Model", owner: "Ana", startDate: "2025-02-30" })).toThrow(
      RecordValidationError
    );
  });

  it("normalizes budget currency and rejects negative amounts", () => {
    const entry = buildBudgetEntry({
      projectId: "p-1",
      category: "COMPUTE",
      plannedAmount: 100,
      currency: " eur ",
      period: "2025-03"
    });
    expect(entry.currency).toBe("EUR");
    expect(entry.actualAmount).toBe(0);

    const error = captureError(() =>
      buildBudgetEntry({ projectId: "p-1", category: "COMPUTE", plannedAmount: -5, period: "2025-03" })
    );
    expect(error).toMatchObject({
      message: "Invalid budget record.",
      details: [{ path: "plannedAmount", message: "plannedAmount must not be negative." }]
    });
  });

  it("rejects a budget period outside the calendar", () => {
    expect(() =>
      buildBudgetEntry({ projectId: "p-1", category: "OTHER", plannedAmount: 10, period: "2025-13" })
    ).toThrow("Invalid budget record.");
  });

  it("holds risk probability and impact to whole numbers from 1 to 5", () => {
    const base = { projectId: "p-1", description: "Vendor lock-in", impact: 3 };
    expect(buildRiskEntry({ ...base, probability: 5 }).status).toBe("OPEN");
    expect(() => buildRiskEntry({ ...base, probability: 6 })).toThrow(RecordValidationError);
    expect(() => buildRiskEntry({ ...base, probability: 2.5 })).toThrow(RecordValidationError);
    expect(() => buildRiskEntry({ ...base, probability: 0 })).toThrow(RecordValidationError);
  });

  it("requires a numeric KPI value", () => {
    const error = captureError(() =>
      buildKpiEntry({ projectId: "p-1", metricName: "Accuracy", targetValue: 90, actualValue: "high", recordedDate: "2025-04-01" })
    );
    expect(error).toBeInstanceOf(RecordValidationError);
    expect(error).toMatchObject({ message: "Invalid KPI record." });
  });
});
