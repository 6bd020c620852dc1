import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  InMemoryPortfolioStore,
  createBudgetEntry,
  createKpiEntry,
  createProject,
  deleteEntry,
  deleteProject,
  getBudgetByCategory,
  getBudgetSummary,
  getProjectById,
  getProjectCountByStatus,
  getProjectsByPriority,
  getProjectsByStatus,
  getRiskRegister,
  listBudgets,
  listKpis,
  listProjects,
  listRisks,
  updateProject,
  updateRiskEntry
} from "../src/data/repositories";
import { loadSeedData, seedDatabase } from "../src/data/seedDatabase";
import { NotFoundError, RecordValidationError } from "../src/middleware/httpError";
import { makeBudget, makeKpi, makeProject, makeRisk } from "./fixtures";

describe("file-backed portfolio store", () => {
  beforeEach(async () => {
    await seedDatabase();
  });

  it("lists and filters projects", async () => {
    expect(await listProjects()).toHaveLength(5);
    const planning = await listProjects({ status: "PLANNING" });
    expect(planning.map((project) => project.id)).toEqual(["proj-demand-forecast"]);
    const support = await listProjects({ department: "Customer Success" });
    expect(support.map((project) => project.id)).toEqual(["proj-support-assistant", "proj-legacy-chatbot"]);
  });

  it("creates a project with defaults", async () => {
    const project = await createProject({ name: "Contract Review", owner: "Dana", startDate: "2025-09-01" });
    expect(project).toMatchObject({ status: "PLANNING", priority: "MEDIUM", department: "", description: "" });
    expect(await getProjectById(project.id)).toEqual(project);
  });

  it("rejects an invalid project", async () => {
    await expect(createProject({ name: "", owner: "Dana", startDate: "2025-09-01" })).rejects.toBeInstanceOf(
      RecordValidationError
    );
  });

  it("updates a project and keeps its creation time", async () => {
    const before = await getProjectById("proj-code-review-bot");
    const updated = await updateProject("proj-code-review-bot", { status: "TESTING" });
    expect(updated.status).toBe("TESTING");
    expect(updated.createdAt).toBe(before?.createdAt);
    expect(updated.name).toBe("Code Review Bot");
  });

  it("fails to update an unknown project", async () => {
    await expect(updateProject("missing", { status: "TESTING" })).rejects.toBeInstanceOf(NotFoundError);
  });

  it("deletes a project with every entry it owns", async () => {
    expect(await deleteProject("proj-invoice-extraction")).toBe(true);
    expect(await listKpis("proj-invoice-extraction")).toEqual([]);
    expect(await listBudgets()).toHaveLength(7);
    expect(await listRisks()).toHaveLength(4);
    expect(await deleteProject("proj-invoice-extraction")).toBe(false);
  });

  it("refuses entries for an unknown project", async () => {
    await expect(
      createKpiEntry({ projectId: "missing", metricName: "Accuracy", targetValue: 1, actualValue: 1, recordedDate: "2025-07-01" })
    ).rejects.toThrow("Project not found.");
  });

  it("validates budget entries", async () => {
    await expect(
      createBudgetEntry({ projectId: "proj-code-review-bot", category: "COMPUTE", plannedAmount: 10, period: "2025-13" })
    ).rejects.toThrow("Invalid budget record.");
    const entry = await createBudgetEntry({
      projectId: "proj-code-review-bot",
      category: "COMPUTE",
      plannedAmount: 10,
      currency: "eur",
      period: "2025-09"
    });
    expect(entry).toMatchObject({ actualAmount: 0, currency: "EUR" });
    expect(await listBudgets("proj-code-review-bot")).toHaveLength(3);
  });

  it("updates a risk status", async () => {
    const [risk] = await listRisks("proj-code-review-bot");
    const updated = await updateRiskEntry("proj-code-review-bot", risk.id, { status: "RESOLVED" });
    expect(updated).toMatchObject({ id: risk.id, status: "RESOLVED", probability: risk.probability });
  });

  it("does not update a risk through another project", async () => {
    await expect(updateRiskEntry("proj-invoice-extraction", "risk-cr-noise", { status: "RESOLVED" })).rejects.toThrow(
      "Risk not found."
    );
    const [risk] = await listRisks("proj-code-review-bot");
    expect(risk.status).toBe("OPEN");
  });

  it("reports whether an entry was deleted", async () => {
    const [kpi] = await listKpis("proj-code-review-bot");
    expect(await deleteEntry("kpis", "proj-support-assistant", kpi.id)).toBe(false);
    expect(await deleteEntry("kpis", "proj-code-review-bot", kpi.id)).toBe(true);
    expect(await deleteEntry("kpis", "proj-code-review-bot", kpi.id)).toBe(false);
    expect(await listKpis("proj-code-review-bot")).toHaveLength(2);
  });

  it("summarizes budgets", async () => {
    expect(await getBudgetSummary()).toEqual({ totalPlanned: 162000, totalActual: 169600, totalVariance: 7600 });
    const byCategory = await getBudgetByCategory();
    expect(byCategory.COMPUTE).toEqual({ planned: 23000, actual: 24700, variance: 1700 });
  });

  it("queries projects by status and priority", async () => {
    const ids = (projects: ReadonlyArray<{ id: string }>) => projects.map((project) => project.id);
    expect(ids(await getProjectsByStatus("TESTING"))).toEqual(["proj-invoice-extraction"]);
    expect(ids(await getProjectsByPriority("LOW"))).toEqual(["proj-demand-forecast", "proj-legacy-chatbot"]);
  });

  it("counts projects by status", async () => {
    expect(await getProjectCountByStatus()).toEqual({
      PRODUCTION: 1,
      TESTING: 1,
      DEVELOPMENT: 1,
      PLANNING: 1,
      RETIRED: 1
    });
  });

  it("orders the risk register by score", async () => {
    const register = await getRiskRegister();
    expect(register.every((risk) => risk.status !== "RESOLVED")).toBe(true);
    const scores = register.map((risk) => risk.probability * risk.impact);
    expect(scores).toEqual([...scores].sort((a, b) => b - a));
  });
});

describe("in-memory portfolio store", () => {
  const store = new InMemoryPortfolioStore({
    projects: [
      makeProject("p1", { department: "Ops", status: "PRODUCTION" }),
      makeProject("p2", { department: "R&D", status: "PLANNING" })
    ],
    kpis: [makeKpi("k1", "p1", "Accuracy", 100, 90, "2025-05-31"), makeKpi("k2", "p1", "Accuracy", 100, 95, "2025-06-30")],
    budgets: [
      makeBudget("b1", "p1", 100, 90, { period: "2025-05" }),
      makeBudget("b2", "p1", 100, 110, { period: "2025-06" }),
      makeBudget("b3", "p2", 50, 0, { period: "2025-06" })
    ],
    risks: [makeRisk("r1", "p2", 3, 3)]
  });

  const ids = (records: ReadonlyArray<{ id: string }>) => records.map((record) => record.id);

  it("filters entries by date range", async () => {
    const fromJune = await store.readSnapshot({ from: "2025-06-15" });
    expect(ids(fromJune.kpis)).toEqual(["k2"]);
    expect(ids(fromJune.budgets)).toEqual(["b2", "b3"]);

    const untilMay = await store.readSnapshot({ to: "2025-05-31" });
    expect(ids(untilMay.kpis)).toEqual(["k1"]);
    expect(ids(untilMay.budgets)).toEqual(["b1"]);
  });

  it("drops entries of filtered-out projects", async () => {
    const snapshot = await store.readSnapshot({ department: "R&D" });
    expect(ids(snapshot.projects)).toEqual(["p2"]);
    expect(snapshot.kpis).toEqual([]);
    expect(ids(snapshot.budgets)).toEqual(["b3"]);
    expect(ids(snapshot.risks)).toEqual(["r1"]);
  });

  it("answers per-project queries", async () => {
    expect(ids(await store.getAllProjects({ status: "PLANNING" }))).toEqual(["p2"]);
    expect(await store.getAllKpis("p1")).toHaveLength(2);
    expect(await store.getAllBudgets("p2")).toHaveLength(1);
    expect(await store.getAllRisks("p1")).toEqual([]);
  });
});

describe("seed data", () => {
  it("loads the bundled seed file", async () => {
    const db = await loadSeedData();
    expect(db.projects).toHaveLength(5);
    expect(db.kpis).toHaveLength(13);
    expect(db.budgets).toHaveLength(10);
    expect(db.risks).toHaveLength(6);
    const projectIds = new Set(db.projects.map((project) => project.id));
    expect(db.kpis.every((entry) => projectIds.has(entry.projectId))).toBe(true);
  });

  it("rejects a malformed seed file", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "portfolio-seed-"));
    const file = path.join(dir, "seed.json");
    try {
      await fs.writeFile(file, JSON.stringify({ items: [] }));
      await expect(loadSeedData(file)).rejects.toThrow(`Invalid seed file ${file}.`);
      await fs.writeFile(file, JSON.stringify({ projects: [{ name: "No owner", startDate: "2025-01-01" }] }));
      await expect(loadSeedData(file)).rejects.toThrow("Invalid project record.");
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
