import { readDatabase, updateDatabase } from "./db";
import { NotFoundError } from "../middleware/httpError";
import {
  BudgetCategory,
  BudgetEntry,
  DatabaseSchema,
  KpiEntry,
  PortfolioSnapshot,
  PortfolioStore,
  Project,
  ProjectFilter,
  ProjectPriority,
  ProjectStatus,
  RiskEntry,
  SnapshotFilter
} from "../models/_types";
import { nowISO, isDateWithinRange, isPeriodWithinRange } from "../utils/date";
import { compareKeys, roundTo } from "../utils/math";
import {
  ProjectUpdate,
  RiskUpdate,
  buildBudgetEntry,
  buildKpiEntry,
  buildProject,
  buildRiskEntry,
  projectUpdateSchema,
  riskUpdateSchema
} from "../utils/validation";

// Projects

export async function listProjects(filter: ProjectFilter = {}): Promise<Project[]> {
  const db = await readDatabase();
  return db.projects.filter((project) => matchesProjectFilter(project, filter)).map((project) => ({ ...project }));
}

export async function getProjectById(id: string): Promise<Project | undefined> {
  const db = await readDatabase();
  return db.projects.find((project) => project.id === id);
}

export async function createProject(input: unknown): Promise<Project> {
  const project = buildProject(input);
  await updateDatabase(async (db) => {
    db.projects.push(project);
    return db;
  });
  return { ...project };
}

export async function updateProject(id: string, update: ProjectUpdate): Promise<Project> {
  const changes = projectUpdateSchema.parse(update);
  const db = await updateDatabase(async (current) => {
    const index = current.projects.findIndex((project) => project.id === id);
    if (index === -1) {
      throw new NotFoundError("Project not found.");
    }
    const base = current.projects[index];
    current.projects[index] = buildProject(
      { ...base, ...changes },
      { id: base.id, createdAt: base.createdAt, updatedAt: nowISO() }
    );
    return current;
  });
  const stored = db.projects.find((project) => project.id === id);
  if (!stored) {
    throw new Error("Unable to update project.");
  }
  return { ...stored };
}

/** Removes the project together with every entry it owns. */
export async function deleteProject(id: string): Promise<boolean> {
  let removed = false;
  await updateDatabase(async (db) => {
    const remaining = db.projects.filter((project) => project.id !== id);
    removed = remaining.length !== db.projects.length;
    return {
      projects: remaining,
      kpis: db.kpis.filter((entry) => entry.projectId !== id),
      budgets: db.budgets.filter((entry) => entry.projectId !== id),
      risks: db.risks.filter((entry) => entry.projectId !== id)
    };
  });
  return removed;
}

// Entries

function assertProjectExists(db: DatabaseSchema, projectId: string) {
  if (!db.projects.some((project) => project.id === projectId)) {
    throw new NotFoundError("Project not found.");
  }
}

export async function listKpis(projectId?: string): Promise<KpiEntry[]> {
  const db = await readDatabase();
  return db.kpis.filter((entry) => !projectId || entry.projectId === projectId);
}

export async function createKpiEntry(input: unknown): Promise<KpiEntry> {
  const entry = buildKpiEntry(input);
  await updateDatabase(async (db) => {
    assertProjectExists(db, entry.projectId);
    db.kpis.push(entry);
    return db;
  });
  return { ...entry };
}

export async function listBudgets(projectId?: string): Promise<BudgetEntry[]> {
  const db = await readDatabase();
  return db.budgets.filter((entry) => !projectId || entry.projectId === projectId);
}

export async function createBudgetEntry(input: unknown): Promise<BudgetEntry> {
  const entry = buildBudgetEntry(input);
  await updateDatabase(async (db) => {
    assertProjectExists(db, entry.projectId);
    db.budgets.push(entry);
    return db;
  });
  return { ...entry };
}

export async function listRisks(projectId?: string): Promise<RiskEntry[]> {
  const db = await readDatabase();
  return db.risks.filter((entry) => !projectId || entry.projectId === projectId);
}

export async function createRiskEntry(input: unknown): Promise<RiskEntry> {
  const entry = buildRiskEntry(input);
  await updateDatabase(async (db) => {
    assertProjectExists(db, entry.projectId);
    db.risks.push(entry);
    return db;
  });
  return { ...entry };
}

/** Updates a risk of the given project; a risk owned by another project is not found. */
export async function updateRiskEntry(projectId: string, id: string, update: RiskUpdate): Promise<RiskEntry> {
  const changes = riskUpdateSchema.parse(update);
  const db = await updateDatabase(async (current) => {
    const index = current.risks.findIndex((risk) => risk.id === id && risk.projectId === projectId);
    if (index === -1) {
      throw new NotFoundError("Risk not found.");
    }
    const base = current.risks[index];
    current.risks[index] = buildRiskEntry(
      { ...base, ...changes },
      { id: base.id, createdAt: base.createdAt, updatedAt: nowISO() }
    );
    return current;
  });
  const stored = db.risks.find((risk) => risk.id === id);
  if (!stored) {
    throw new Error("Unable to update risk.");
  }
  return { ...stored };
}

type EntryCollection = "kpis" | "budgets" | "risks";

export async function deleteEntry(collection: EntryCollection, projectId: string, id: string): Promise<boolean> {
  const keep = (entry: { id: string; projectId: string }) => entry.id !== id || entry.projectId !== projectId;
  let removed = false;
  await updateDatabase(async (db) => {
    const before = db[collection].length;
    const next = { ...db };
    if (collection === "kpis") {
      next.kpis = db.kpis.filter(keep);
    } else if (collection === "budgets") {
      next.budgets = db.budgets.filter(keep);
    } else {
      next.risks = db.risks.filter(keep);
    }
    removed = next[collection].length !== before;
    return next;
  });
  return removed;
}

// Queries

export async function getProjectsByStatus(status: ProjectStatus): Promise<Project[]> {
  return listProjects({ status });
}

export async function getProjectsByPriority(priority: ProjectPriority): Promise<Project[]> {
  const projects = await listProjects();
  return projects.filter((project) => project.priority === priority);
}

export async function getProjectCountByStatus(): Promise<Partial<Record<ProjectStatus, number>>> {
  const projects = await listProjects();
  return projects.reduce<Partial<Record<ProjectStatus, number>>>((acc, project) => {
    acc[project.status] = (acc[project.status] ?? 0) + 1;
    return acc;
  }, {});
}

export type BudgetTotals = {
  totalPlanned: number;
  totalActual: number;
  totalVariance: number;
};

export async function getBudgetSummary(): Promise<BudgetTotals> {
  const budgets = await listBudgets();
  const totalPlanned = budgets.reduce((acc, entry) => acc + entry.plannedAmount, 0);
  const totalActual = budgets.reduce((acc, entry) => acc + entry.actualAmount, 0);
  return {
    totalPlanned: roundTo(totalPlanned),
    totalActual: roundTo(totalActual),
    totalVariance: roundTo(totalActual - totalPlanned)
  };
}

export async function getBudgetByCategory(): Promise<
  Partial<Record<BudgetCategory, { planned: number; actual: number; variance: number }>>
> {
  const budgets = await listBudgets();
  const summary: Partial<Record<BudgetCategory, { planned: number; actual: number; variance: number }>> = {};
  for (const entry of budgets) {
    const bucket = summary[entry.category] ?? { planned: 0, actual: 0, variance: 0 };
    bucket.planned = roundTo(bucket.planned + entry.plannedAmount);
    bucket.actual = roundTo(bucket.actual + entry.actualAmount);
    bucket.variance = roundTo(bucket.actual - bucket.planned);
    summary[entry.category] = bucket;
  }
  return summary;
}

/** Open and mitigating risks, highest probability x impact first. */
export async function getRiskRegister(): Promise<RiskEntry[]> {
  const risks = await listRisks();
  return risks
    .filter((risk) => risk.status !== "RESOLVED")
    .sort((a, b) => b.probability * b.impact - a.probability * a.impact || compareKeys(a.id, b.id));
}

// Storage port

function matchesProjectFilter(project: Project, filter: ProjectFilter) {
  if (filter.department && project.department !== filter.department) {
    return false;
  }
  if (filter.status && project.status !== filter.status) {
    return false;
  }
  return true;
}

export function filterSnapshot(source: PortfolioSnapshot, filter: SnapshotFilter = {}): PortfolioSnapshot {
  const projects = source.projects.filter(
    (project) => (!filter.projectId || project.id === filter.projectId) && matchesProjectFilter(project, filter)
  );
  const projectIds = new Set(projects.map((project) => project.id));
  return {
    projects,
    kpis: source.kpis.filter(
      (entry) => projectIds.has(entry.projectId) && isDateWithinRange(entry.recordedDate, filter.from, filter.to)
    ),
    budgets: source.budgets.filter(
      (entry) => projectIds.has(entry.projectId) && isPeriodWithinRange(entry.period, filter.from, filter.to)
    ),
    risks: source.risks.filter((entry) => projectIds.has(entry.projectId))
  };
}

export const filePortfolioStore: PortfolioStore = {
  getAllProjects: (filter) => listProjects(filter),
  getAllKpis: (projectId) => listKpis(projectId),
  getAllBudgets: (projectId) => listBudgets(projectId),
  getAllRisks: (projectId) => listRisks(projectId),
  async readSnapshot(filter) {
    const db = await readDatabase();
    return filterSnapshot(db, filter);
  }
};

/** Storage port over a fixed set of records. */
export class InMemoryPortfolioStore implements PortfolioStore {
  private readonly snapshot: PortfolioSnapshot;

  constructor(snapshot: Partial<PortfolioSnapshot> = {}) {
    this.snapshot = {
      projects: [...(snapshot.projects ?? [])],
      kpis: [...(snapshot.kpis ?? [])],
      budgets: [...(snapshot.budgets ?? [])],
      risks: [...(snapshot.risks ?? [])]
    };
  }

  async getAllProjects(filter: ProjectFilter = {}): Promise<Project[]> {
    return this.snapshot.projects.filter((project) => matchesProjectFilter(project, filter));
  }

  async getAllKpis(projectId?: string): Promise<KpiEntry[]> {
    return this.snapshot.kpis.filter((entry) => !projectId || entry.projectId === projectId);
  }

  async getAllBudgets(projectId?: string): Promise<BudgetEntry[]> {
    return this.snapshot.budgets.filter((entry) => !projectId || entry.projectId === projectId);
  }

  async getAllRisks(projectId?: string): Promise<RiskEntry[]> {
    return this.snapshot.risks.filter((entry) => !projectId || entry.projectId === projectId);
  }

  async readSnapshot(filter?: SnapshotFilter): Promise<PortfolioSnapshot> {
    return filterSnapshot(this.snapshot, filter);
  }
}
