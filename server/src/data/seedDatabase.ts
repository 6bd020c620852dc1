import { promises as fs } from "node:fs";
import { z } from "zod";
import { resolveFromRoot } from "../config/env";
import { formatIssues } from "../middleware/httpError";
import { DatabaseSchema, createEmptyDatabaseState } from "../models/_types";
import { DomainError } from "../utils/errors";
import { buildBudgetEntry, buildKpiEntry, buildProject, buildRiskEntry } from "../utils/validation";
import { writeDatabase } from "./db";

const DEFAULT_SEED_FILE = "db/seed.json";

const seedEntrySchema = z.object({ id: z.string().trim().min(1).optional() }).passthrough();

const seedProjectSchema = z
  .object({
    id: z.string().trim().min(1).optional(),
    kpis: z.array(seedEntrySchema).default([]),
    budgets: z.array(seedEntrySchema).default([]),
    risks: z.array(seedEntrySchema).default([])
  })
  .passthrough();

const seedFileSchema = z.object({
  projects: z.array(seedProjectSchema)
});

/**
 * Builds a database from a seed file of projects with their entries nested
 * under them. Every record goes through the same builders as the API.
 */
export async function loadSeedData(seedFilePath: string = DEFAULT_SEED_FILE): Promise<DatabaseSchema> {
  const raw = await fs.readFile(resolveFromRoot(seedFilePath), "utf-8");
  const parsed = seedFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new DomainError("INVALID_SEED", `Invalid seed file ${seedFilePath}.`, formatIssues(parsed.error));
  }

  const db = createEmptyDatabaseState();
  for (const { kpis, budgets, risks, ...fields } of parsed.data.projects) {
    const project = buildProject(fields, { id: fields.id });
    db.projects.push(project);
    db.kpis.push(...kpis.map((entry) => buildKpiEntry({ ...entry, projectId: project.id }, { id: entry.id })));
    db.budgets.push(
      ...budgets.map((entry) => buildBudgetEntry({ ...entry, projectId: project.id }, { id: entry.id }))
    );
    db.risks.push(...risks.map((entry) => buildRiskEntry({ ...entry, projectId: project.id }, { id: entry.id })));
  }
  return db;
}

export async function seedDatabase(seedFilePath?: string): Promise<DatabaseSchema> {
  const db = await loadSeedData(seedFilePath);
  await writeDatabase(db);
  console.log(
    `Seeded ${db.projects.length} projects, ${db.kpis.length} KPI entries, ${db.budgets.length} budget entries and ${db.risks.length} risks.`
  );
  return db;
}
