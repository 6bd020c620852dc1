import { promises as fs } from "node:fs";
import path from "node:path";
import { resolveFromRoot } from "../config/env";
import { DatabaseSchema, createEmptyDatabaseState } from "../models/_types";

const DEFAULT_DB_FILE_PATH = path.join("db", "db.json");
const MAX_LOCK_RETRIES = 40;
const LOCK_RETRY_DELAY_MS = 25;
const STALE_LOCK_AGE_MS = 5000;

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

export function getDatabaseFilePath(): string {
  return resolveFromRoot(process.env.DB_FILE_PATH ?? DEFAULT_DB_FILE_PATH);
}

const lockPathFor = (dbFilePath: string) => `${dbFilePath}.lock`;

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

async function ensureDatabaseFile(dbFilePath: string) {
  await fs.mkdir(path.dirname(dbFilePath), { recursive: true });
  try {
    await fs.access(dbFilePath);
  } catch {
    await fs.writeFile(dbFilePath, JSON.stringify(createEmptyDatabaseState(), null, 2));
  }
}

async function removeIfPresent(filePath: string) {
  await fs.unlink(filePath).catch((error: unknown) => {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      throw error;
    }
  });
}

async function acquireLock(lockPath: string, attempt = 0): Promise<() => Promise<void>> {
  try {
    const handle = await fs.open(lockPath, "wx");
    return async () => {
      await handle.close();
      await removeIfPresent(lockPath);
    };
  } catch (error) {
    if (!isErrnoException(error) || (error.code !== "EEXIST" && error.code !== "EPERM")) {
      throw error;
    }
    const stats = await fs.stat(lockPath).catch((statError: unknown) => {
      if (isErrnoException(statError) && statError.code === "ENOENT") {
        return null;
      }
      throw statError;
    });
    if (!stats) {
      // released between open and stat
      return acquireLock(lockPath, attempt);
    }
    if (Date.now() - stats.mtimeMs > STALE_LOCK_AGE_MS) {
      await removeIfPresent(lockPath);
      return acquireLock(lockPath, 0);
    }
    if (attempt >= MAX_LOCK_RETRIES) {
      throw new Error("Unable to acquire database lock.");
    }
    await delay(LOCK_RETRY_DELAY_MS * (attempt + 1));
    return acquireLock(lockPath, attempt + 1);
  }
}

async function withLock<T>(fn: (dbFilePath: string) => Promise<T>): Promise<T> {
  const dbFilePath = getDatabaseFilePath();
  await fs.mkdir(path.dirname(dbFilePath), { recursive: true });
  const release = await acquireLock(lockPathFor(dbFilePath));
  try {
    return await fn(dbFilePath);
  } finally {
    await release();
  }
}

async function readSnapshot(dbFilePath: string): Promise<DatabaseSchema> {
  await ensureDatabaseFile(dbFilePath);
  const raw = await fs.readFile(dbFilePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  return normalizeSnapshot(parsed);
}

async function persist(dbFilePath: string, snapshot: DatabaseSchema) {
  await ensureDatabaseFile(dbFilePath);
  await fs.writeFile(dbFilePath, JSON.stringify(snapshot, null, 2));
}

/**
 * Missing collections come back empty. Records are trusted here: every write
 * goes through the record builders.
 */
function normalizeSnapshot(payload: unknown): DatabaseSchema {
  const baseline = createEmptyDatabaseState();
  if (!payload || typeof payload !== "object") {
    return baseline;
  }
  const ensureArray = <K extends keyof DatabaseSchema>(key: K): DatabaseSchema[K] => {
    const value: unknown = Reflect.get(payload, key);
    return Array.isArray(value) ? value : baseline[key];
  };
  return {
    projects: ensureArray("projects"),
    kpis: ensureArray("kpis"),
    budgets: ensureArray("budgets"),
    risks: ensureArray("risks")
  };
}

export async function readDatabase(): Promise<DatabaseSchema> {
  return withLock(async (dbFilePath) => readSnapshot(dbFilePath));
}

export async function writeDatabase(data: DatabaseSchema): Promise<DatabaseSchema> {
  return withLock(async (dbFilePath) => {
    await persist(dbFilePath, data);
    return data;
  });
}

export async function updateDatabase(
  mutator: (db: DatabaseSchema) => DatabaseSchema | Promise<DatabaseSchema>
): Promise<DatabaseSchema> {
  return withLock(async (dbFilePath) => {
    const current = await readSnapshot(dbFilePath);
    const updated = await mutator(current);
    await persist(dbFilePath, updated);
    return updated;
  });
}
