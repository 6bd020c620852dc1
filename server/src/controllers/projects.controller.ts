import { NextFunction, Request, Response } from "express";
import {
  createBudgetEntry,
  createKpiEntry,
  createProject,
  createRiskEntry,
  deleteEntry,
  deleteProject,
  getProjectById,
  listBudgets,
  listKpis,
  listProjects,
  listRisks,
  updateProject,
  updateRiskEntry
} from "../data/repositories";
import { NotFoundError } from "../middleware/httpError";
import { Project } from "../models/_types";
import { projectListQuerySchema, projectUpdateSchema, riskUpdateSchema } from "../utils/validation";

async function requireProject(id: string): Promise<Project> {
  const project = await getProjectById(id);
  if (!project) {
    throw new NotFoundError("Project not found.");
  }
  return project;
}

export async function listProjectsController(req: Request, res: Response, next: NextFunction) {
  try {
    const filter = projectListQuerySchema.parse(req.query);
    const projects = await listProjects(filter);
    res.json({ projects });
  } catch (error) {
    next(error);
  }
}

export async function createProjectController(req: Request, res: Response, next: NextFunction) {
  try {
    const project = await createProject(req.body);
    res.status(201).json({ project });
  } catch (error) {
    next(error);
  }
}

export async function getProjectController(req: Request, res: Response, next: NextFunction) {
  try {
    const project = await requireProject(req.params.id);
    res.json({ project });
  } catch (error) {
    next(error);
  }
}

export async function updateProjectController(req: Request, res: Response, next: NextFunction) {
  try {
    const project = await updateProject(req.params.id, projectUpdateSchema.parse(req.body));
    res.json({ project });
  } catch (error) {
    next(error);
  }
}

export async function deleteProjectController(req: Request, res: Response, next: NextFunction) {
  try {
    const removed = await deleteProject(req.params.id);
    if (!removed) {
      throw new NotFoundError("Project not found.");
    }
    res.status(204).send();
  } catch (error) {
    next(error);
  }
}

// KPIs

export async function listProjectKpisController(req: Request, res: Response, next: NextFunction) {
  try {
    await requireProject(req.params.id);
    const kpis = await listKpis(req.params.id);
    res.json({ kpis });
  } catch (error) {
    next(error);
  }
}

export async function createProjectKpiController(req: Request, res: Response, next: NextFunction) {
  try {
    const kpi = await createKpiEntry({ ...req.body, projectId: req.params.id });
    res.status(201).json({ kpi });
  } catch (error) {
    next(error);
  }
}

// Budgets

export async function listProjectBudgetsController(req: Request, res: Response, next: NextFunction) {
  try {
    await requireProject(req.params.id);
    const budgets = await listBudgets(req.params.id);
    res.json({ budgets });
  } catch (error) {
    next(error);
  }
}

export async function createProjectBudgetController(req: Request, res: Response, next: NextFunction) {
  try {
    const budget = await createBudgetEntry({ ...req.body, projectId: req.params.id });
    res.status(201).json({ budget });
  } catch (error) {
    next(error);
  }
}

// Risks

export async function listProjectRisksController(req: Request, res: Response, next: NextFunction) {
  try {
    await requireProject(req.params.id);
    const risks = await listRisks(req.params.id);
    res.json({ risks });
  } catch (error) {
    next(error);
  }
}

export async function createProjectRiskController(req: Request, res: Response, next: NextFunction) {
  try {
    const risk = await createRiskEntry({ ...req.body, projectId: req.params.id });
    res.status(201).json({ risk });
  } catch (error) {
    next(error);
  }
}

export async function updateProjectRiskController(req: Request, res: Response, next: NextFunction) {
  try {
    const risk = await updateRiskEntry(req.params.id, req.params.entryId, riskUpdateSchema.parse(req.body));
    res.json({ risk });
  } catch (error) {
    next(error);
  }
}

export function deleteProjectEntryController(collection: "kpis" | "budgets" | "risks") {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const removed = await deleteEntry(collection, req.params.id, req.params.entryId);
      if (!removed) {
        throw new NotFoundError("Entry not found.");
      }
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  };
}
