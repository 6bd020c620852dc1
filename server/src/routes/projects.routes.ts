import { Router } from "express";
import { z } from "zod";
import {
  createProjectBudgetController,
  createProjectController,
  createProjectKpiController,
  createProjectRiskController,
  deleteProjectController,
  deleteProjectEntryController,
  getProjectController,
  listProjectBudgetsController,
  listProjectKpisController,
  listProjectRisksController,
  listProjectsController,
  updateProjectController,
  updateProjectRiskController
} from "../controllers/projects.controller";
import { validateRequest } from "../middleware/validateRequest";
import {
  entryBodySchema,
  projectListQuerySchema,
  projectUpdateSchema,
  riskUpdateSchema
} from "../utils/validation";

const router = Router();
const idParams = z.object({ id: z.string().trim().min(1) });
const entryParams = idParams.extend({ entryId: z.string().trim().min(1) });

router.get("/", validateRequest({ query: projectListQuerySchema }), listProjectsController);
router.post("/", validateRequest({ body: entryBodySchema }), createProjectController);
router.get("/:id", validateRequest({ params: idParams }), getProjectController);
router.patch("/:id", validateRequest({ params: idParams, body: projectUpdateSchema }), updateProjectController);
router.delete("/:id", validateRequest({ params: idParams }), deleteProjectController);

router.get("/:id/kpis", validateRequest({ params: idParams }), listProjectKpisController);
router.post("/:id/kpis", validateRequest({ params: idParams, body: entryBodySchema }), createProjectKpiController);
router.delete("/:id/kpis/:entryId", validateRequest({ params: entryParams }), deleteProjectEntryController("kpis"));

router.get("/:id/budgets", validateRequest({ params: idParams }), listProjectBudgetsController);
router.post("/:id/budgets", validateRequest({ params: idParams, body: entryBodySchema }), createProjectBudgetController);
router.delete(
  "/:id/budgets/:entryId",
  validateRequest({ params: entryParams }),
  deleteProjectEntryController("budgets")
);

router.get("/:id/risks", validateRequest({ params: idParams }), listProjectRisksController);
router.post("/:id/risks", validateRequest({ params: idParams, body: entryBodySchema }), createProjectRiskController);
router.patch(
  "/:id/risks/:entryId",
  validateRequest({ params: entryParams, body: riskUpdateSchema }),
  updateProjectRiskController
);
router.delete("/:id/risks/:entryId", validateRequest({ params: entryParams }), deleteProjectEntryController("risks"));

export default router;
