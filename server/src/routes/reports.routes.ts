import { Router } from "express";
import { reportController } from "../controllers/reports.controller";
import { validateRequest } from "../middleware/validateRequest";
import { analyticsQuerySchema } from "../utils/validation";

const router = Router();

router.get("/:kind", validateRequest({ query: analyticsQuerySchema }), reportController);

export default router;
