import { Router } from "express";
import {
  budgetVarianceAnalyticsController,
  healthAnalyticsController,
  riskMatrixAnalyticsController,
  roiAnalyticsController,
  trendAnalyticsController
} from "../controllers/analytics.controller";
import { validateRequest } from "../middleware/validateRequest";
import { analyticsQuerySchema } from "../utils/validation";

const router = Router();
const validateQuery = validateRequest({ query: analyticsQuerySchema });

router.get("/roi", validateQuery, roiAnalyticsController);
router.get("/health", validateQuery, healthAnalyticsController);
router.get("/trends", validateQuery, trendAnalyticsController);
router.get("/budget-variance", validateQuery, budgetVarianceAnalyticsController);
router.get("/risk-matrix", validateQuery, riskMatrixAnalyticsController);

export default router;
