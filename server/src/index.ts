import cors from "cors";
import express from "express";
import morgan from "morgan";
import { env } from "./config/env";
import healthRoutes from "./routes/_health.routes";
import projectsRoutes from "./routes/projects.routes";
import analyticsRoutes from "./routes/analytics.routes";
import reportsRoutes from "./routes/reports.routes";
import { errorHandler } from "./middleware/httpError";
import { getAnalyticsConfig } from "./services/analytics.service";

export function createApp() {
  const app = express();
  app.use(cors({ origin: env.clientOrigin, credentials: true }));
  app.use(express.json({ limit: "1mb" }));
  if (env.nodeEnv !== "test") {
    app.use(morgan("dev"));
  }

  app.use("/api", healthRoutes);
  app.use("/api/projects", projectsRoutes);
  app.use("/api/analytics", analyticsRoutes);
  app.use("/api/reports", reportsRoutes);

  app.use(errorHandler);

  return app;
}

export const app = createApp();

if (require.main === module) {
  // fail fast on a bad analytics config instead of on the first request
  getAnalyticsConfig();
  app.listen(env.port, () => {
    console.log(`Portfolio analytics API ready on http://localhost:${env.port}`);
  });
}
