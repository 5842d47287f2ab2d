import { Router } from "express";

import type { AppContext } from "../appContext";
import { requireRole } from "../auth/requireRole";
import { createDashboardController } from "../controllers/dashboard.controller";

export const createDashboardRouter = (ctx: AppContext): Router => {
  const dashboardRouter = Router();
  const dashboardController = createDashboardController(ctx);

  dashboardRouter.use(requireRole(ctx.auth, "professor"));

  dashboardRouter.get("/focus/:period", (req, res, next) => {
    dashboardController.getFocusDashboard(req, res).catch(next);
  });

  dashboardRouter.get("/system-health", (req, res, next) => {
    dashboardController.getSystemHealth(req, res).catch(next);
  });

  return dashboardRouter;
};
