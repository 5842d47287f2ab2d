import { Router } from "express";

import type { AppContext } from "../appContext";
import { requireRole } from "../auth/requireRole";
import { createAssignmentController } from "../controllers/assignment.controller";

export const createAssignmentRouter = (ctx: AppContext): Router => {
  const assignmentRouter = Router();
  const assignmentController = createAssignmentController(ctx);
  const anyRole = requireRole(ctx.auth);

  assignmentRouter.post("/", requireRole(ctx.auth, "professor"), (req, res, next) => {
    assignmentController.create(req, res).catch(next);
  });

  assignmentRouter.get("/", anyRole, (req, res, next) => {
    assignmentController.list(req, res).catch(next);
  });

  assignmentRouter.get("/:id", anyRole, (req, res, next) => {
    assignmentController.get(req, res).catch(next);
  });

  return assignmentRouter;
};
