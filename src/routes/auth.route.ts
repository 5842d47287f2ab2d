import { Router } from "express";

import type { AppContext } from "../appContext";
import { requireRole } from "../auth/requireRole";
import { createAuthController } from "../controllers/auth.controller";

export const createAuthRouter = (ctx: AppContext): Router => {
  const authRouter = Router();
  const authController = createAuthController(ctx);
  const professorOnly = requireRole(ctx.auth, "professor");

  authRouter.post("/login", (req, res, next) => {
    authController.login(req, res).catch(next);
  });

  authRouter.post("/logout", requireRole(ctx.auth), (req, res, next) => {
    authController.logout(req, res).catch(next);
  });

  authRouter.post("/weekly-code", professorOnly, (req, res, next) => {
    authController.rotateWeeklyCode(req, res).catch(next);
  });

  authRouter.get("/roster", professorOnly, (req, res, next) => {
    authController.getRoster(req, res).catch(next);
  });

  return authRouter;
};
