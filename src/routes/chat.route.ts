import { Router } from "express";

import type { AppContext } from "../appContext";
import { requireRole } from "../auth/requireRole";
import { createChatController } from "../controllers/chat.controller";

export const createChatRouter = (ctx: AppContext): Router => {
  const chatRouter = Router();
  const chatController = createChatController(ctx);
  const learner = requireRole(ctx.auth, "student", "guest");
  const anyRole = requireRole(ctx.auth);

  chatRouter.post("/sessions", learner, (req, res, next) => {
    chatController.startSession(req, res).catch(next);
  });

  chatRouter.get("/sessions", anyRole, (req, res, next) => {
    chatController.listSessions(req, res).catch(next);
  });

  chatRouter.get("/sessions/:id", learner, (req, res, next) => {
    chatController.getSession(req, res).catch(next);
  });

  chatRouter.post("/sessions/:id/messages", learner, (req, res, next) => {
    chatController.postMessage(req, res).catch(next);
  });

  chatRouter.post("/sessions/:id/evidence", learner, (req, res, next) => {
    chatController.recordEvidence(req, res).catch(next);
  });

  chatRouter.post("/sessions/:id/question", learner, (req, res, next) => {
    chatController.updateQuestion(req, res).catch(next);
  });

  chatRouter.get("/sessions/:id/export", anyRole, (req, res, next) => {
    chatController.exportSession(req, res).catch(next);
  });

  return chatRouter;
};
