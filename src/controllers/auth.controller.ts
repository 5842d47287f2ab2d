import type { Request, Response } from "express";
import { z } from "zod";

import type { AppContext } from "../appContext";
import { getAuth } from "../auth/requireRole";
import { HttpError } from "../utils/httpError";

const loginSchema = z.discriminatedUnion("role", [
  z.object({ role: z.literal("guest"), user_id: z.string().max(64).optional() }),
  z.object({ role: z.literal("student"), user_id: z.string().min(1).max(64), access_code: z.string().min(1).max(64) }),
  z.object({ role: z.literal("professor"), user_id: z.string().min(1).max(64), password: z.string().min(1).max(256) })
]);

const weeklyCodeSchema = z.object({
  code: z.string().trim().min(4).max(64)
});

export const createAuthController = (ctx: AppContext) => ({
  async login(req: Request, res: Response) {
    const parsedBody = loginSchema.safeParse(req.body);
    if (!parsedBody.success) {
      throw new HttpError(400, "Invalid request body", parsedBody.error.flatten());
    }

    const session = ctx.auth.login(parsedBody.data);
    if (!session) {
      req.log.info({ role: parsedBody.data.role }, "auth_login_rejected");
      throw new HttpError(401, "Invalid credentials");
    }

    req.log.info({ role: session.role }, "auth_login");
    return res.status(200).json({
      ok: true,
      data: { token: session.token, role: session.role, user_id: session.user_id }
    });
  },

  async logout(req: Request, res: Response) {
    const revoked = ctx.auth.logout(getAuth(req).token);
    return res.status(200).json({ ok: true, data: { revoked } });
  },

  async rotateWeeklyCode(req: Request, res: Response) {
    const parsedBody = weeklyCodeSchema.safeParse(req.body);
    if (!parsedBody.success) {
      throw new HttpError(400, "Invalid request body", parsedBody.error.flatten());
    }

    const weeklyCode = ctx.auth.rotateWeeklyCode(parsedBody.data.code);
    req.log.info({ by: getAuth(req).user_id, expires_at: weeklyCode.expires_at }, "weekly_code_rotated");
    return res.status(200).json({ ok: true, data: weeklyCode });
  },

  async getRoster(_req: Request, res: Response) {
    const students = ctx.auth.getStudentRoster();
    return res.status(200).json({ ok: true, data: { students, total: students.length } });
  }
});
