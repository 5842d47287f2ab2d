import type { Request, Response } from "express";
import { z } from "zod";

import type { AppContext } from "../appContext";
import {
  generateAssignmentPreview,
  parseAssignmentText,
  validateParsedAssignment
} from "../assignments/assignmentParser";
import type { StoredAssignment } from "../assignments/assignmentTypes";
import { getAuth } from "../auth/requireRole";
import { HttpError } from "../utils/httpError";

const createAssignmentSchema = z.object({
  text: z.string().min(20).max(200_000),
  assignment_type: z.string().min(1).max(64).optional()
});

const summarize = (a: StoredAssignment) => ({
  id: a.id,
  assignment_title: a.assignment_title,
  assignment_type: a.assignment_type,
  total_word_count: a.total_word_count,
  question_count: a.questions.length,
  created_at: a.created_at
});

export const createAssignmentController = (ctx: AppContext) => ({
  async create(req: Request, res: Response) {
    const parsedBody = createAssignmentSchema.safeParse(req.body);
    if (!parsedBody.success) {
      throw new HttpError(400, "Invalid request body", parsedBody.error.flatten());
    }

    const { text, assignment_type } = parsedBody.data;
    const parsed = parseAssignmentText(text, assignment_type);
    const validation = validateParsedAssignment(parsed);

    if (parsed.questions.length === 0) {
      throw new HttpError(422, "No questions were found in the assignment text", validation);
    }

    const stored = ctx.assignments.save(parsed, text, getAuth(req).user_id);
    req.log.info(
      { assignment_id: stored.id, questions: stored.questions.length, valid: validation.valid },
      "assignment_saved"
    );

    return res.status(201).json({
      ok: true,
      data: { assignment: stored, validation, preview: generateAssignmentPreview(stored) }
    });
  },

  async list(_req: Request, res: Response) {
    return res.status(200).json({ ok: true, data: ctx.assignments.list().map(summarize) });
  },

  async get(req: Request, res: Response) {
    const assignment = ctx.assignments.get(String(req.params.id));
    if (!assignment) throw new HttpError(404, "Assignment not found");

    return res.status(200).json({
      ok: true,
      data: { assignment, preview: generateAssignmentPreview(assignment) }
    });
  }
});
