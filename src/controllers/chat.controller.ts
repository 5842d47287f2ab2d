import type { Request, Response } from "express";
import { z } from "zod";

import { detectAnswerSeeking, redirectAnswerSeeking } from "../ai/answerSeekingGuard";
import type { AppContext } from "../appContext";
import { getAuth } from "../auth/requireRole";
import { messageQuality } from "../evaluation/messageQuality";
import {
  analyzeConversationDrift,
  generateRedirectionResponse,
  getInterventionUrgency,
  shouldIntervene
} from "../focus";
import {
  buildAssignmentContext,
  formatTranscriptMarkdown,
  resolveCurrentQuestion,
  type ChatSession
} from "../session/chatSessionStore";
import { HttpError } from "../utils/httpError";

export type ReplySource = "answer_seeking" | "focus_redirect" | "tutor";

const startSessionSchema = z.object({
  article_title: z.string().trim().min(1).max(300),
  article_context: z.string().max(100_000).default(""),
  knowledge_context: z.string().max(20_000).optional(),
  assignment_id: z.string().min(1).max(64).optional()
});

const messageSchema = z.object({
  message: z.string().trim().min(1).max(4_000)
});

const evidenceSchema = z.object({
  evidence: z.string().trim().min(1).max(1_000)
});

const questionSchema = z.object({
  question_id: z.string().min(1).max(16),
  action: z.enum(["select", "complete"]).default("select")
});

const exportQuerySchema = z.object({
  format: z.enum(["json", "markdown"]).default("json")
});

const introMessage = (articleTitle: string, firstQuestion?: { id: string; title: string }): string => {
  const opening = `Welcome! Let's explore "${articleTitle}" together. I won't hand you answers, but I will ask questions that help you work them out from the article.`;
  if (!firstQuestion) {
    return `${opening}\n\nTo start: what is the main research question the authors are trying to answer?`;
  }
  return `${opening}\n\nWe'll begin with **${firstQuestion.id}: ${firstQuestion.title}**. What part of the article do you think speaks to it most directly?`;
};

export const createChatController = (ctx: AppContext) => {
  const actorHash = (req: Request): string => ctx.telemetry.anonymizeActorId(getAuth(req).user_id);

  /** Loads the session and checks that the caller owns it (or is a professor, when allowed). */
  const loadSession = (req: Request, opts?: { allowProfessor?: boolean }): ChatSession => {
    const session = ctx.sessions.getSession(String(req.params.id));
    if (!session) throw new HttpError(404, "Session not found");

    const auth = getAuth(req);
    const isOwner = auth.role !== "professor" && session.student_id === auth.user_id;
    if (!isOwner && !(opts?.allowProfessor && auth.role === "professor")) {
      throw new HttpError(403, "Forbidden");
    }
    return session;
  };

  return {
    async startSession(req: Request, res: Response) {
      const parsedBody = startSessionSchema.safeParse(req.body);
      if (!parsedBody.success) {
        throw new HttpError(400, "Invalid request body", parsedBody.error.flatten());
      }

      const { assignment_id } = parsedBody.data;
      const assignment = assignment_id ? ctx.assignments.get(assignment_id) : null;
      if (assignment_id && !assignment) throw new HttpError(404, "Assignment not found");

      const created = ctx.sessions.createSession({ ...parsedBody.data, student_id: getAuth(req).user_id });
      const intro = introMessage(created.article_title, resolveCurrentQuestion(created, assignment));
      ctx.sessions.addMessage(created.id, "assistant", intro);

      await ctx.telemetry.record({
        kind: "session_started",
        timestamp: new Date().toISOString(),
        actor_hash: actorHash(req),
        session_id: created.id,
        assignment_id
      });
      req.log.info({ session_id: created.id, assignment_id }, "chat_session_started");

      return res.status(201).json({ ok: true, data: ctx.sessions.getSession(created.id) });
    },

    async listSessions(req: Request, res: Response) {
      const auth = getAuth(req);
      const sessions = ctx.sessions.listSessions(auth.role === "professor" ? undefined : { student_id: auth.user_id });

      return res.status(200).json({
        ok: true,
        data: sessions.map((s) => ({
          id: s.id,
          student_id: s.student_id,
          article_title: s.article_title,
          assignment_id: s.assignment_id,
          started_at: s.started_at,
          message_count: s.messages.length
        }))
      });
    },

    async getSession(req: Request, res: Response) {
      const session = loadSession(req);
      return res.status(200).json({
        ok: true,
        data: { ...session, duration_minutes: Number(ctx.sessions.sessionDurationMinutes(session.id).toFixed(1)) }
      });
    },

    async postMessage(req: Request, res: Response) {
      const session = loadSession(req);
      const parsedBody = messageSchema.safeParse(req.body);
      if (!parsedBody.success) {
        throw new HttpError(400, "Invalid request body", parsedBody.error.flatten());
      }

      const message = parsedBody.data.message;
      const prior = session.messages;

      const assignment = session.assignment_id ? ctx.assignments.get(session.assignment_id) : null;
      const question = resolveCurrentQuestion(session, assignment);
      const assignmentContext = buildAssignmentContext(session, assignment);

      const drift = analyzeConversationDrift(message, prior, question, assignmentContext);
      const urgency = getInterventionUrgency(drift);
      const answerSeeking = detectAnswerSeeking(message);

      let source: ReplySource;
      let reply: string;
      if (answerSeeking) {
        source = "answer_seeking";
        reply = redirectAnswerSeeking(ctx.random);
      } else if (shouldIntervene(drift)) {
        source = "focus_redirect";
        reply = generateRedirectionResponse(drift, question, assignmentContext, {
          evidence_found: session.progress.evidence_found
        });
      } else {
        source = "tutor";
        try {
          reply = await ctx.tutor.generateReply({
            userMessage: message,
            history: prior,
            articleContext: session.article_context,
            knowledgeContext: session.knowledge_context,
            question
          });
        } catch (err) {
          req.log.error({ err, session_id: session.id }, "tutor_reply_failed");
          throw new HttpError(502, "Tutor reply failed");
        }
      }

      // Both turns are stored only once a reply exists.
      ctx.sessions.addMessage(session.id, "student", message);
      ctx.sessions.addMessage(session.id, "assistant", reply);

      const timestamp = new Date().toISOString();
      const actor_hash = actorHash(req);
      const driftFields = {
        drift_score: drift.drift_score,
        drift_type: drift.drift_type,
        recommendation: drift.recommendation,
        confidence: drift.confidence,
        urgency
      };

      await ctx.telemetry.record({
        kind: "chat_turn",
        timestamp,
        actor_hash,
        session_id: session.id,
        source,
        ...driftFields,
        quality: messageQuality(message)
      });

      if (answerSeeking) {
        await ctx.telemetry.record({ kind: "answer_seeking", timestamp, actor_hash, session_id: session.id });
      }

      if (source === "focus_redirect") {
        await ctx.telemetry.record({
          kind: "focus_intervention",
          timestamp,
          actor_hash,
          session_id: session.id,
          question_id: question?.id,
          ...driftFields
        });
        req.log.info(
          { session_id: session.id, recommendation: drift.recommendation, drift_score: drift.drift_score, urgency },
          "focus_intervention"
        );
      }

      return res.status(200).json({ ok: true, data: { reply, source, drift, urgency } });
    },

    async recordEvidence(req: Request, res: Response) {
      const session = loadSession(req);
      const parsedBody = evidenceSchema.safeParse(req.body);
      if (!parsedBody.success) {
        throw new HttpError(400, "Invalid request body", parsedBody.error.flatten());
      }

      ctx.sessions.recordEvidence(session.id, parsedBody.data.evidence);
      return res.status(200).json({ ok: true, data: ctx.sessions.getSession(session.id)?.progress });
    },

    async updateQuestion(req: Request, res: Response) {
      const session = loadSession(req);
      const parsedBody = questionSchema.safeParse(req.body);
      if (!parsedBody.success) {
        throw new HttpError(400, "Invalid request body", parsedBody.error.flatten());
      }

      if (!session.assignment_id) throw new HttpError(409, "Session has no assignment");

      const { question_id, action } = parsedBody.data;
      if (!ctx.assignments.getQuestion(session.assignment_id, question_id)) {
        throw new HttpError(404, "Question not found");
      }

      if (action === "complete") {
        ctx.sessions.completeQuestion(session.id, question_id);
      } else {
        ctx.sessions.setCurrentQuestion(session.id, question_id);
      }

      return res.status(200).json({ ok: true, data: ctx.sessions.getSession(session.id)?.progress });
    },

    async exportSession(req: Request, res: Response) {
      const session = loadSession(req, { allowProfessor: true });
      const parsedQuery = exportQuerySchema.safeParse(req.query);
      if (!parsedQuery.success) {
        throw new HttpError(400, "Invalid query", parsedQuery.error.flatten());
      }

      const exported = ctx.sessions.exportSession(session.id);
      if (!exported) throw new HttpError(404, "Session not found");

      if (parsedQuery.data.format === "markdown") {
        return res.status(200).type("text/markdown").send(formatTranscriptMarkdown(exported));
      }
      return res.status(200).json({ ok: true, data: exported });
    }
  };
};
