import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";

import { ANSWER_SEEKING_REDIRECTIONS } from "../src/ai/answerSeekingGuard";
import { SAMPLE_ASSIGNMENT } from "./fixtures/assignmentFixtures";
import {
  TUTOR_REPLY,
  bearer,
  createTestApp,
  loginAs,
  professorLogin,
  studentLogin,
  type TestApp
} from "./fixtures/appFixtures";

const FOCUSED_MESSAGE = "The figure shows warmer edges because trees are removed.";
const META_MESSAGE = "Why should I care? Does this matter? What is the point of this?";

describe("/api/chat", () => {
  let t: TestApp;
  let prof: string;
  let student: string;
  let assignmentId: string;

  beforeEach(async () => {
    t = createTestApp();
    prof = await loginAs(t.app, professorLogin);
    student = await loginAs(t.app, studentLogin());

    const created = await request(t.app)
      .post("/api/assignment")
      .set(...bearer(prof))
      .send({ text: SAMPLE_ASSIGNMENT })
      .expect(201);
    assignmentId = created.body.data.assignment.id;
  });

  const startSession = async (token = student, body: Record<string, unknown> = {}) => {
    const res = await request(t.app)
      .post("/api/chat/sessions")
      .set(...bearer(token))
      .send({ article_title: "Forest Edges", article_context: "Edge habitat data", assignment_id: assignmentId, ...body })
      .expect(201);
    const id: string = res.body.data.id;
    return { id, session: res.body.data };
  };

  const say = (sessionId: string, message: string, token = student) =>
    request(t.app).post(`/api/chat/sessions/${sessionId}/messages`).set(...bearer(token)).send({ message });

  describe("starting a session", () => {
    it("opens with an intro that names the first question", async () => {
      const { session } = await startSession();

      expect(session.student_id).toBe("student01");
      expect(session.assignment_id).toBe(assignmentId);
      expect(session.messages).toHaveLength(1);
      expect(session.messages[0].role).toBe("assistant");
      expect(session.messages[0].content).toContain(
        "We'll begin with **Q1: Habitat Fragmentation Analysis**. What part of the article do you think speaks to it most directly?"
      );
    });

    it("asks about the research question without an assignment", async () => {
      const { session } = await startSession(student, { assignment_id: undefined });

      expect(session.messages[0].content.endsWith(
        "To start: what is the main research question the authors are trying to answer?"
      )).toBe(true);
    });

    it("rejects unknown assignments, missing titles and professors", async () => {
      await request(t.app)
        .post("/api/chat/sessions")
        .set(...bearer(student))
        .send({ article_title: "Forest Edges", assignment_id: "asg_missing" })
        .expect(404);
      await request(t.app).post("/api/chat/sessions").set(...bearer(student)).send({ article_title: " " }).expect(400);
      await request(t.app).post("/api/chat/sessions").set(...bearer(prof)).send({ article_title: "Forest Edges" }).expect(403);
    });

    it("lets a guest start a session", async () => {
      const guest = await loginAs(t.app, { role: "guest", user_id: "visitor" });
      const { session } = await startSession(guest);
      expect(session.student_id).toMatch(/^guest_visitor_[0-9a-f]{8}$/);
    });

    it("keeps a guest's session from a later guest using the same name", async () => {
      const first = await loginAs(t.app, { role: "guest", user_id: "alice" });
      const { id } = await startSession(first);
      await say(id, FOCUSED_MESSAGE, first).expect(200);

      const second = await loginAs(t.app, { role: "guest", user_id: "alice" });
      await request(t.app).get(`/api/chat/sessions/${id}`).set(...bearer(second)).expect(403);
      await say(id, FOCUSED_MESSAGE, second).expect(403);
    });
  });

  describe("chat turns", () => {
    it("passes a focused message to the tutor with the prior history", async () => {
      const { id } = await startSession();

      const res = await say(id, FOCUSED_MESSAGE).expect(200);

      expect(res.body.data.reply).toBe(TUTOR_REPLY);
      expect(res.body.data.source).toBe("tutor");
      expect(res.body.data.drift.recommendation).toBe("continue");
      expect(res.body.data.drift.drift_score).toBe(0);
      expect(res.body.data.urgency).toBe("none");

      expect(t.tutor.generateReply).toHaveBeenCalledTimes(1);
      const input = t.tutor.generateReply.mock.calls[0]?.[0];
      expect(input?.userMessage).toBe(FOCUSED_MESSAGE);
      expect(input?.history.map((m) => m.role)).toEqual(["assistant"]);
      expect(input?.articleContext).toBe("Edge habitat data");
      expect(input?.question?.id).toBe("Q1");

      const session = await request(t.app).get(`/api/chat/sessions/${id}`).set(...bearer(student)).expect(200);
      expect(session.body.data.messages.map((m: { role: string }) => m.role)).toEqual(["assistant", "student", "assistant"]);
      expect(session.body.data.messages[2].content).toBe(TUTOR_REPLY);
      expect(typeof session.body.data.duration_minutes).toBe("number");
    });

    it("redirects a relevance challenge back to the current question", async () => {
      const { id } = await startSession();
      await say(id, FOCUSED_MESSAGE).expect(200);

      const res = await say(id, META_MESSAGE).expect(200);

      expect(res.body.data.source).toBe("focus_redirect");
      expect(res.body.data.drift.recommendation).toBe("gentle_nudge");
      expect(res.body.data.drift.drift_type).toBe("slightly_unfocused");
      expect(res.body.data.urgency).toBe("low");
      expect(res.body.data.reply.split("\n")[0]).toBe(
        "Good thought. Let's tie it back to **Habitat Fragmentation Analysis** so it feeds into your written response."
      );
      expect(t.tutor.generateReply).toHaveBeenCalledTimes(1);
    });

    it("answers requests for the answer with a canned redirect", async () => {
      const { id } = await startSession();

      const res = await say(id, "Can you just give me the answer for Q1?").expect(200);

      expect(res.body.data.source).toBe("answer_seeking");
      expect(res.body.data.reply).toBe(ANSWER_SEEKING_REDIRECTIONS[0]);
      expect(t.tutor.generateReply).not.toHaveBeenCalled();
    });

    it("records telemetry for every turn", async () => {
      const { id } = await startSession();
      await say(id, FOCUSED_MESSAGE).expect(200);
      await say(id, META_MESSAGE).expect(200);
      await say(id, "What is the answer to Q1?").expect(200);

      const events = await t.ctx.telemetry.query({ from: new Date(Date.now() - 60_000), to: new Date(Date.now() + 1_000) });
      expect(events.map((e) => e.kind)).toEqual([
        "session_started",
        "chat_turn",
        "chat_turn",
        "focus_intervention",
        "chat_turn",
        "answer_seeking"
      ]);

      const intervention = events.find((e) => e.kind === "focus_intervention");
      expect(intervention).toMatchObject({ question_id: "Q1", recommendation: "gentle_nudge", urgency: "low" });
      expect(events[0]).toMatchObject({ actor_hash: t.ctx.telemetry.anonymizeActorId("student01") });
    });

    it("maps a tutor failure to 502 and logs a system error", async () => {
      t.tutor.generateReply.mockRejectedValueOnce(new Error("model offline"));
      const { id } = await startSession();

      const res = await say(id, FOCUSED_MESSAGE).expect(502);
      expect(res.body.error.message).toBe("Tutor reply failed");

      await new Promise((resolve) => setImmediate(resolve));
      const errors = await t.ctx.telemetry.query(
        { from: new Date(Date.now() - 60_000), to: new Date(Date.now() + 1_000) },
        { kind: ["system_error"] }
      );
      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatchObject({ status: 502, message: "Tutor reply failed" });
    });

    it("stores nothing for a failed turn so a retry is recorded once", async () => {
      t.tutor.generateReply.mockRejectedValueOnce(new Error("model offline"));
      const { id } = await startSession();

      await say(id, FOCUSED_MESSAGE).expect(502);
      const afterFailure = await request(t.app).get(`/api/chat/sessions/${id}`).set(...bearer(student)).expect(200);
      expect(afterFailure.body.data.messages).toHaveLength(1);

      await say(id, FOCUSED_MESSAGE).expect(200);
      const afterRetry = await request(t.app).get(`/api/chat/sessions/${id}`).set(...bearer(student)).expect(200);
      expect(afterRetry.body.data.messages.map((m: { role: string }) => m.role)).toEqual(["assistant", "student", "assistant"]);
      expect(t.tutor.generateReply.mock.calls[1]?.[0]?.history).toHaveLength(1);
    });

    it("scores the quality of each student turn", async () => {
      const { id } = await startSession();
      await say(id, FOCUSED_MESSAGE).expect(200);

      const [turn] = await t.ctx.telemetry.query(
        { from: new Date(Date.now() - 60_000), to: new Date(Date.now() + 1_000) },
        { kind: ["chat_turn"] }
      );
      expect(turn).toMatchObject({
        quality: { word_count: 9, question_complexity: 0, critical_thinking_present: false, synthesis_present: false }
      });
    });

    it("validates the message body", async () => {
      const { id } = await startSession();
      await say(id, "   ").expect(400);
      await say("no-such-session", FOCUSED_MESSAGE).expect(404);
    });
  });

  describe("ownership", () => {
    it("keeps sessions private to their owner", async () => {
      const { id } = await startSession();
      const other = await loginAs(t.app, studentLogin("student02"));

      await request(t.app).get(`/api/chat/sessions/${id}`).set(...bearer(other)).expect(403);
      await say(id, FOCUSED_MESSAGE, other).expect(403);
      await request(t.app).get(`/api/chat/sessions/${id}`).set(...bearer(prof)).expect(403);
    });

    it("lists own sessions for students and all sessions for professors", async () => {
      await startSession();
      const other = await loginAs(t.app, studentLogin("student02"));
      await startSession(other);

      const mine = await request(t.app).get("/api/chat/sessions").set(...bearer(student)).expect(200);
      expect(mine.body.data).toHaveLength(1);
      expect(mine.body.data[0]).toMatchObject({ student_id: "student01", article_title: "Forest Edges", message_count: 1 });

      const all = await request(t.app).get("/api/chat/sessions").set(...bearer(prof)).expect(200);
      expect(all.body.data).toHaveLength(2);
    });
  });

  describe("progress", () => {
    it("records evidence once", async () => {
      const { id } = await startSession();
      const path = `/api/chat/sessions/${id}/evidence`;

      await request(t.app).post(path).set(...bearer(student)).send({ evidence: "Table 2 patch sizes" }).expect(200);
      const res = await request(t.app).post(path).set(...bearer(student)).send({ evidence: " Table 2 patch sizes " }).expect(200);

      expect(res.body.data.evidence_found).toEqual(["Table 2 patch sizes"]);
    });

    it("selects and completes questions", async () => {
      const { id } = await startSession();
      const path = `/api/chat/sessions/${id}/question`;

      const selected = await request(t.app).post(path).set(...bearer(student)).send({ question_id: "Q2" }).expect(200);
      expect(selected.body.data.current_question_id).toBe("Q2");

      const completed = await request(t.app)
        .post(path)
        .set(...bearer(student))
        .send({ question_id: "Q2", action: "complete" })
        .expect(200);
      expect(completed.body.data).toEqual({ completed_question_ids: ["Q2"], evidence_found: [] });

      await request(t.app).post(path).set(...bearer(student)).send({ question_id: "Q9" }).expect(404);
    });

    it("refuses question updates on a session without an assignment", async () => {
      const { id } = await startSession(student, { assignment_id: undefined });

      await request(t.app)
        .post(`/api/chat/sessions/${id}/question`)
        .set(...bearer(student))
        .send({ question_id: "Q1" })
        .expect(409);
    });
  });

  describe("export", () => {
    it("exports JSON for the owner and markdown for a professor", async () => {
      const { id } = await startSession();
      await say(id, FOCUSED_MESSAGE).expect(200);

      const json = await request(t.app).get(`/api/chat/sessions/${id}/export`).set(...bearer(student)).expect(200);
      expect(json.body.data.session_id).toBe(id);
      expect(json.body.data.stats).toMatchObject({ total_messages: 3, student_messages: 1, tutor_messages: 2, student_words: 9 });

      const md = await request(t.app)
        .get(`/api/chat/sessions/${id}/export?format=markdown`)
        .set(...bearer(prof))
        .expect(200);
      expect(md.headers["content-type"]).toMatch(/^text\/markdown/);
      expect(md.text.split("\n")[0]).toBe("# Chat Transcript: Forest Edges");

      await request(t.app).get(`/api/chat/sessions/${id}/export?format=pdf`).set(...bearer(student)).expect(400);
    });
  });
});
