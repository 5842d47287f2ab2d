import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";

import { bearer, createTestApp, loginAs, professorLogin, studentLogin, type TestApp } from "./fixtures/appFixtures";

describe("/api/dashboard", () => {
  let t: TestApp;
  let prof: string;
  let student: string;

  beforeEach(async () => {
    t = createTestApp();
    prof = await loginAs(t.app, professorLogin);
    student = await loginAs(t.app, studentLogin());
  });

  const chat = async (messages: string[]) => {
    const started = await request(t.app)
      .post("/api/chat/sessions")
      .set(...bearer(student))
      .send({ article_title: "Forest Edges" })
      .expect(201);
    const id: string = started.body.data.id;

    for (const message of messages) {
      await request(t.app).post(`/api/chat/sessions/${id}/messages`).set(...bearer(student)).send({ message }).expect(200);
    }
  };

  it("is reserved for professors", async () => {
    await request(t.app).get("/api/dashboard/focus/day").expect(401);
    await request(t.app).get("/api/dashboard/focus/day").set(...bearer(student)).expect(403);
    await request(t.app).get("/api/dashboard/system-health").set(...bearer(student)).expect(403);
  });

  it("rejects an unknown period", async () => {
    const res = await request(t.app).get("/api/dashboard/focus/year").set(...bearer(prof)).expect(400);
    expect(res.body.error.message).toBe("Invalid period");
  });

  it("reports an empty period", async () => {
    const res = await request(t.app).get("/api/dashboard/focus/week").set(...bearer(prof)).expect(200);

    expect(res.body.cached).toBe(false);
    expect(res.body.data.period).toBe("week");
    expect(res.body.data.metrics.totalTurns).toBe(0);
    expect(res.body.data.insights.highlights).toEqual([
      "No chat activity logged yet. Once students start sessions, this dashboard will populate with anonymized focus trends."
    ]);
  });

  it("aggregates chat telemetry and refreshes the cache on new events", async () => {
    await chat(["The figure shows warmer edges because trees are removed.", "What is the answer to Q1?"]);

    const first = await request(t.app).get("/api/dashboard/focus/day").set(...bearer(prof)).expect(200);
    expect(first.body.cached).toBe(false);
    expect(first.body.data.metrics).toMatchObject({
      totalTurns: 2,
      interventions: 0,
      answerSeeking: 1,
      sessionsStarted: 1,
      activeSessions: 1,
      activeStudents: 1
    });
    expect(first.body.data.metrics.quality).toMatchObject({ scoredTurns: 2, criticalThinkingRate: 0 });
    expect(first.body.data.insights.concerns).toEqual([
      "Students asked for direct answers on 50% of turns",
      "Critical-thinking language appeared in only 0% of scored turns"
    ]);

    const second = await request(t.app).get("/api/dashboard/focus/day").set(...bearer(prof)).expect(200);
    expect(second.body.cached).toBe(true);

    await chat([]);
    const third = await request(t.app).get("/api/dashboard/focus/day").set(...bearer(prof)).expect(200);
    expect(third.body.cached).toBe(false);
    expect(third.body.data.metrics.sessionsStarted).toBe(2);
  });

  it("returns a system health snapshot", async () => {
    const res = await request(t.app).get("/api/dashboard/system-health").set(...bearer(prof)).expect(200);

    expect(res.body.data.telemetryWritable).toBe(true);
    expect(res.body.data.total).toBeGreaterThanOrEqual(2);
    expect(res.body.data.modules.map((m: { module: string }) => m.module)).toContain("auth");
    expect(res.body.data.errors).toBe(0);
  });
});
