import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";

import { aggregateFocusMetrics, generateFocusInsights } from "../src/dashboard/dashboardAggregator";
import { DashboardCache } from "../src/dashboard/dashboardCache";
import { SystemMonitor, moduleForPath } from "../src/dashboard/systemMonitor";
import { TelemetryStore, periodToRange, type TelemetryEvent } from "../src/dashboard/telemetryStore";

const NOW = new Date(Date.UTC(2024, 8, 2, 12, 0));
const at = (minutesAgo: number): string => new Date(NOW.getTime() - minutesAgo * 60_000).toISOString();

const sampleEvents: TelemetryEvent[] = [
  { kind: "session_started", timestamp: at(30), actor_hash: "a1", session_id: "s1" },
  { kind: "session_started", timestamp: at(29), actor_hash: "a2", session_id: "s2", assignment_id: "asg_1" },
  {
    kind: "chat_turn",
    timestamp: at(20),
    actor_hash: "a1",
    session_id: "s1",
    source: "tutor",
    drift_score: 0,
    drift_type: "focused",
    recommendation: "continue",
    confidence: 0.4,
    urgency: "none",
    quality: {
      thoughtfulness_score: 20,
      critical_thinking_present: true,
      synthesis_present: false,
      spatial_reasoning_present: true,
      word_count: 12,
      question_complexity: 3,
      spatial_understanding_score: 4.5,
      gis_methods_mentioned: false,
      landscape_metrics_mentioned: false
    }
  },
  {
    kind: "chat_turn",
    timestamp: at(15),
    actor_hash: "a1",
    session_id: "s1",
    source: "focus_redirect",
    drift_score: 0.7,
    drift_type: "significantly_off_topic",
    recommendation: "firm_redirect",
    confidence: 0.8,
    urgency: "high"
  },
  {
    kind: "focus_intervention",
    timestamp: at(15),
    actor_hash: "a1",
    session_id: "s1",
    question_id: "Q1",
    drift_score: 0.7,
    drift_type: "significantly_off_topic",
    recommendation: "firm_redirect",
    confidence: 0.8,
    urgency: "high"
  },
  {
    kind: "chat_turn",
    timestamp: at(10),
    actor_hash: "a2",
    session_id: "s2",
    source: "answer_seeking",
    drift_score: 0.1,
    drift_type: "focused",
    recommendation: "continue",
    confidence: 0.6,
    urgency: "none"
  },
  { kind: "answer_seeking", timestamp: at(10), actor_hash: "a2", session_id: "s2" },
  { kind: "system_error", timestamp: at(5), endpoint: "/api/chat/sessions", status: 502, message: "Tutor reply failed" }
];

describe("aggregateFocusMetrics", () => {
  it("totals chat turns, interventions and distributions", () => {
    const metrics = aggregateFocusMetrics(sampleEvents);

    expect(metrics).toEqual({
      totalTurns: 3,
      interventions: 1,
      interventionRate: 0.333,
      interventionsByQuestion: { Q1: 1 },
      averageDriftScore: 0.267,
      averageConfidence: 0.6,
      driftTypes: {
        focused: 2,
        slightly_unfocused: 0,
        moderately_divergent: 0,
        significantly_off_topic: 1,
        rabbit_hole: 0
      },
      recommendations: {
        continue: 2,
        gentle_nudge: 0,
        redirect: 0,
        firm_redirect: 1,
        strong_redirect: 0,
        bridge_redirect: 0,
        motivational_redirect: 0,
        progress_redirect: 0
      },
      urgency: { none: 2, low: 0, medium: 0, high: 1 },
      answerSeeking: 1,
      sessionsStarted: 2,
      activeSessions: 2,
      activeStudents: 2,
      quality: {
        scoredTurns: 1,
        averageThoughtfulness: 20,
        averageQuestionComplexity: 3,
        averageWordCount: 12,
        criticalThinkingRate: 1,
        synthesisRate: 0
      }
    });
  });

  it("returns zeros for no events", () => {
    const metrics = aggregateFocusMetrics([]);
    expect(metrics.totalTurns).toBe(0);
    expect(metrics.interventionsByQuestion).toEqual({});
    expect(metrics.quality.scoredTurns).toBe(0);
    expect(metrics.interventionRate).toBe(0);
    expect(metrics.averageDriftScore).toBe(0);
  });
});

describe("generateFocusInsights", () => {
  it("explains an empty dashboard", () => {
    expect(generateFocusInsights(aggregateFocusMetrics([]))).toEqual({
      highlights: [
        "No chat activity logged yet. Once students start sessions, this dashboard will populate with anonymized focus trends."
      ],
      concerns: []
    });
  });

  it("flags high redirect and answer-seeking rates", () => {
    expect(generateFocusInsights(aggregateFocusMetrics(sampleEvents))).toEqual({
      highlights: ["67% of student turns stayed focused on the assignment"],
      concerns: [
        "Focus redirects on 33% of turns; consider clarifying question expectations",
        "Students asked for direct answers on 33% of turns"
      ]
    });
  });
});

describe("DashboardCache", () => {
  it("expires entries after their ttl", () => {
    let now = 1_000;
    const cache = new DashboardCache<number>({ now: () => now });

    cache.setCachedMetrics("dashboard:focus:day", 42, 30_000);
    expect(cache.getCachedMetrics("dashboard:focus:day")).toBe(42);

    now += 30_001;
    expect(cache.getCachedMetrics("dashboard:focus:day")).toBeNull();
  });

  it("computes once until invalidated", async () => {
    const cache = new DashboardCache<number>();
    const compute = vi.fn(async () => 7);

    await expect(cache.getOrCompute("dashboard:focus:week", 30_000, compute)).resolves.toEqual({ value: 7, cached: false });
    await expect(cache.getOrCompute("dashboard:focus:week", 30_000, compute)).resolves.toEqual({ value: 7, cached: true });
    expect(compute).toHaveBeenCalledTimes(1);

    cache.setCachedMetrics("other:key", 1, 30_000);
    cache.invalidateCache("dashboard:");
    expect(cache.getCachedMetrics("dashboard:focus:week")).toBeNull();
    expect(cache.getCachedMetrics("other:key")).toBe(1);

    cache.clearAllCache();
    expect(cache.getCachedMetrics("other:key")).toBeNull();
  });

  it("does not store a value computed across an invalidation", async () => {
    const cache = new DashboardCache<number>();
    let finish: (value: number) => void = () => undefined;
    const pending = cache.getOrCompute(
      "dashboard:focus:day",
      30_000,
      () => new Promise<number>((resolve) => {
        finish = resolve;
      })
    );

    cache.invalidateCache("dashboard:");
    finish(1);
    await expect(pending).resolves.toEqual({ value: 1, cached: false });

    await expect(cache.getOrCompute("dashboard:focus:day", 30_000, async () => 2)).resolves.toEqual({
      value: 2,
      cached: false
    });
    await expect(cache.getOrCompute("dashboard:focus:day", 30_000, async () => 3)).resolves.toEqual({
      value: 2,
      cached: true
    });
  });
});

describe("SystemMonitor", () => {
  it("maps request paths to modules", () => {
    expect(moduleForPath("/api/chat/sessions/abc/messages")).toBe("chat");
    expect(moduleForPath("/api/assignment")).toBe("assignment");
    expect(moduleForPath("/api/auth/login")).toBe("auth");
    expect(moduleForPath("/api/dashboard/focus/day")).toBe("dashboard");
    expect(moduleForPath("/health")).toBe("health");
    expect(moduleForPath("/favicon.ico")).toBe("other");
  });

  it("summarises recent requests", () => {
    let now = 10_000_000;
    const monitor = new SystemMonitor({ now: () => now });

    monitor.recordRequest({ timestamp: now - 7_200_000, durationMs: 999, status: 500, module: "chat" });
    monitor.recordRequest({ timestamp: now, durationMs: 10, status: 200, module: "chat" });
    monitor.recordRequest({ timestamp: now, durationMs: 20, status: 502, module: "chat" });
    monitor.recordRequest({ timestamp: now, durationMs: 30, status: 200, module: "auth" });
    monitor.recordRequest({ timestamp: now, durationMs: 40, status: 404, module: "auth" });
    now += 5_000;

    expect(monitor.getSnapshot(60 * 60 * 1000)).toEqual({
      uptimeSeconds: 5,
      total: 4,
      errors: 1,
      avgResponseTimeMs: 25,
      p95ResponseTimeMs: 40,
      errorRate: 0.25,
      modules: [
        { module: "chat", count: 2, errors: 1, errorRate: 0.5 },
        { module: "auth", count: 2, errors: 0, errorRate: 0 }
      ]
    });
  });

  it("keeps only the newest entries", () => {
    const monitor = new SystemMonitor({ maxEntries: 2, now: () => 0 });
    for (const durationMs of [1, 2, 3]) {
      monitor.recordRequest({ timestamp: 0, durationMs, status: 200, module: "health" });
    }
    expect(monitor.getSnapshot(1_000).total).toBe(2);
    expect(monitor.getSnapshot(1_000).avgResponseTimeMs).toBe(2.5);
  });
});

describe("periodToRange", () => {
  it("reaches back one day, week or month", () => {
    expect(periodToRange("day", NOW).from.toISOString()).toBe("2024-09-01T12:00:00.000Z");
    expect(periodToRange("week", NOW).from.toISOString()).toBe("2024-08-26T12:00:00.000Z");
    expect(periodToRange("month", NOW).from.toISOString()).toBe("2024-08-02T12:00:00.000Z");
    expect(periodToRange("month", NOW).to.toISOString()).toBe(NOW.toISOString());
  });
});

describe("TelemetryStore", () => {
  const tmpDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(tmpDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
  });

  const memoryStore = () => new TelemetryStore({ telemetryFile: null, salt: "test-salt", now: () => new Date(NOW) });

  it("anonymizes actor ids with the configured salt", () => {
    const store = memoryStore();
    const other = new TelemetryStore({ telemetryFile: null, salt: "other-salt" });

    expect(store.anonymizeActorId("student01")).toMatch(/^[0-9a-f]{64}$/);
    expect(store.anonymizeActorId("student01")).toBe(memoryStore().anonymizeActorId("student01"));
    expect(other.anonymizeActorId("student01")).not.toBe(store.anonymizeActorId("student01"));
  });

  it("queries recorded events by range and kind", async () => {
    const store = memoryStore();
    for (const event of sampleEvents) await store.record(event);

    const all = await store.query({ from: new Date(NOW.getTime() - 60 * 60_000), to: NOW });
    expect(all).toHaveLength(sampleEvents.length);

    const turns = await store.query({ from: new Date(NOW.getTime() - 60 * 60_000), to: NOW }, { kind: ["chat_turn"] });
    expect(turns).toHaveLength(3);

    const recent = await store.query({ from: new Date(NOW.getTime() - 12 * 60_000), to: NOW });
    expect(recent.map((e) => e.kind)).toEqual(["chat_turn", "answer_seeking", "system_error"]);
  });

  it("skips events outside retention and notifies listeners of the rest", async () => {
    const store = new TelemetryStore({ telemetryFile: null, retentionDays: 1, now: () => new Date(NOW) });
    const seen: string[] = [];
    store.onRecord((event) => seen.push(event.kind));

    await store.record({ kind: "answer_seeking", timestamp: "2024-08-01T00:00:00.000Z", session_id: "old" });
    await store.record({ kind: "answer_seeking", timestamp: "not a date", session_id: "bad" });
    await store.record({ kind: "answer_seeking", timestamp: at(1), session_id: "new" });

    expect(seen).toEqual(["answer_seeking"]);
    await expect(store.isWritable()).resolves.toBe(true);
  });

  it("reloads persisted events and drops corrupt lines", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "telemetry-"));
    tmpDirs.push(dir);
    const file = path.join(dir, "events.jsonl");

    const writer = new TelemetryStore({ telemetryFile: file, now: () => new Date(NOW) });
    await writer.record({ kind: "session_started", timestamp: at(3), session_id: "s1" });
    await writer.record({ kind: "answer_seeking", timestamp: at(2), session_id: "s1" });
    await fs.appendFile(file, "{not json\n", "utf8");

    const reader = new TelemetryStore({ telemetryFile: file, now: () => new Date(NOW) });
    const events = await reader.query({ from: new Date(NOW.getTime() - 60_000 * 10), to: NOW });

    expect(events.map((e) => e.kind)).toEqual(["session_started", "answer_seeking"]);
    expect((await fs.readFile(file, "utf8")).trim().split("\n")).toHaveLength(2);
    await expect(reader.isWritable()).resolves.toBe(true);
  });
});
