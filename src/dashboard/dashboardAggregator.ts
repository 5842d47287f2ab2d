import type { DriftType, InterventionUrgency, Recommendation } from "../focus";
import type { MessageQuality } from "../evaluation/messageQuality";
import type { FocusMetrics, InsightSet, QualityMetrics } from "./dashboardTypes";
import type { ChatTurnEvent, FocusInterventionEvent, TelemetryEvent } from "./telemetryStore";

const emptyDriftTypes = (): Record<DriftType, number> => ({
  focused: 0,
  slightly_unfocused: 0,
  moderately_divergent: 0,
  significantly_off_topic: 0,
  rabbit_hole: 0
});

const emptyRecommendations = (): Record<Recommendation, number> => ({
  continue: 0,
  gentle_nudge: 0,
  redirect: 0,
  firm_redirect: 0,
  strong_redirect: 0,
  bridge_redirect: 0,
  motivational_redirect: 0,
  progress_redirect: 0
});

const emptyUrgency = (): Record<InterventionUrgency, number> => ({ none: 0, low: 0, medium: 0, high: 0 });

const safeAvg = (values: number[]): number => {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
};

const round3 = (n: number): number => Number(n.toFixed(3));

const rate = (count: number, total: number): number => (total === 0 ? 0 : round3(count / total));

const aggregateQuality = (turns: readonly ChatTurnEvent[]): QualityMetrics => {
  const scored = turns.map((t) => t.quality).filter((q): q is MessageQuality => q !== undefined);

  return {
    scoredTurns: scored.length,
    averageThoughtfulness: round3(safeAvg(scored.map((q) => q.thoughtfulness_score))),
    averageQuestionComplexity: round3(safeAvg(scored.map((q) => q.question_complexity))),
    averageWordCount: round3(safeAvg(scored.map((q) => q.word_count))),
    criticalThinkingRate: rate(scored.filter((q) => q.critical_thinking_present).length, scored.length),
    synthesisRate: rate(scored.filter((q) => q.synthesis_present).length, scored.length)
  };
};

export const aggregateFocusMetrics = (events: readonly TelemetryEvent[]): FocusMetrics => {
  const turns = events.filter((e): e is ChatTurnEvent => e.kind === "chat_turn");

  const driftTypes = emptyDriftTypes();
  const recommendations = emptyRecommendations();
  const urgency = emptyUrgency();
  for (const t of turns) {
    driftTypes[t.drift_type] += 1;
    recommendations[t.recommendation] += 1;
    urgency[t.urgency] += 1;
  }

  const interventionEvents = events.filter((e): e is FocusInterventionEvent => e.kind === "focus_intervention");
  const interventions = interventionEvents.length;
  const interventionsByQuestion: Record<string, number> = {};
  for (const e of interventionEvents) {
    if (e.question_id) interventionsByQuestion[e.question_id] = (interventionsByQuestion[e.question_id] ?? 0) + 1;
  }
  const actors = new Set(turns.map((t) => t.actor_hash).filter((a): a is string => Boolean(a)));

  return {
    totalTurns: turns.length,
    interventions,
    interventionRate: rate(interventions, turns.length),
    interventionsByQuestion,
    averageDriftScore: round3(safeAvg(turns.map((t) => t.drift_score))),
    averageConfidence: round3(safeAvg(turns.map((t) => t.confidence))),
    driftTypes,
    recommendations,
    urgency,
    answerSeeking: events.filter((e) => e.kind === "answer_seeking").length,
    sessionsStarted: events.filter((e) => e.kind === "session_started").length,
    activeSessions: new Set(turns.map((t) => t.session_id)).size,
    activeStudents: actors.size,
    quality: aggregateQuality(turns)
  };
};

export const generateFocusInsights = (metrics: FocusMetrics): InsightSet => {
  const highlights: string[] = [];
  const concerns: string[] = [];

  if (metrics.totalTurns === 0) {
    highlights.push("No chat activity logged yet. Once students start sessions, this dashboard will populate with anonymized focus trends.");
    return { highlights, concerns };
  }

  const focusedShare = metrics.driftTypes.focused / metrics.totalTurns;
  highlights.push(`${(focusedShare * 100).toFixed(0)}% of student turns stayed focused on the assignment`);

  if (metrics.interventionRate > 0.3) {
    concerns.push(`Focus redirects on ${(metrics.interventionRate * 100).toFixed(0)}% of turns; consider clarifying question expectations`);
  }

  const answerSeekingRate = metrics.answerSeeking / metrics.totalTurns;
  if (answerSeekingRate > 0.1) {
    concerns.push(`Students asked for direct answers on ${(answerSeekingRate * 100).toFixed(0)}% of turns`);
  }

  if (metrics.quality.scoredTurns > 0 && metrics.quality.criticalThinkingRate < 0.2) {
    concerns.push(
      `Critical-thinking language appeared in only ${(metrics.quality.criticalThinkingRate * 100).toFixed(0)}% of scored turns`
    );
  }

  if (metrics.recommendations.motivational_redirect > 0) {
    concerns.push(`${metrics.recommendations.motivational_redirect} turn(s) questioned the relevance of the assignment`);
  }

  if (metrics.recommendations.progress_redirect > 0) {
    concerns.push(`${metrics.recommendations.progress_redirect} turn(s) showed repetitive or circular questioning`);
  }

  return { highlights, concerns };
};
