import type { DriftType, InterventionUrgency, Recommendation } from "../focus";

export type DashboardPeriod = "day" | "week" | "month";

export interface QualityMetrics {
  scoredTurns: number;
  averageThoughtfulness: number;
  averageQuestionComplexity: number;
  averageWordCount: number;
  criticalThinkingRate: number;
  synthesisRate: number;
}

export interface FocusMetrics {
  totalTurns: number;
  interventions: number;
  interventionRate: number;
  /** Interventions per assignment question; turns without a question are not counted. */
  interventionsByQuestion: Record<string, number>;
  averageDriftScore: number;
  averageConfidence: number;
  driftTypes: Record<DriftType, number>;
  recommendations: Record<Recommendation, number>;
  urgency: Record<InterventionUrgency, number>;
  answerSeeking: number;
  sessionsStarted: number;
  activeSessions: number;
  activeStudents: number;
  quality: QualityMetrics;
}

export interface InsightSet {
  highlights: string[];
  concerns: string[];
}

export interface FocusDashboardResponse {
  period: DashboardPeriod;
  timestamp: string;
  range: { from: string; to: string };
  metrics: FocusMetrics;
  insights: InsightSet;
}

export interface ModuleHealth {
  module: string;
  count: number;
  errors: number;
  errorRate: number;
}

export interface SystemHealthSnapshot {
  uptimeSeconds: number;
  total: number;
  errors: number;
  avgResponseTimeMs: number;
  p95ResponseTimeMs: number;
  errorRate: number;
  modules: ModuleHealth[];
}
