import type {
  ContextFactors,
  DriftAnalysis,
  DriftType,
  InterventionUrgency,
  Recommendation
} from "./focusTypes";

interface DriftBucket {
  below: number;
  drift_type: DriftType;
  recommendation: Recommendation;
}

// Lower bounds are inclusive: 0.2 is already slightly_unfocused.
const DRIFT_BUCKETS: readonly DriftBucket[] = [
  { below: 0.2, drift_type: "focused", recommendation: "continue" },
  { below: 0.4, drift_type: "slightly_unfocused", recommendation: "gentle_nudge" },
  { below: 0.6, drift_type: "moderately_divergent", recommendation: "redirect" },
  { below: 0.8, drift_type: "significantly_off_topic", recommendation: "firm_redirect" }
];

const RABBIT_HOLE: DriftBucket = { below: Number.POSITIVE_INFINITY, drift_type: "rabbit_hole", recommendation: "strong_redirect" };

export const DRIFT_WEIGHTS = {
  divergence: 0.4,
  focus: 0.3,
  stagnation: 0.2,
  stalling: 0.1
} as const;

export const hasIndicatorCategory = (indicators: readonly string[], category: string): boolean =>
  indicators.some((ind) => ind.includes(category));

export const classifyDrift = (
  driftScore: number,
  indicators: readonly string[],
  contextFactors: Pick<ContextFactors, "conversation_flow">
): { drift_type: DriftType; recommendation: Recommendation } => {
  const bucket = DRIFT_BUCKETS.find((b) => driftScore < b.below) ?? RABBIT_HOLE;

  let recommendation = bucket.recommendation;
  if (hasIndicatorCategory(indicators, "meta_questions") && driftScore > 0.5) {
    recommendation = "motivational_redirect";
  } else if (hasIndicatorCategory(indicators, "curiosity_driven") && driftScore < 0.6) {
    recommendation = "bridge_redirect";
  } else if (contextFactors.conversation_flow.repetition_detected) {
    recommendation = "progress_redirect";
  }

  return { drift_type: bucket.drift_type, recommendation };
};

export const estimateConfidence = (
  analysis: Pick<DriftAnalysis, "indicators" | "focus_signals" | "drift_score"> & {
    context_factors: Pick<ContextFactors, "semantic_relevance">;
  }
): number => {
  const signalCount = analysis.indicators.length + analysis.focus_signals.length;
  const base = Math.min(1, signalCount * 0.1);
  const agreementPenalty = Math.abs(analysis.context_factors.semantic_relevance - (1 - analysis.drift_score)) * 0.3;

  return Math.max(0.1, base - agreementPenalty);
};

type GateInput = Pick<DriftAnalysis, "drift_score" | "confidence" | "recommendation">;

export const shouldIntervene = (analysis: GateInput): boolean =>
  analysis.drift_score > 0.3 && analysis.confidence > 0.4 && analysis.recommendation !== "continue";

export const getInterventionUrgency = (analysis: Pick<DriftAnalysis, "drift_score" | "confidence">): InterventionUrgency => {
  const { drift_score: score, confidence } = analysis;

  if (score > 0.7 && confidence > 0.6) return "high";
  if (score > 0.5 && confidence > 0.5) return "medium";
  if (score > 0.3 && confidence > 0.4) return "low";
  return "none";
};
