export const DIVERGENCE_CATEGORIES = [
  "curiosity_driven",
  "definition_seeking",
  "comparison_distraction",
  "hypothesis_speculation",
  "meta_questions",
  "broad_scope"
] as const;

export type DivergenceCategory = (typeof DIVERGENCE_CATEGORIES)[number];

export const FOCUS_CATEGORIES = [
  "evidence_seeking",
  "specific_references",
  "analytical_language",
  "assignment_terms"
] as const;

export type FocusCategory = (typeof FOCUS_CATEGORIES)[number];

export type BloomLevel = "remember" | "understand" | "apply" | "analyze" | "evaluate" | "create";

export type ChatRole = "student" | "assistant";

export interface ChatTurn {
  role: ChatRole;
  content: string;
  timestamp: string;
}

export interface AssignmentQuestion {
  id: string;
  title: string;
  prompt: string;
  bloom_level?: BloomLevel;
  key_concepts?: string[];
  required_evidence?: string;
  word_target?: string;
  tutoring_prompts?: string[];
}

export interface AssignmentContext {
  assignment_title: string;
  total_word_count: string;
  current_question_id?: string;
  completed_question_ids: string[];
  all_questions: AssignmentQuestion[];
  evidence_found: string[];
}

export interface StudentProgressSnapshot {
  evidence_found: string[];
}

export const DRIFT_TYPES = [
  "focused",
  "slightly_unfocused",
  "moderately_divergent",
  "significantly_off_topic",
  "rabbit_hole"
] as const;

export type DriftType = (typeof DRIFT_TYPES)[number];

export const RECOMMENDATIONS = [
  "continue",
  "gentle_nudge",
  "redirect",
  "firm_redirect",
  "strong_redirect",
  "bridge_redirect",
  "motivational_redirect",
  "progress_redirect"
] as const;

export type Recommendation = (typeof RECOMMENDATIONS)[number];

export const INTERVENTION_URGENCIES = ["none", "low", "medium", "high"] as const;

export type InterventionUrgency = (typeof INTERVENTION_URGENCIES)[number];

export interface DivergenceCategoryScore {
  score: number;
  weight: number;
  contribution: number;
  indicators: string[];
}

export interface DivergenceSignals {
  indicators: string[];
  weighted_score: number;
  category_scores: Partial<Record<DivergenceCategory, DivergenceCategoryScore>>;
}

export interface FocusCategoryScore {
  score: number;
  signals: string[];
}

export interface FocusSignals {
  signals: string[];
  focus_strength: number;
  category_scores: Partial<Record<FocusCategory, FocusCategoryScore>>;
}

export interface ConversationFlow {
  stagnation_score: number;
  flow_pattern: "normal" | "circular";
  recent_progress: boolean;
  repetition_detected: boolean;
}

export interface ProgressStalling {
  stalling_score: number;
  evidence_gathering: boolean;
  analysis_depth: "surface" | "moderate" | "deep";
  question_engagement: "low" | "moderate" | "high";
}

export interface ContextFactors {
  semantic_relevance: number;
  conversation_flow: ConversationFlow;
  progress_stalling: ProgressStalling;
}

export interface DriftAnalysis {
  drift_score: number;
  drift_type: DriftType;
  confidence: number;
  indicators: string[];
  focus_signals: string[];
  recommendation: Recommendation;
  context_factors: ContextFactors;
}
