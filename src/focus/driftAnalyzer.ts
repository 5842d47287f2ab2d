import { DRIFT_WEIGHTS, classifyDrift, estimateConfidence } from "./driftClassifier";
import type {
  AssignmentContext,
  AssignmentQuestion,
  ChatTurn,
  ContextFactors,
  DriftAnalysis
} from "./focusTypes";
import {
  conversationFlow,
  divergenceSignals,
  focusSignals,
  progressStalling,
  semanticRelevance
} from "./signalExtractors";

/**
 * Scores how far the latest student message drifts from the current
 * assignment question and picks a redirection strategy.
 *
 * Pure: every input is a snapshot owned by the caller, so the same inputs
 * always yield an identical analysis. Semantic relevance is reported in
 * `context_factors` and feeds confidence only, not the drift score.
 */
export const analyzeConversationDrift = (
  userInput: string,
  chatHistory: readonly ChatTurn[],
  currentQuestion?: AssignmentQuestion,
  assignmentContext?: AssignmentContext
): DriftAnalysis => {
  const divergence = divergenceSignals(userInput);
  const focus = focusSignals(userInput, currentQuestion);
  const flow = conversationFlow(chatHistory);
  const stalling = progressStalling(chatHistory, assignmentContext);

  const contextFactors: ContextFactors = {
    semantic_relevance: semanticRelevance(userInput, currentQuestion),
    conversation_flow: flow,
    progress_stalling: stalling
  };

  let score = 0;
  score += divergence.weighted_score * DRIFT_WEIGHTS.divergence;
  score -= focus.focus_strength * DRIFT_WEIGHTS.focus;
  score += flow.stagnation_score * DRIFT_WEIGHTS.stagnation;
  score += stalling.stalling_score * DRIFT_WEIGHTS.stalling;
  const driftScore = Math.max(0, Math.min(1, score));

  const { drift_type, recommendation } = classifyDrift(driftScore, divergence.indicators, contextFactors);

  const confidence = estimateConfidence({
    indicators: divergence.indicators,
    focus_signals: focus.signals,
    drift_score: driftScore,
    context_factors: contextFactors
  });

  return {
    drift_score: driftScore,
    drift_type,
    confidence,
    indicators: divergence.indicators,
    focus_signals: focus.signals,
    recommendation,
    context_factors: contextFactors
  };
};
