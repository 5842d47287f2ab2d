import {
  DIVERGENCE_INDICATORS,
  FOCUS_INDICATORS,
  PROGRESS_PHRASES,
  QUESTION_MARKER_WORDS,
  QUESTION_WORD_PATTERN,
  STALLING_ANALYSIS_KEYWORDS,
  STALLING_EVIDENCE_KEYWORDS
} from "./focusIndicators";
import type {
  AssignmentContext,
  AssignmentQuestion,
  ChatTurn,
  ConversationFlow,
  DivergenceSignals,
  FocusSignals,
  ProgressStalling
} from "./focusTypes";

const NEUTRAL_RELEVANCE = 0.5;
const REPETITION_THRESHOLD = 0.7;
const CIRCULAR_FREQUENCY_THRESHOLD = 0.6;
const FLOW_WINDOW = 6;
const STALLING_WINDOW = 10;

const clamp01 = (value: number): number => Math.max(0, Math.min(1, value));

export const wordSet = (text: string): Set<string> => {
  const matches = text.toLowerCase().match(/[\p{L}\p{N}_]+/gu);
  return new Set(matches ?? []);
};

export const jaccardSimilarity = (a: string, b: string): number => {
  const wordsA = wordSet(a);
  const wordsB = wordSet(b);
  if (wordsA.size === 0 || wordsB.size === 0) return 0;

  let intersection = 0;
  for (const w of wordsA) {
    if (wordsB.has(w)) intersection += 1;
  }
  const union = wordsA.size + wordsB.size - intersection;
  return union === 0 ? 0 : intersection / union;
};

const matchingKeyConcepts = (lowerInput: string, question?: AssignmentQuestion): string[] => {
  if (!question) return [];
  return (question.key_concepts ?? [])
    .map((c) => c.toLowerCase())
    .filter((c) => c.length > 0 && lowerInput.includes(c));
};

export const semanticRelevance = (userInput: string, question?: AssignmentQuestion): number => {
  if (!question) return NEUTRAL_RELEVANCE;

  const inputWords = wordSet(userInput);
  const questionWords = wordSet(question.prompt);

  let overlap = 0;
  for (const w of inputWords) {
    if (questionWords.has(w)) overlap += 1;
  }

  const overlapScore = overlap / Math.max(inputWords.size, 1);
  const conceptBoost = matchingKeyConcepts(userInput.toLowerCase(), question).length * 0.1;

  return Math.min(1, overlapScore + conceptBoost);
};

export const divergenceSignals = (userInput: string): DivergenceSignals => {
  const result: DivergenceSignals = { indicators: [], weighted_score: 0, category_scores: {} };
  const lower = userInput.toLowerCase();

  for (const { category, keywords, patterns, weight } of DIVERGENCE_INDICATORS) {
    let score = 0;
    const found: string[] = [];

    for (const kw of keywords) {
      if (lower.includes(kw)) {
        found.push(`keyword: ${kw}`);
        score += 0.3;
      }
    }

    for (const re of patterns) {
      const match = re.exec(userInput);
      if (match) {
        found.push(`pattern: ${match[0]}`);
        score += 0.4;
      }
    }

    if (found.length === 0) continue;

    const contribution = Math.min(1, score) * weight;
    result.weighted_score += contribution;
    result.category_scores[category] = { score, weight, contribution, indicators: found };
    result.indicators.push(...found.map((f) => `${category}: ${f}`));
  }

  result.weighted_score = clamp01(result.weighted_score);
  return result;
};

export const focusSignals = (userInput: string, question?: AssignmentQuestion): FocusSignals => {
  const result: FocusSignals = { signals: [], focus_strength: 0, category_scores: {} };
  const lower = userInput.toLowerCase();

  for (const { category, keywords } of FOCUS_INDICATORS) {
    const found = keywords.filter((kw) => lower.includes(kw));
    if (found.length === 0) continue;

    const score = Math.min(1, found.length * 0.2);
    result.category_scores[category] = { score, signals: found };
    result.signals.push(...found.map((s) => `${category}: ${s}`));
    result.focus_strength += score * 0.25;
  }

  for (const concept of matchingKeyConcepts(lower, question)) {
    result.signals.push(`question_concept: ${concept}`);
    result.focus_strength += 0.1;
  }

  result.focus_strength = clamp01(result.focus_strength);
  return result;
};

export const detectCircularQuestioning = (studentTurns: readonly ChatTurn[]): boolean => {
  if (studentTurns.length < 3) return false;

  const leadWords: string[] = [];
  for (const turn of studentTurns) {
    const content = turn.content.toLowerCase();
    const looksLikeQuestion = content.includes("?") || QUESTION_MARKER_WORDS.some((w) => content.includes(w));
    if (!looksLikeQuestion) continue;

    const match = QUESTION_WORD_PATTERN.exec(content);
    if (match?.[1]) leadWords.push(match[1]);
  }

  if (leadWords.length < 3) return false;

  const counts = new Map<string, number>();
  for (const w of leadWords) counts.set(w, (counts.get(w) ?? 0) + 1);
  const mostCommon = Math.max(...counts.values());

  return mostCommon / leadWords.length > CIRCULAR_FREQUENCY_THRESHOLD;
};

export const conversationFlow = (chatHistory: readonly ChatTurn[]): ConversationFlow => {
  const result: ConversationFlow = {
    stagnation_score: 0,
    flow_pattern: "normal",
    recent_progress: false,
    repetition_detected: false
  };

  if (chatHistory.length < 3) return result;

  const recent = chatHistory.slice(-FLOW_WINDOW);
  const studentTurns = recent.filter((t) => t.role === "student");
  if (studentTurns.length < 2) return result;

  const texts = studentTurns.map((t) => t.content);
  outer: for (let i = 0; i < texts.length; i += 1) {
    for (let j = i + 1; j < texts.length; j += 1) {
      if (jaccardSimilarity(texts[i] ?? "", texts[j] ?? "") > REPETITION_THRESHOLD) {
        result.repetition_detected = true;
        result.stagnation_score += 0.3;
        break outer;
      }
    }
  }

  result.recent_progress = recent.some((t) => {
    const content = t.content.toLowerCase();
    return PROGRESS_PHRASES.some((p) => content.includes(p));
  });
  if (!result.recent_progress) result.stagnation_score += 0.2;

  if (detectCircularQuestioning(studentTurns)) {
    result.flow_pattern = "circular";
    result.stagnation_score += 0.4;
  }

  result.stagnation_score = clamp01(result.stagnation_score);
  return result;
};

const keywordHits = (content: string, keywords: readonly string[]): number =>
  keywords.reduce((acc, kw) => (content.includes(kw) ? acc + 1 : acc), 0);

export const progressStalling = (
  chatHistory: readonly ChatTurn[],
  assignmentContext?: AssignmentContext
): ProgressStalling => {
  const result: ProgressStalling = {
    stalling_score: 0,
    evidence_gathering: false,
    analysis_depth: "surface",
    question_engagement: "low"
  };

  if (!assignmentContext || chatHistory.length < 5) return result;

  const studentContents = chatHistory
    .slice(-STALLING_WINDOW)
    .filter((t) => t.role === "student")
    .map((t) => t.content.toLowerCase());

  let evidenceCount = 0;
  let analysisCount = 0;
  for (const content of studentContents) {
    evidenceCount += keywordHits(content, STALLING_EVIDENCE_KEYWORDS);
    analysisCount += keywordHits(content, STALLING_ANALYSIS_KEYWORDS);
  }

  if (evidenceCount >= 2) {
    result.evidence_gathering = true;
  } else if (evidenceCount === 0) {
    result.stalling_score += 0.3;
  }

  if (analysisCount >= 3) {
    result.analysis_depth = "deep";
  } else if (analysisCount >= 1) {
    result.analysis_depth = "moderate";
  } else {
    result.stalling_score += 0.2;
  }

  const questionId = assignmentContext.current_question_id?.toLowerCase();
  if (questionId) {
    const mentions = studentContents.filter((c) => c.includes(questionId)).length;
    if (mentions >= 2) {
      result.question_engagement = "high";
    } else if (mentions === 1) {
      result.question_engagement = "moderate";
    } else {
      result.stalling_score += 0.4;
    }
  }

  result.stalling_score = clamp01(result.stalling_score);
  return result;
};
