import { z } from "zod";

import type { BloomLevel } from "../focus";
import type { AssignmentValidation, ParsedAssignment, ParsedQuestion } from "./assignmentTypes";
import rawVocabulary from "./assignmentVocabulary.json";

const BLOOM_LEVELS = ["remember", "understand", "apply", "analyze", "evaluate", "create"] as const satisfies readonly BloomLevel[];

const wordList = z.array(z.string().min(1));
const perLevel = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({
    remember: schema,
    understand: schema,
    apply: schema,
    analyze: schema,
    evaluate: schema,
    create: schema
  });

const vocabularySchema = z.object({
  bloom_keywords: perLevel(wordList.min(1)),
  base_word_targets: perLevel(z.number().int().positive()),
  concepts: wordList,
  capitalised_stopwords: wordList,
  evidence_rules: z.array(z.object({ keywords: wordList.min(1), label: z.string().min(1) })),
  title_rules: z.array(z.object({ keyword: z.string().min(1), title: z.string().min(1) })),
  tutoring_prompts: perLevel(wordList),
  comparison_prompt: z.string().min(1),
  causal_prompt: z.string().min(1),
  question_objectives: z.array(z.object({ keywords: wordList.min(1), objective: z.string().min(1) })),
  fallback_question_verbs: wordList.min(1)
});

const vocabulary = vocabularySchema.parse(rawVocabulary);

export const DEFAULT_ASSIGNMENT_TITLE = "Parsed Assignment";
export const DEFAULT_TOTAL_WORD_COUNT = "600-900 words";
const MAX_QUESTIONS = 10;
const MIN_QUESTION_LENGTH = 20;

const escapeRegExp = (s: string): string => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const includesAny = (text: string, words: readonly string[]): boolean => words.some((w) => text.includes(w));

// Matches at the start of a word so "use" counts in "used" but not in "because".
const countWordPrefixHits = (text: string, words: readonly string[]): number =>
  words.filter((w) => new RegExp(`\\b${escapeRegExp(w)}`, "i").test(text)).length;

const hasWord = (text: string, words: readonly string[]): boolean =>
  words.some((w) => new RegExp(`\\b${escapeRegExp(w)}\\b`, "i").test(text));

const extractTitle = (text: string): string => {
  const head = text.slice(0, 500);
  const labelled = /\b(?:assignment|homework|quiz|exam)\b[\s:]*(?:\d+\s*[:.\-–]\s*)?([^\n]+)/i.exec(head);
  const labelledTitle = labelled?.[1]?.trim();
  if (labelledTitle) return labelledTitle;

  const capitalised = /^([A-Z][^.\n]{10,50})$/m.exec(head);
  return capitalised?.[1]?.trim() ?? DEFAULT_ASSIGNMENT_TITLE;
};

const extractWordCount = (text: string): string => {
  const match = /(\d+)\s*[-–]\s*(\d+)\s*words?\b|(\d+)\s*words?\b/i.exec(text);
  if (!match) return DEFAULT_TOTAL_WORD_COUNT;
  if (match[1] && match[2]) return `${match[1]}-${match[2]} words`;
  return `${match[3] ?? ""} words`;
};

const extractObjectives = (text: string): string[] => {
  const match = /^(?:[Ll]earning\s+)?(?:[Oo]bjectives?|OBJECTIVES?|[Gg]oals?|[Aa]ims?)\s*:?\s*(.+?)(?=\n\s*\n|\n[A-Z]|\n\s*\d+[.)]\s|(?![\s\S]))/ms.exec(
    text
  );
  const body = match?.[1];
  if (!body) return [];

  return body
    .split("\n")
    .map((line) => line.replace(/^\s*(?:[-•*]|\d+[.)])\s*/, "").trim())
    .filter(Boolean);
};

const NUMBERED_LINE = /^\s*(?:question\s*\d+\s*[.:)]?|\d+[.)])\s+(.*)$/i;

const extractNumberedQuestions = (text: string): string[] => {
  const questions: string[] = [];
  let current: string[] | null = null;

  const flush = () => {
    if (current) questions.push(current.join(" ").trim());
    current = null;
  };

  for (const line of text.split(/\r?\n/)) {
    const numbered = NUMBERED_LINE.exec(line);
    if (numbered) {
      flush();
      current = [numbered[1] ?? ""];
    } else if (!line.trim()) {
      flush();
    } else if (current) {
      current.push(line.trim());
    }
  }
  flush();

  return questions;
};

const extractSentenceQuestions = (text: string): string[] =>
  text
    .split(/[.!]\s+/)
    .map((s) => s.trim())
    .filter((s) => s.includes("?") || includesAny(s.toLowerCase(), vocabulary.fallback_question_verbs));

const uniqueQuestions = (candidates: readonly string[]): string[] => {
  const out: string[] = [];
  for (const c of candidates) {
    if (c.length > MIN_QUESTION_LENGTH && !out.includes(c)) out.push(c);
  }
  return out.slice(0, MAX_QUESTIONS);
};

export const extractQuestions = (text: string): string[] => {
  const numbered = uniqueQuestions(extractNumberedQuestions(text));
  return numbered.length > 0 ? numbered : uniqueQuestions(extractSentenceQuestions(text));
};

export const classifyBloomLevel = (questionText: string): BloomLevel => {
  let best: BloomLevel | null = null;
  let bestScore = 0;

  for (const level of BLOOM_LEVELS) {
    const score = countWordPrefixHits(questionText, vocabulary.bloom_keywords[level]);
    if (score > bestScore) {
      best = level;
      bestScore = score;
    }
  }
  if (best) return best;

  const lower = questionText.toLowerCase();
  if (questionText.includes("?") && hasWord(lower, ["what", "who"])) return "remember";
  if (hasWord(lower, ["explain", "describe", "discuss"])) return "understand";
  return "apply";
};

export const extractEvidenceRequirements = (questionText: string): string => {
  const lower = questionText.toLowerCase();
  const labels = vocabulary.evidence_rules.filter((r) => includesAny(lower, r.keywords)).map((r) => r.label);
  return labels.length > 0 ? labels.join("; ") : "Supporting evidence from the article";
};

export const estimateWordTarget = (questionText: string, bloomLevel: BloomLevel): string => {
  const lower = questionText.toLowerCase();
  let base = vocabulary.base_word_targets[bloomLevel];

  if (questionText.length > 200) base += 50;
  if (lower.includes("compare")) base += 75;
  if (lower.includes("multiple") || lower.includes("several")) base += 50;

  return `${base - 25}-${base + 50} words`;
};

export const extractKeyConcepts = (questionText: string): string[] => {
  const lower = questionText.toLowerCase();
  const found: Array<{ term: string; at: number }> = [];

  for (const concept of vocabulary.concepts) {
    const at = lower.indexOf(concept);
    if (at >= 0) found.push({ term: concept, at });
  }

  const excluded = new Set([...vocabulary.capitalised_stopwords, ...Object.values(vocabulary.bloom_keywords).flat()]);
  for (const match of questionText.matchAll(/\b[A-Z][a-z]+(?:\s+[A-Z][a-z]+)*\b/g)) {
    const term = match[0];
    if (term.length > 3 && !excluded.has(term.toLowerCase())) {
      found.push({ term, at: match.index ?? 0 });
    }
  }

  const seen = new Set<string>();
  return found
    .sort((a, b) => a.at - b.at)
    .map((f) => f.term)
    .filter((term) => {
      const key = term.toLowerCase();
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    })
    .slice(0, 5);
};

export const generateTutoringPrompts = (questionText: string, bloomLevel: BloomLevel): string[] => {
  const prompts = [...vocabulary.tutoring_prompts[bloomLevel]];

  if (questionText.toLowerCase().includes("compare")) prompts.push(vocabulary.comparison_prompt);
  if (hasWord(questionText, ["why", "how", "explain"])) prompts.push(vocabulary.causal_prompt);

  return prompts.slice(0, 4);
};

const extractQuestionObjectives = (questionText: string): string[] => {
  const lower = questionText.toLowerCase();
  return vocabulary.question_objectives.filter((o) => includesAny(lower, o.keywords)).map((o) => o.objective);
};

export const generateQuestionTitle = (questionText: string): string => {
  const lower = questionText.toLowerCase();
  const rule = vocabulary.title_rules.find((r) => lower.includes(r.keyword));
  if (rule) return rule.title;

  return questionText.split(/\s+/).filter(Boolean).slice(0, 6).join(" ").replace(/[.,!?:]+$/, "");
};

export const analyzeQuestion = (questionText: string, questionId: string): ParsedQuestion => {
  const bloom_level = classifyBloomLevel(questionText);
  return {
    id: questionId,
    title: generateQuestionTitle(questionText),
    prompt: questionText,
    bloom_level,
    required_evidence: extractEvidenceRequirements(questionText),
    word_target: estimateWordTarget(questionText, bloom_level),
    key_concepts: extractKeyConcepts(questionText),
    tutoring_prompts: generateTutoringPrompts(questionText, bloom_level),
    learning_objectives: extractQuestionObjectives(questionText)
  };
};

const workflowSteps = (questionCount: number): string[] => [
  "Read and annotate the assigned article carefully",
  "Identify key concepts and main arguments",
  ...(questionCount > 0
    ? [
        `Work through each of the ${questionCount} questions systematically`,
        "Gather specific evidence from the article for each question",
        "Develop analysis that goes beyond simple description"
      ]
    : []),
  "Organize your responses to show connections between questions",
  "Review and refine your analysis for clarity and depth",
  "Ensure all responses meet the specified word count requirements"
];

/** Parses plain assignment text into numbered questions with tutoring metadata. */
export const parseAssignmentText = (text: string, assignmentType = "socratic_analysis"): ParsedAssignment => {
  const questions = extractQuestions(text).map((q, i) => analyzeQuestion(q, `Q${i + 1}`));

  return {
    assignment_title: extractTitle(text),
    assignment_type: assignmentType,
    total_word_count: extractWordCount(text),
    learning_objectives: extractObjectives(text),
    questions,
    workflow_steps: workflowSteps(questions.length),
    raw_excerpt: text.length > 1000 ? `${text.slice(0, 1000)}...` : text
  };
};

export const validateParsedAssignment = (parsed: ParsedAssignment): AssignmentValidation => {
  const issues: string[] = [];

  if (parsed.questions.length === 0) issues.push("No questions were found in the document");
  if (parsed.questions.length < 2) issues.push("Assignment should contain at least 2 questions");

  parsed.questions.forEach((q, i) => {
    if (!q.prompt.trim()) issues.push(`Question ${i + 1} has no prompt text`);
    if (q.prompt.length < 10) issues.push(`Question ${i + 1} prompt is too short`);
  });

  return { valid: issues.length === 0, issues };
};

const capitalize = (s: string): string => s.charAt(0).toUpperCase() + s.slice(1);

export const generateAssignmentPreview = (parsed: ParsedAssignment): string => {
  const lines = [
    `## ${parsed.assignment_title}`,
    "",
    `**Type:** ${parsed.assignment_type}`,
    `**Target Length:** ${parsed.total_word_count}`,
    `**Questions Found:** ${parsed.questions.length}`,
    ""
  ];

  for (const q of parsed.questions) {
    const prompt = q.prompt.length > 200 ? `${q.prompt.slice(0, 200)}...` : q.prompt;
    lines.push(
      `### ${q.id}: ${q.title}`,
      `**Bloom Level:** ${capitalize(q.bloom_level)}`,
      `**Word Target:** ${q.word_target}`,
      `**Question:** ${prompt}`,
      ""
    );
  }

  return lines.join("\n");
};
