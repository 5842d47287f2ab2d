import { z } from "zod";

import rawIndicators from "./focusIndicators.json";
import {
  DIVERGENCE_CATEGORIES,
  FOCUS_CATEGORIES,
  type DivergenceCategory,
  type FocusCategory
} from "./focusTypes";

const divergenceEntrySchema = z.object({
  keywords: z.array(z.string().min(1)),
  patterns: z.array(z.string().min(1)),
  weight: z.number().gt(0).max(1)
});

const keywordListSchema = z.array(z.string().min(1)).min(1);

const indicatorTableSchema = z.object({
  divergence: z.object({
    curiosity_driven: divergenceEntrySchema,
    definition_seeking: divergenceEntrySchema,
    comparison_distraction: divergenceEntrySchema,
    hypothesis_speculation: divergenceEntrySchema,
    meta_questions: divergenceEntrySchema,
    broad_scope: divergenceEntrySchema
  }),
  focus: z.object({
    evidence_seeking: keywordListSchema,
    specific_references: keywordListSchema,
    analytical_language: keywordListSchema,
    assignment_terms: keywordListSchema
  }),
  conversation: z.object({
    progress_phrases: keywordListSchema,
    question_words: keywordListSchema
  }),
  stalling: z.object({
    evidence_keywords: keywordListSchema,
    analysis_keywords: keywordListSchema
  })
});

const table = indicatorTableSchema.parse(rawIndicators);

export interface DivergenceIndicator {
  category: DivergenceCategory;
  keywords: readonly string[];
  patterns: readonly RegExp[];
  weight: number;
}

export interface FocusIndicator {
  category: FocusCategory;
  keywords: readonly string[];
}

export const DIVERGENCE_INDICATORS: readonly DivergenceIndicator[] = Object.freeze(
  DIVERGENCE_CATEGORIES.map((category) => {
    const entry = table.divergence[category];
    return Object.freeze({
      category,
      keywords: Object.freeze([...entry.keywords]),
      patterns: Object.freeze(entry.patterns.map((p) => new RegExp(p, "i"))),
      weight: entry.weight
    });
  })
);

export const FOCUS_INDICATORS: readonly FocusIndicator[] = Object.freeze(
  FOCUS_CATEGORIES.map((category) =>
    Object.freeze({ category, keywords: Object.freeze([...table.focus[category]]) })
  )
);

export const PROGRESS_PHRASES: readonly string[] = Object.freeze([...table.conversation.progress_phrases]);

export const QUESTION_WORD_PATTERN = new RegExp(`\\b(${table.conversation.question_words.join("|")})\\b`);

// Only the wh-words make a message count as a question when it has no "?".
export const QUESTION_MARKER_WORDS: readonly string[] = Object.freeze(["what", "how", "why", "when", "where"]);

export const STALLING_EVIDENCE_KEYWORDS: readonly string[] = Object.freeze([...table.stalling.evidence_keywords]);

export const STALLING_ANALYSIS_KEYWORDS: readonly string[] = Object.freeze([...table.stalling.analysis_keywords]);
