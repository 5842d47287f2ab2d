import { z } from "zod";

import rawIndicators from "./qualityIndicators.json";

const keywordListSchema = z.array(z.string().min(1)).min(1);

const qualityIndicatorSchema = z.object({
  critical_thinking: keywordListSchema,
  synthesis: keywordListSchema,
  depth: keywordListSchema,
  spatial_reasoning: keywordListSchema,
  gis_methods: keywordListSchema,
  landscape_metrics: keywordListSchema,
  complex_question_words: keywordListSchema,
  simple_question_words: keywordListSchema
});

const indicators = qualityIndicatorSchema.parse(rawIndicators);

export const messageQualitySchema = z.object({
  thoughtfulness_score: z.number(),
  critical_thinking_present: z.boolean(),
  synthesis_present: z.boolean(),
  spatial_reasoning_present: z.boolean(),
  word_count: z.number().int(),
  question_complexity: z.number().int().min(0).max(3),
  spatial_understanding_score: z.number(),
  gis_methods_mentioned: z.boolean(),
  landscape_metrics_mentioned: z.boolean()
});

export type MessageQuality = z.infer<typeof messageQualitySchema>;

const PRESENCE_THRESHOLD = 0.1;

/** Share of `keywords` found as substrings of the lowercased text. */
const keywordShare = (text: string, keywords: readonly string[]): number =>
  keywords.filter((k) => text.includes(k)).length / keywords.length;

const round2 = (n: number): number => Number(n.toFixed(2));

// 3 for why/how/explain questions, 2 for when/where/who/which, 1 for any other question, 0 otherwise.
const questionComplexity = (message: string, lower: string): number => {
  if (!message.includes("?")) return 0;
  if (indicators.complex_question_words.some((w) => lower.includes(w))) return 3;
  if (indicators.simple_question_words.some((w) => lower.includes(w))) return 2;
  return 1;
};

/** Scores one student message for the professor dashboard; never throws. */
export const messageQuality = (message: string): MessageQuality => {
  const lower = message.toLowerCase();
  const wordCount = message.split(/\s+/).filter(Boolean).length;

  const criticalThinking = keywordShare(lower, indicators.critical_thinking);
  const synthesis = keywordShare(lower, indicators.synthesis);
  const depth = keywordShare(lower, indicators.depth);
  const gisMethods = keywordShare(lower, indicators.gis_methods);
  const landscapeMetrics = keywordShare(lower, indicators.landscape_metrics);
  const spatialUnderstanding =
    (keywordShare(lower, indicators.spatial_reasoning) + gisMethods + landscapeMetrics) / 3;
  const complexity = questionComplexity(message, lower);

  const thoughtfulness =
    (criticalThinking * 0.25 +
      synthesis * 0.25 +
      depth * 0.15 +
      spatialUnderstanding * 0.25 +
      Math.min(wordCount / 100, 1) * 0.05 +
      (complexity / 3) * 0.05) *
    100;

  return {
    thoughtfulness_score: round2(thoughtfulness),
    critical_thinking_present: criticalThinking > PRESENCE_THRESHOLD,
    synthesis_present: synthesis > PRESENCE_THRESHOLD,
    spatial_reasoning_present: spatialUnderstanding > PRESENCE_THRESHOLD,
    word_count: wordCount,
    question_complexity: complexity,
    spatial_understanding_score: round2(spatialUnderstanding * 100),
    gis_methods_mentioned: gisMethods > 0,
    landscape_metrics_mentioned: landscapeMetrics > 0
  };
};
