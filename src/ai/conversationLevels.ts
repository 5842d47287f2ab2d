export type ConversationLevel = "comprehension" | "analysis" | "synthesis" | "evaluation";

export interface GenerationSettings {
  temperature: number;
  max_output_tokens: number;
}

export interface ConversationLevelConfig {
  level: ConversationLevel;
  guidance: string[];
  generation: GenerationSettings;
}

const GENERATION: GenerationSettings = { temperature: 0.7, max_output_tokens: 300 };

const LEVEL_CONFIGS: Record<ConversationLevel, ConversationLevelConfig> = {
  comprehension: {
    level: "comprehension",
    guidance: [
      "Focus on basic understanding:",
      "- Help them identify main ideas and key concepts",
      "- Ask about what they observed or read",
      "- Guide them to articulate the research question",
      "- Ensure they understand the study design"
    ],
    generation: GENERATION
  },
  analysis: {
    level: "analysis",
    guidance: [
      "Deepen their examination:",
      "- Ask why certain patterns exist",
      "- Guide them to examine cause-and-effect relationships",
      "- Help them analyze the methodology choices",
      "- Encourage interpretation of results"
    ],
    generation: GENERATION
  },
  synthesis: {
    level: "synthesis",
    guidance: [
      "Connect to broader concepts:",
      "- Link findings to landscape ecology theory",
      "- Connect to previous course material",
      "- Ask about applications to other systems",
      "- Explore relationships between concepts"
    ],
    generation: GENERATION
  },
  evaluation: {
    level: "evaluation",
    guidance: [
      "Encourage critical assessment:",
      "- Question assumptions and limitations",
      "- Explore alternative interpretations",
      "- Assess the strength of evidence",
      "- Consider broader implications and future research"
    ],
    generation: GENERATION
  }
};

export const getLevelConfig = (level: ConversationLevel): ConversationLevelConfig => {
  return LEVEL_CONFIGS[level];
};

/** Level for a conversation with `historyLength` prior turns. */
export const conversationLevelFor = (historyLength: number): ConversationLevel => {
  if (historyLength < 4) return "comprehension";
  if (historyLength < 8) return "analysis";
  if (historyLength < 12) return "synthesis";
  return "evaluation";
};
