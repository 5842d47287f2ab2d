import type { Logger } from "pino";

import type { AssignmentQuestion, ChatTurn } from "../focus";
import { logger as rootLogger } from "../utils/logger";
import { conversationLevelFor, getLevelConfig } from "./conversationLevels";
import { createGeminiClientFromEnv, type TextModelClient } from "./geminiClient";
import { buildSocraticPrompt } from "./promptBuilder";
import { localSocraticReply } from "./socraticFallback";

export interface TutorReplyInput {
  userMessage: string;
  /** Turns before `userMessage`. */
  history: readonly ChatTurn[];
  articleContext: string;
  knowledgeContext: string;
  question?: AssignmentQuestion;
}

export interface TutorReplyGenerator {
  generateReply(input: TutorReplyInput): Promise<string>;
}

const studentTurnCount = (input: TutorReplyInput): number =>
  input.history.filter((t) => t.role === "student").length + 1;

export class SocraticReplyGenerator implements TutorReplyGenerator {
  private readonly client: TextModelClient | null;
  private readonly log: Logger;

  constructor(client: TextModelClient | null, log: Logger = rootLogger) {
    this.client = client;
    this.log = log;
  }

  async generateReply(input: TutorReplyInput): Promise<string> {
    const fallback = () => localSocraticReply(input.userMessage, studentTurnCount(input));
    if (!this.client) return fallback();

    const level = conversationLevelFor(input.history.length);
    const prompt = buildSocraticPrompt({
      level,
      articleContext: input.articleContext,
      knowledgeContext: input.knowledgeContext,
      history: input.history,
      userMessage: input.userMessage,
      question: input.question
    });

    try {
      const result = await this.client.generate(prompt, getLevelConfig(level).generation);
      const text = result.text.trim();
      if (!text) {
        this.log.warn({ model: result.model, level }, "gemini_empty_reply");
        return fallback();
      }
      this.log.debug({ model: result.model, level, usage: result.usage }, "gemini_reply_generated");
      return text;
    } catch (err) {
      this.log.warn({ err, model: this.client.model, level }, "gemini_call_failed");
      return fallback();
    }
  }
}

/** Uses Gemini when GOOGLE_API_KEY is set, the local rule-based tutor otherwise. */
export const createTutorReplyGeneratorFromEnv = (log: Logger = rootLogger): TutorReplyGenerator => {
  if (!process.env.GOOGLE_API_KEY) {
    log.info("gemini_disabled_using_local_tutor");
    return new SocraticReplyGenerator(null, log);
  }
  return new SocraticReplyGenerator(createGeminiClientFromEnv(), log);
};
