import type { AssignmentQuestion, ChatTurn } from "../focus";
import { getLevelConfig, type ConversationLevel } from "./conversationLevels";

export interface SocraticPromptInput {
  level: ConversationLevel;
  articleContext: string;
  knowledgeContext: string;
  history: readonly ChatTurn[];
  userMessage: string;
  question?: AssignmentQuestion;
}

export const PROMPT_HISTORY_TURNS = 12;

const excerpt = (text: string, limit: number): string => {
  const trimmed = text.trim();
  if (!trimmed) return "(none provided)";
  return trimmed.length > limit ? `${trimmed.slice(0, limit)}...` : trimmed;
};

const CORE_PRINCIPLES = [
  "You are a Socratic AI tutor for landscape ecology. Your role is to guide students through critical analysis of research articles using the Socratic method.",
  "",
  "CORE PRINCIPLES:",
  "1. NEVER provide direct answers to questions",
  "2. Always respond with questions that lead students to discover insights themselves",
  "3. Guide students through progressive levels of understanding",
  "4. Challenge assumptions and encourage critical thinking",
  "5. Connect findings to broader landscape ecology concepts"
].join("\n");

const SOCRATIC_GUIDELINES = [
  "SOCRATIC GUIDELINES:",
  '- If the student asks for an answer, redirect with "What do you think?" type questions',
  "- Build on their responses to deepen understanding",
  '- Use phrases like "What evidence supports that?" or "How might that connect to...?"',
  "- Encourage them to explain their reasoning",
  "- Point out contradictions gently through questions"
].join("\n");

export const buildSocraticPrompt = (input: SocraticPromptInput): string => {
  const { level, articleContext, knowledgeContext, history, userMessage, question } = input;
  const config = getLevelConfig(level);

  const context = [
    "CONVERSATION CONTEXT:",
    `- Article being discussed: ${excerpt(articleContext, 500)}`,
    `- Relevant landscape ecology concepts: ${excerpt(knowledgeContext, 300)}`
  ].join("\n");

  const assignment = question
    ? ["CURRENT ASSIGNMENT QUESTION:", `${question.id}: ${question.title}`, question.prompt].join("\n")
    : null;

  const transcript = history
    .slice(-PROMPT_HISTORY_TURNS)
    .map((t) => `${t.role === "student" ? "Student" : "Tutor"}: ${t.content}`);

  const sections = [
    CORE_PRINCIPLES,
    `CURRENT CONVERSATION LEVEL: ${level}`,
    context,
    SOCRATIC_GUIDELINES,
    [`LEVEL-SPECIFIC FOCUS (${level}):`, ...config.guidance].join("\n"),
    ...(assignment ? [assignment] : []),
    "Respond with 1-3 questions that guide the student deeper into the topic. Keep the response conversational and encouraging.",
    transcript.length > 0 ? ["Conversation so far:", ...transcript].join("\n") : null,
    `Student: ${userMessage}`,
    "Tutor:"
  ];

  return sections.filter((s): s is string => s !== null).join("\n\n");
};
