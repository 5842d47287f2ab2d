import { defaultRandom, pickIndex, type RandomSource } from "../utils/random";

const ANSWER_SEEKING_PHRASES = [
  "what is the answer",
  "tell me the answer",
  "what should i write",
  "give me the answer",
  "what is the correct",
  "can you tell me"
] as const;

const REDIRECTIONS = [
  "I notice you're looking for a direct answer. Instead, let me ask you: what do you think based on what you've read?",
  "Rather than me telling you, what evidence from the article supports your thinking?",
  "That's a great question to explore! What's your initial thinking about this?",
  "Instead of giving you the answer, let's work through this together. What patterns do you notice?",
  "I'm here to guide your thinking, not provide answers. What connections are you making?"
] as const;

export const detectAnswerSeeking = (userMessage: string): boolean => {
  const lower = userMessage.toLowerCase();
  return ANSWER_SEEKING_PHRASES.some((phrase) => lower.includes(phrase));
};

export const redirectAnswerSeeking = (random: RandomSource = defaultRandom): string => {
  return REDIRECTIONS[pickIndex(random, REDIRECTIONS.length)] ?? REDIRECTIONS[0];
};

export const ANSWER_SEEKING_REDIRECTIONS: readonly string[] = REDIRECTIONS;
