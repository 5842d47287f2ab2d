import type { ChatTurn } from "../focus";

export const countTokens = (text: string): number => {
  const trimmed = text.trim();
  if (!trimmed) return 0;
  const parts = trimmed.match(/[\p{L}\p{N}]+|[^\s\p{L}\p{N}]/gu);
  return parts ? parts.length : Math.ceil(trimmed.length / 4);
};

export const countWords = (text: string): number => {
  const matches = text.trim().match(/[\p{L}\p{N}]+/gu);
  return matches ? matches.length : 0;
};

export interface TranscriptStats {
  total_messages: number;
  student_messages: number;
  tutor_messages: number;
  student_words: number;
  average_student_words: number;
  student_questions: number;
}

export const transcriptStats = (messages: readonly ChatTurn[]): TranscriptStats => {
  const student = messages.filter((m) => m.role === "student");
  const studentWords = student.reduce((acc, m) => acc + countWords(m.content), 0);

  return {
    total_messages: messages.length,
    student_messages: student.length,
    tutor_messages: messages.length - student.length,
    student_words: studentWords,
    average_student_words: student.length === 0 ? 0 : Number((studentWords / student.length).toFixed(1)),
    student_questions: student.filter((m) => m.content.includes("?")).length
  };
};
