import { randomUUID } from "crypto";

import type { StoredAssignment } from "../assignments/assignmentTypes";
import { transcriptStats, type TranscriptStats } from "../evaluation/metricsCalculator";
import type { AssignmentContext, AssignmentQuestion, ChatRole, ChatTurn } from "../focus";

export interface SessionProgress {
  current_question_id?: string;
  completed_question_ids: string[];
  evidence_found: string[];
}

export interface ChatSession {
  id: string;
  student_id: string;
  article_title: string;
  article_context: string;
  knowledge_context: string;
  assignment_id?: string;
  started_at: string;
  messages: ChatTurn[];
  progress: SessionProgress;
}

export interface CreateSessionInput {
  student_id: string;
  article_title: string;
  article_context: string;
  knowledge_context?: string;
  assignment_id?: string;
}

export interface SessionExport {
  session_id: string;
  student_id: string;
  article_title: string;
  assignment_id?: string;
  started_at: string;
  exported_at: string;
  duration_minutes: number;
  progress: SessionProgress;
  stats: TranscriptStats;
  messages: ChatTurn[];
}

const cloneSession = (session: ChatSession): ChatSession => ({
  ...session,
  messages: session.messages.map((m) => ({ ...m })),
  progress: {
    ...session.progress,
    completed_question_ids: [...session.progress.completed_question_ids],
    evidence_found: [...session.progress.evidence_found]
  }
});

export class ChatSessionStore {
  private readonly sessions = new Map<string, ChatSession>();
  private readonly now: () => Date;

  constructor(opts?: { now?: () => Date }) {
    this.now = opts?.now ?? (() => new Date());
  }

  createSession(input: CreateSessionInput): ChatSession {
    const session: ChatSession = {
      id: randomUUID(),
      student_id: input.student_id,
      article_title: input.article_title,
      article_context: input.article_context,
      knowledge_context: input.knowledge_context ?? "",
      assignment_id: input.assignment_id,
      started_at: this.now().toISOString(),
      messages: [],
      progress: { completed_question_ids: [], evidence_found: [] }
    };
    this.sessions.set(session.id, session);
    return cloneSession(session);
  }

  getSession(sessionId: string): ChatSession | null {
    const session = this.sessions.get(sessionId);
    return session ? cloneSession(session) : null;
  }

  listSessions(filter?: { student_id?: string }): ChatSession[] {
    return [...this.sessions.values()]
      .filter((s) => !filter?.student_id || s.student_id === filter.student_id)
      .map(cloneSession);
  }

  addMessage(sessionId: string, role: ChatRole, content: string): ChatTurn | null {
    const session = this.sessions.get(sessionId);
    if (!session) return null;

    const turn: ChatTurn = { role, content, timestamp: this.now().toISOString() };
    session.messages.push(turn);
    return { ...turn };
  }

  getHistory(sessionId: string): ChatTurn[] {
    return this.sessions.get(sessionId)?.messages.map((m) => ({ ...m })) ?? [];
  }

  /** Returns false for an unknown session; a repeated piece of evidence is kept once. */
  recordEvidence(sessionId: string, evidence: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    const trimmed = evidence.trim();
    if (trimmed && !session.progress.evidence_found.includes(trimmed)) {
      session.progress.evidence_found.push(trimmed);
    }
    return true;
  }

  setCurrentQuestion(sessionId: string, questionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    session.progress.current_question_id = questionId;
    return true;
  }

  completeQuestion(sessionId: string, questionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    const progress = session.progress;
    if (!progress.completed_question_ids.includes(questionId)) {
      progress.completed_question_ids.push(questionId);
    }
    if (progress.current_question_id === questionId) {
      progress.current_question_id = undefined;
    }
    return true;
  }

  sessionDurationMinutes(sessionId: string): number {
    const session = this.sessions.get(sessionId);
    if (!session) return 0;
    const elapsedMs = this.now().getTime() - new Date(session.started_at).getTime();
    return Math.max(0, elapsedMs / 60_000);
  }

  exportSession(sessionId: string): SessionExport | null {
    const session = this.sessions.get(sessionId);
    if (!session) return null;

    const snapshot = cloneSession(session);
    return {
      session_id: snapshot.id,
      student_id: snapshot.student_id,
      article_title: snapshot.article_title,
      assignment_id: snapshot.assignment_id,
      started_at: snapshot.started_at,
      exported_at: this.now().toISOString(),
      duration_minutes: Number(this.sessionDurationMinutes(sessionId).toFixed(1)),
      progress: snapshot.progress,
      stats: transcriptStats(snapshot.messages),
      messages: snapshot.messages
    };
  }
}

/** The explicitly selected question, else the first one not yet completed. */
export const resolveCurrentQuestion = (
  session: ChatSession,
  assignment: StoredAssignment | null
): AssignmentQuestion | undefined => {
  if (!assignment) return undefined;

  const { current_question_id, completed_question_ids } = session.progress;
  if (current_question_id) {
    const selected = assignment.questions.find((q) => q.id === current_question_id);
    if (selected) return selected;
  }
  return assignment.questions.find((q) => !completed_question_ids.includes(q.id));
};

export const buildAssignmentContext = (
  session: ChatSession,
  assignment: StoredAssignment | null
): AssignmentContext | undefined => {
  if (!assignment) return undefined;

  return {
    assignment_title: assignment.assignment_title,
    total_word_count: assignment.total_word_count,
    current_question_id: resolveCurrentQuestion(session, assignment)?.id,
    completed_question_ids: [...session.progress.completed_question_ids],
    all_questions: assignment.questions,
    evidence_found: [...session.progress.evidence_found]
  };
};

export const formatTranscriptMarkdown = (exported: SessionExport): string => {
  const lines = [
    `# Chat Transcript: ${exported.article_title}`,
    "",
    `**Student:** ${exported.student_id}`,
    `**Started:** ${exported.started_at}`,
    `**Duration:** ${exported.duration_minutes} minutes`,
    `**Messages:** ${exported.stats.total_messages}`,
    `**Evidence found:** ${exported.progress.evidence_found.length}`,
    "",
    "---",
    ""
  ];

  for (const m of exported.messages) {
    lines.push(`**${m.role === "student" ? "Student" : "Tutor"}** (${m.timestamp}):`, "", m.content, "");
  }

  return lines.join("\n");
};

