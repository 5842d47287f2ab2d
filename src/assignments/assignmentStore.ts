import crypto from "crypto";

import type { AssignmentQuestion } from "../focus";
import type { ParsedAssignment, StoredAssignment } from "./assignmentTypes";

export const assignmentIdFor = (title: string, text: string): string =>
  `asg_${crypto.createHash("sha256").update(`${title}\n${text}`).digest("hex").slice(0, 16)}`;

export class AssignmentStore {
  private readonly assignments = new Map<string, StoredAssignment>();

  /** Saving the same title and text again replaces the earlier record under the same id. */
  save(parsed: ParsedAssignment, sourceText: string, createdBy: string, now = new Date()): StoredAssignment {
    const stored: StoredAssignment = {
      ...parsed,
      id: assignmentIdFor(parsed.assignment_title, sourceText),
      created_at: now.toISOString(),
      created_by: createdBy
    };
    this.assignments.set(stored.id, stored);
    return stored;
  }

  get(id: string): StoredAssignment | null {
    return this.assignments.get(id) ?? null;
  }

  list(): StoredAssignment[] {
    return [...this.assignments.values()].sort((a, b) => a.created_at.localeCompare(b.created_at));
  }

  getQuestion(assignmentId: string, questionId: string): AssignmentQuestion | null {
    return this.get(assignmentId)?.questions.find((q) => q.id === questionId) ?? null;
  }
}

