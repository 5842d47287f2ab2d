import type { AssignmentQuestion, BloomLevel } from "../focus";

export interface ParsedQuestion extends AssignmentQuestion {
  bloom_level: BloomLevel;
  key_concepts: string[];
  required_evidence: string;
  word_target: string;
  tutoring_prompts: string[];
  learning_objectives: string[];
}

export interface ParsedAssignment {
  assignment_title: string;
  assignment_type: string;
  total_word_count: string;
  learning_objectives: string[];
  questions: ParsedQuestion[];
  workflow_steps: string[];
  raw_excerpt: string;
}

export interface StoredAssignment extends ParsedAssignment {
  id: string;
  created_at: string;
  created_by: string;
}

export interface AssignmentValidation {
  valid: boolean;
  issues: string[];
}
