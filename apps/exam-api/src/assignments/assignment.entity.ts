import type { Exam } from '../exams/exam.entity';

/**
 * Assignment - one user registered for one exam, with an optional grade.
 *
 * Lifecycle: absent -> ungraded (vote null) -> graded (vote set once).
 */
export interface Assignment {
  userId: string;
  examId: string;
  /** 0..100 inclusive; null until graded */
  vote: number | null;
  gradedAt: Date | null;
  createdAt: Date;
}

/** A new assignment together with the exam it was checked against */
export interface Registration extends Assignment {
  exam: Exam;
}

export type GradeStatus = 'graded' | 'pending';

export type LetterGrade = 'A' | 'B' | 'C' | 'D' | 'F';

export const MIN_VOTE = 0;
export const MAX_VOTE = 100;

export function isValidVote(vote: number): boolean {
  return Number.isFinite(vote) && vote >= MIN_VOTE && vote <= MAX_VOTE;
}

export function gradeStatusOf(assignment: Assignment): GradeStatus {
  return assignment.vote === null ? 'pending' : 'graded';
}

/**
 * A >= 90, B >= 80, C >= 70, D >= 60, otherwise F; null while ungraded
 */
export function letterGradeOf(assignment: Assignment): LetterGrade | null {
  const { vote } = assignment;
  if (vote === null) return null;
  if (vote >= 90) return 'A';
  if (vote >= 80) return 'B';
  if (vote >= 70) return 'C';
  if (vote >= 60) return 'D';
  return 'F';
}
