import type { Exam } from '../exams/exam.entity';
import {
  gradeStatusOf,
  letterGradeOf,
  type Assignment,
  type GradeStatus,
  type LetterGrade,
  type Registration
} from './assignment.entity';

export interface ResultEntry {
  examId: string;
  examTitle: string | null;
  examDate: string | null;
  vote: number | null;
  gradeStatus: GradeStatus;
  letterGrade: LetterGrade | null;
  registeredAt: string;
  gradedAt: string | null;
}

export interface ResultStatistics {
  totalExams: number;
  gradedExams: number;
  pendingExams: number;
  /** Mean vote, two decimals; null when nothing is graded */
  averageGrade: number | null;
  /** Percentage of exams graded, two decimals */
  completionRate: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * @param exam - null when the exam is no longer in the directory
 */
export function toResultEntry(assignment: Assignment, exam: Exam | null): ResultEntry {
  return {
    examId: assignment.examId,
    examTitle: exam?.title ?? null,
    examDate: exam ? exam.date.toISOString() : null,
    vote: assignment.vote,
    gradeStatus: gradeStatusOf(assignment),
    letterGrade: letterGradeOf(assignment),
    registeredAt: assignment.createdAt.toISOString(),
    gradedAt: assignment.gradedAt ? assignment.gradedAt.toISOString() : null
  };
}

export function summarize(assignments: readonly Assignment[]): ResultStatistics {
  const votes = assignments.flatMap((a) => (a.vote === null ? [] : [a.vote]));
  const total = assignments.length;
  const graded = votes.length;

  return {
    totalExams: total,
    gradedExams: graded,
    pendingExams: total - graded,
    averageGrade: graded > 0 ? round2(votes.reduce((sum, v) => sum + v, 0) / graded) : null,
    completionRate: total > 0 ? round2((graded / total) * 100) : 0
  };
}

export interface AssignmentView {
  userId: string;
  examId: string;
  vote: number | null;
  gradeStatus: GradeStatus;
  letterGrade: LetterGrade | null;
  registeredAt: string;
  gradedAt: string | null;
}

export function toAssignmentView(assignment: Assignment): AssignmentView {
  return {
    userId: assignment.userId,
    examId: assignment.examId,
    vote: assignment.vote,
    gradeStatus: gradeStatusOf(assignment),
    letterGrade: letterGradeOf(assignment),
    registeredAt: assignment.createdAt.toISOString(),
    gradedAt: assignment.gradedAt ? assignment.gradedAt.toISOString() : null
  };
}

export interface RegistrationView extends AssignmentView {
  examTitle: string;
  examDate: string;
}

export function toRegistrationView(registration: Registration): RegistrationView {
  return {
    ...toAssignmentView(registration),
    examTitle: registration.exam.title,
    examDate: registration.exam.date.toISOString()
  };
}
