import type { Assignment } from './assignment.entity';

/** Injection token for the Assignment storage backend */
export const ASSIGNMENT_REPOSITORY = Symbol('ASSIGNMENT_REPOSITORY');

export interface UngradedFilter {
  userId?: string;
  examId?: string;
}

export type InsertOutcome =
  | { kind: 'created'; assignment: Assignment }
  | { kind: 'duplicate' }
  /** Only reported by stores with a foreign key to exams */
  | { kind: 'exam_missing' };

export type SetVoteOutcome =
  | { kind: 'graded'; assignment: Assignment }
  | { kind: 'already_graded'; assignment: Assignment }
  | { kind: 'not_found' };

/**
 * Storage contract for assignments. Both mutating operations are single
 * indivisible steps in the backing store:
 * - insertUngraded: uniqueness check and insert on (userId, examId)
 * - setVoteIfUngraded: "vote is null" check and update
 */
export interface AssignmentRepository {
  insertUngraded(userId: string, examId: string, createdAt: Date): Promise<InsertOutcome>;
  setVoteIfUngraded(userId: string, examId: string, vote: number, gradedAt: Date): Promise<SetVoteOutcome>;
  findOne(userId: string, examId: string): Promise<Assignment | null>;
  /** Ordered by createdAt, then examId */
  findByUser(userId: string): Promise<Assignment[]>;
  /** One snapshot per call; ordered by createdAt, then userId, then examId */
  streamUngraded(filter: UngradedFilter): AsyncIterable<Assignment>;
}
