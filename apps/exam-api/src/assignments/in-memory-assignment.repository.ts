import { Injectable } from '@nestjs/common';
import type { Assignment } from './assignment.entity';
import type {
  AssignmentRepository,
  InsertOutcome,
  SetVoteOutcome,
  UngradedFilter
} from './assignment.repository';

function keyOf(userId: string, examId: string): string {
  return JSON.stringify([userId, examId]);
}

function byCreation(a: Assignment, b: Assignment): number {
  return (
    a.createdAt.getTime() - b.createdAt.getTime() ||
    a.userId.localeCompare(b.userId) ||
    a.examId.localeCompare(b.examId)
  );
}

/**
 * Process-owned assignment store (DATA_STORE=memory).
 *
 * Each mutation runs its check and write without an intervening await, so
 * on the single event loop it is indivisible with respect to every other
 * request. Records are copied in and out; callers never hold live state.
 */
@Injectable()
export class InMemoryAssignmentRepository implements AssignmentRepository {
  private readonly records = new Map<string, Assignment>();

  async insertUngraded(userId: string, examId: string, createdAt: Date): Promise<InsertOutcome> {
    const key = keyOf(userId, examId);
    if (this.records.has(key)) return { kind: 'duplicate' };

    const assignment: Assignment = { userId, examId, vote: null, gradedAt: null, createdAt };
    this.records.set(key, assignment);
    return { kind: 'created', assignment: { ...assignment } };
  }

  async setVoteIfUngraded(userId: string, examId: string, vote: number, gradedAt: Date): Promise<SetVoteOutcome> {
    const current = this.records.get(keyOf(userId, examId));
    if (!current) return { kind: 'not_found' };
    if (current.vote !== null) return { kind: 'already_graded', assignment: { ...current } };

    const graded: Assignment = { ...current, vote, gradedAt };
    this.records.set(keyOf(userId, examId), graded);
    return { kind: 'graded', assignment: { ...graded } };
  }

  async findOne(userId: string, examId: string): Promise<Assignment | null> {
    const found = this.records.get(keyOf(userId, examId));
    return found ? { ...found } : null;
  }

  async findByUser(userId: string): Promise<Assignment[]> {
    return [...this.records.values()]
      .filter((a) => a.userId === userId)
      .sort(byCreation)
      .map((a) => ({ ...a }));
  }

  async *streamUngraded(filter: UngradedFilter): AsyncGenerator<Assignment> {
    // Snapshot taken on the first pull; later writes do not leak into this iteration.
    const snapshot = [...this.records.values()]
      .filter((a) => a.vote === null)
      .filter((a) => filter.userId === undefined || a.userId === filter.userId)
      .filter((a) => filter.examId === undefined || a.examId === filter.examId)
      .sort(byCreation)
      .map((a) => ({ ...a }));

    for (const assignment of snapshot) {
      yield assignment;
    }
  }
}
