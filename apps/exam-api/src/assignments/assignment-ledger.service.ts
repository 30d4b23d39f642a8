import { Inject, Injectable } from '@nestjs/common';
import {
  AlreadyGradedException,
  AlreadyRegisteredException,
  AssignmentNotFoundException,
  ExamNotFoundException,
  InvalidVoteException
} from '../common/errors/domain.exception';
import { CLOCK, type Clock } from '../common/time/clock';
import { EXAM_DIRECTORY, type ExamDirectory } from '../exams/exam-directory';
import { isValidVote, type Assignment, type Registration } from './assignment.entity';
import { ASSIGNMENT_REPOSITORY, type AssignmentRepository, type UngradedFilter } from './assignment.repository';

/**
 * AssignmentLedger - owns the (user, exam) grading relationship.
 *
 * Invariants:
 * - at most one assignment per (userId, examId)
 * - a vote is in [0, 100] and, once set, never changes
 * Both are enforced by single atomic store operations, never by a read
 * followed by a write.
 */
@Injectable()
export class AssignmentLedgerService {
  constructor(
    @Inject(ASSIGNMENT_REPOSITORY) private readonly repository: AssignmentRepository,
    @Inject(EXAM_DIRECTORY) private readonly exams: ExamDirectory,
    @Inject(CLOCK) private readonly clock: Clock
  ) {}

  /**
   * @throws ExamNotFoundException | AlreadyRegisteredException
   */
  async register(userId: string, examId: string): Promise<Registration> {
    const exam = await this.exams.findById(examId);
    if (!exam) throw new ExamNotFoundException();

    const outcome = await this.repository.insertUngraded(userId, examId, this.clock.now());
    switch (outcome.kind) {
      case 'created':
        return { ...outcome.assignment, exam };
      case 'duplicate':
        throw new AlreadyRegisteredException();
      case 'exam_missing':
        // Exam removed between the lookup and the insert
        throw new ExamNotFoundException();
    }
  }

  /**
   * Ungraded assignments, optionally narrowed to one user or exam.
   * Every call starts a new snapshot.
   */
  listUngraded(filter: UngradedFilter = {}): AsyncIterable<Assignment> {
    return this.repository.streamUngraded(filter);
  }

  /**
   * @throws InvalidVoteException | AssignmentNotFoundException | AlreadyGradedException
   */
  async assignVote(userId: string, examId: string, vote: number): Promise<Assignment> {
    if (!isValidVote(vote)) throw new InvalidVoteException();

    const outcome = await this.repository.setVoteIfUngraded(userId, examId, vote, this.clock.now());
    switch (outcome.kind) {
      case 'graded':
        return outcome.assignment;
      case 'already_graded':
        throw new AlreadyGradedException();
      case 'not_found':
        throw new AssignmentNotFoundException();
    }
  }

  /** Graded and ungraded assignments of one user */
  getForUser(userId: string): Promise<Assignment[]> {
    return this.repository.findByUser(userId);
  }
}
