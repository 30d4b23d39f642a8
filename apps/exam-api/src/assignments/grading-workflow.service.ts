import { Inject, Injectable } from '@nestjs/common';
import { AuditService } from '../audit/audit.service';
import { TokenService } from '../auth/token.service';
import type { SessionClaims } from '../auth/interfaces/session-claims';
import type { Exam } from '../exams/exam.entity';
import { EXAM_DIRECTORY, type ExamDirectory } from '../exams/exam-directory';
import { PermissionService } from '../iam/rbac/permission.service';
import { CREDENTIAL_STORE, type CredentialStore } from '../users/credential-store';
import type { Assignment, Registration } from './assignment.entity';
import { AssignmentLedgerService } from './assignment-ledger.service';
import type { UngradedFilter } from './assignment.repository';
import { summarize, toResultEntry, type ResultEntry, type ResultStatistics } from './results';

export interface UngradedEntry {
  userId: string;
  userEmail: string | null;
  examId: string;
  examTitle: string | null;
  examDate: string | null;
  registeredAt: string;
}

export interface MyResults {
  results: ResultEntry[];
  statistics: ResultStatistics;
}

/** Optional per-call context for audit records */
export interface WorkflowContext {
  requestId?: string;
}

/**
 * GradingWorkflow - every protected operation runs
 * validate token -> authorize role -> ledger, and stops at the first failure.
 * The acting user is always the token's subject, never a caller-supplied id.
 *
 * Each operation has a token form and an `...As(actor)` form; the latter is
 * for callers that already validated the token (JwtAuthGuard). Both forms
 * still ask the Permission Gate.
 */
@Injectable()
export class GradingWorkflowService {
  constructor(
    private readonly tokens: TokenService,
    private readonly permissions: PermissionService,
    private readonly ledger: AssignmentLedgerService,
    private readonly audit: AuditService,
    @Inject(EXAM_DIRECTORY) private readonly exams: ExamDirectory,
    @Inject(CREDENTIAL_STORE) private readonly credentials: CredentialStore
  ) {}

  async gradeAssignment(
    token: string,
    userId: string,
    examId: string,
    vote: number,
    context: WorkflowContext = {}
  ): Promise<Assignment> {
    return this.gradeAssignmentAs(await this.tokens.validate(token), userId, examId, vote, context);
  }

  async gradeAssignmentAs(
    actor: SessionClaims,
    userId: string,
    examId: string,
    vote: number,
    context: WorkflowContext = {}
  ): Promise<Assignment> {
    this.permissions.authorize(actor.role, 'assign_vote');
    const graded = await this.ledger.assignVote(userId, examId, vote);

    this.audit.record({
      actorUserId: actor.userId,
      action: 'assignment.grade',
      targetType: 'assignment',
      targetId: `${userId}/${examId}`,
      after: { vote: graded.vote },
      requestId: context.requestId
    });
    return graded;
  }

  async registerForExam(token: string, examId: string, context: WorkflowContext = {}): Promise<Registration> {
    return this.registerForExamAs(await this.tokens.validate(token), examId, context);
  }

  /** Self-registration: the ledger key is the actor, never a caller-supplied id */
  async registerForExamAs(actor: SessionClaims, examId: string, context: WorkflowContext = {}): Promise<Registration> {
    this.permissions.authorize(actor.role, 'register_for_exam');
    const registration = await this.ledger.register(actor.userId, examId);

    this.audit.record({
      actorUserId: actor.userId,
      action: 'exam.register',
      targetType: 'assignment',
      targetId: `${actor.userId}/${examId}`,
      requestId: context.requestId
    });
    return registration;
  }

  async myResults(token: string): Promise<MyResults> {
    return this.myResultsAs(await this.tokens.validate(token));
  }

  async myResultsAs(actor: SessionClaims): Promise<MyResults> {
    this.permissions.authorize(actor.role, 'view_own_results');
    const assignments = await this.ledger.getForUser(actor.userId);
    const exams = await this.lookupExams(assignments.map((a) => a.examId));

    return {
      results: assignments.map((a) => toResultEntry(a, exams.get(a.examId) ?? null)),
      statistics: summarize(assignments)
    };
  }

  async ungradedAssignments(token: string, filter: UngradedFilter = {}): Promise<UngradedEntry[]> {
    return this.ungradedAssignmentsAs(await this.tokens.validate(token), filter);
  }

  async ungradedAssignmentsAs(actor: SessionClaims, filter: UngradedFilter = {}): Promise<UngradedEntry[]> {
    this.permissions.authorize(actor.role, 'view_ungraded');

    const entries: UngradedEntry[] = [];
    const exams = new Map<string, Exam | null>();
    const emails = new Map<string, string | null>();

    for await (const assignment of this.ledger.listUngraded(filter)) {
      if (!exams.has(assignment.examId)) {
        exams.set(assignment.examId, await this.exams.findById(assignment.examId));
      }
      if (!emails.has(assignment.userId)) {
        const user = await this.credentials.findById(assignment.userId);
        emails.set(assignment.userId, user?.email ?? null);
      }

      const exam = exams.get(assignment.examId) ?? null;
      entries.push({
        userId: assignment.userId,
        userEmail: emails.get(assignment.userId) ?? null,
        examId: assignment.examId,
        examTitle: exam?.title ?? null,
        examDate: exam ? exam.date.toISOString() : null,
        registeredAt: assignment.createdAt.toISOString()
      });
    }
    return entries;
  }

  private async lookupExams(examIds: readonly string[]): Promise<Map<string, Exam>> {
    const found = new Map<string, Exam>();
    for (const id of new Set(examIds)) {
      const exam = await this.exams.findById(id);
      if (exam) found.set(id, exam);
    }
    return found;
  }
}
