import { AssignmentLedgerService } from '../../src/assignments/assignment-ledger.service';
import { GradingWorkflowService } from '../../src/assignments/grading-workflow.service';
import { InMemoryAssignmentRepository } from '../../src/assignments/in-memory-assignment.repository';
import type { AuditService } from '../../src/audit/audit.service';
import { Role } from '../../src/auth/enums/role.enum';
import { TokenService } from '../../src/auth/token.service';
import {
  AlreadyGradedException,
  ExamNotFoundException,
  ForbiddenActionException,
  TokenExpiredException,
  TokenSignatureInvalidException
} from '../../src/common/errors/domain.exception';
import { InMemoryExamDirectory } from '../../src/exams/in-memory-exam.directory';
import { PermissionService } from '../../src/iam/rbac/permission.service';
import { InMemoryCredentialStore } from '../../src/users/in-memory-credential.store';
import { FakeClock, testConfig } from '../support/fixtures';

const T0 = new Date('2026-05-01T10:00:00.000Z');
const EXAM_DATE = new Date('2026-06-01T09:00:00.000Z');

describe('GradingWorkflowService', () => {
  let clock: FakeClock;
  let tokens: TokenService;
  let permissions: PermissionService;
  let ledger: AssignmentLedgerService;
  let audit: { record: jest.Mock };
  let workflow: GradingWorkflowService;
  let adminToken: string;
  let supervisorToken: string;
  let userToken: string;

  beforeEach(async () => {
    clock = new FakeClock(T0);

    const users = new InMemoryCredentialStore();
    const people: Array<[string, string, Role]> = [
      ['admin-1', 'admin@example.test', Role.ADMIN],
      ['supervisor-1', 'supervisor@example.test', Role.SUPERVISOR],
      ['user-1', 'user1@example.test', Role.USER]
    ];
    for (const [id, email, role] of people) {
      users.add({ id, email, role, passwordHash: 'hash-placeholder', createdAt: T0, updatedAt: T0 });
    }

    const exams = new InMemoryExamDirectory();
    exams.add({ id: 'exam-1', title: 'Algebra', date: EXAM_DATE });

    tokens = new TokenService(testConfig(), clock);
    permissions = new PermissionService();
    ledger = new AssignmentLedgerService(new InMemoryAssignmentRepository(), exams, clock);
    audit = { record: jest.fn() };
    workflow = new GradingWorkflowService(
      tokens,
      permissions,
      ledger,
      audit as unknown as AuditService,
      exams,
      users
    );

    adminToken = (await tokens.issue('admin-1', Role.ADMIN)).token;
    supervisorToken = (await tokens.issue('supervisor-1', Role.SUPERVISOR)).token;
    userToken = (await tokens.issue('user-1', Role.USER)).token;
  });

  it('runs register -> grade -> results end to end', async () => {
    const registered = await workflow.registerForExam(userToken, 'exam-1', { requestId: 'req-1' });
    expect(registered).toEqual({
      userId: 'user-1',
      examId: 'exam-1',
      vote: null,
      gradedAt: null,
      createdAt: T0,
      exam: { id: 'exam-1', title: 'Algebra', date: EXAM_DATE }
    });
    expect(audit.record).toHaveBeenCalledWith({
      actorUserId: 'user-1',
      action: 'exam.register',
      targetType: 'assignment',
      targetId: 'user-1/exam-1',
      requestId: 'req-1'
    });

    clock.advanceSeconds(60);
    const graded = await workflow.gradeAssignment(supervisorToken, 'user-1', 'exam-1', 77);
    expect(graded.vote).toBe(77);
    expect(graded.gradedAt).toEqual(new Date(T0.getTime() + 60_000));
    expect(audit.record).toHaveBeenLastCalledWith({
      actorUserId: 'supervisor-1',
      action: 'assignment.grade',
      targetType: 'assignment',
      targetId: 'user-1/exam-1',
      after: { vote: 77 },
      requestId: undefined
    });

    await expect(workflow.myResults(userToken)).resolves.toEqual({
      results: [
        {
          examId: 'exam-1',
          examTitle: 'Algebra',
          examDate: '2026-06-01T09:00:00.000Z',
          vote: 77,
          gradeStatus: 'graded',
          letterGrade: 'C',
          registeredAt: '2026-05-01T10:00:00.000Z',
          gradedAt: '2026-05-01T10:01:00.000Z'
        }
      ],
      statistics: { totalExams: 1, gradedExams: 1, pendingExams: 0, averageGrade: 77, completionRate: 100 }
    });
  });

  it('stops an admin at the gate before the ledger is touched', async () => {
    await workflow.registerForExam(userToken, 'exam-1');
    const assignVote = jest.spyOn(ledger, 'assignVote');

    await expect(workflow.gradeAssignment(adminToken, 'user-1', 'exam-1', 90)).rejects.toBeInstanceOf(
      ForbiddenActionException
    );
    expect(assignVote).not.toHaveBeenCalled();
    await expect(ledger.getForUser('user-1')).resolves.toMatchObject([{ vote: null }]);
  });

  it('reports Forbidden for a disallowed role even when the target does not exist', async () => {
    await expect(workflow.gradeAssignment(userToken, 'nobody', 'no-exam', 50)).rejects.toBeInstanceOf(
      ForbiddenActionException
    );
    await expect(workflow.registerForExam(supervisorToken, 'no-exam')).rejects.toBeInstanceOf(
      ForbiddenActionException
    );
  });

  it('rejects an expired token before asking the gate', async () => {
    const authorize = jest.spyOn(permissions, 'authorize');
    clock.advanceSeconds(1800 + 5);

    await expect(workflow.gradeAssignment(supervisorToken, 'user-1', 'exam-1', 50)).rejects.toBeInstanceOf(
      TokenExpiredException
    );
    expect(authorize).not.toHaveBeenCalled();
    expect(audit.record).not.toHaveBeenCalled();
  });

  it('rejects a forged token', async () => {
    const forger = new TokenService(testConfig({ TOKEN_SECRET: 'other-secret-other-secret-other-secret' }), clock);
    const forged = (await forger.issue('supervisor-1', Role.SUPERVISOR)).token;

    await expect(workflow.myResults(forged)).rejects.toBeInstanceOf(TokenSignatureInvalidException);
  });

  it('registers the token subject, and surfaces ledger failures unchanged', async () => {
    await expect(workflow.registerForExam(userToken, 'exam-404')).rejects.toBeInstanceOf(ExamNotFoundException);

    await workflow.registerForExam(userToken, 'exam-1');
    await workflow.gradeAssignment(supervisorToken, 'user-1', 'exam-1', 85);
    await expect(workflow.gradeAssignment(supervisorToken, 'user-1', 'exam-1', 90)).rejects.toBeInstanceOf(
      AlreadyGradedException
    );
    expect(audit.record).toHaveBeenCalledTimes(2);
  });

  describe('ungradedAssignments', () => {
    it('lists pending work with user and exam details for supervisors', async () => {
      await workflow.registerForExam(userToken, 'exam-1');

      await expect(workflow.ungradedAssignments(supervisorToken)).resolves.toEqual([
        {
          userId: 'user-1',
          userEmail: 'user1@example.test',
          examId: 'exam-1',
          examTitle: 'Algebra',
          examDate: '2026-06-01T09:00:00.000Z',
          registeredAt: '2026-05-01T10:00:00.000Z'
        }
      ]);

      await workflow.gradeAssignment(supervisorToken, 'user-1', 'exam-1', 64);
      await expect(workflow.ungradedAssignments(supervisorToken)).resolves.toEqual([]);
    });

    it('is closed to users and admins', async () => {
      await expect(workflow.ungradedAssignments(userToken)).rejects.toBeInstanceOf(ForbiddenActionException);
      await expect(workflow.ungradedAssignments(adminToken)).rejects.toBeInstanceOf(ForbiddenActionException);
    });
  });

  describe('actor forms', () => {
    const supervisor = { userId: 'supervisor-1', role: Role.SUPERVISOR, issuedAt: T0, expiresAt: T0 };
    const admin = { userId: 'admin-1', role: Role.ADMIN, issuedAt: T0, expiresAt: T0 };
    const user = { userId: 'user-1', role: Role.USER, issuedAt: T0, expiresAt: T0 };

    it('skip token validation but still ask the gate', async () => {
      const validate = jest.spyOn(tokens, 'validate');
      const authorize = jest.spyOn(permissions, 'authorize');

      await workflow.registerForExamAs(user, 'exam-1');
      await expect(workflow.gradeAssignmentAs(admin, 'user-1', 'exam-1', 90)).rejects.toBeInstanceOf(
        ForbiddenActionException
      );
      await expect(workflow.gradeAssignmentAs(supervisor, 'user-1', 'exam-1', 90)).resolves.toMatchObject({ vote: 90 });

      expect(validate).not.toHaveBeenCalled();
      expect(authorize.mock.calls).toEqual([
        [Role.USER, 'register_for_exam'],
        [Role.ADMIN, 'assign_vote'],
        [Role.SUPERVISOR, 'assign_vote']
      ]);
    });

    it('read the actor id for results and ungraded listings', async () => {
      await workflow.registerForExamAs(user, 'exam-1');

      await expect(workflow.ungradedAssignmentsAs(supervisor)).resolves.toMatchObject([{ userId: 'user-1' }]);
      await expect(workflow.myResultsAs(user)).resolves.toMatchObject({ statistics: { totalExams: 1, pendingExams: 1 } });
      await expect(workflow.myResultsAs(supervisor)).rejects.toBeInstanceOf(ForbiddenActionException);
    });
  });

  it('myResults is empty with zeroed statistics before any registration', async () => {
    await expect(workflow.myResults(userToken)).resolves.toEqual({
      results: [],
      statistics: { totalExams: 0, gradedExams: 0, pendingExams: 0, averageGrade: null, completionRate: 0 }
    });
  });
});
