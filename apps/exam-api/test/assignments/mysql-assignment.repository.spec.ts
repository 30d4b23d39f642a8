import { MysqlAssignmentRepository } from '../../src/assignments/mysql-assignment.repository';
import type { DatabaseService } from '../../src/database/database.service';
import { collect } from '../support/fixtures';

const CREATED = new Date('2026-05-01T10:00:00.000Z');
const GRADED = new Date('2026-05-02T10:00:00.000Z');

function mysqlError(code: string, message: string = code): Error {
  return Object.assign(new Error(message), { code });
}

const FK_FAILURE =
  'Cannot add or update a child row: a foreign key constraint fails (`exam_results`.`user_exams`, CONSTRAINT';

function row(overrides: Record<string, unknown> = {}) {
  return {
    user_id: 'user-1',
    exam_id: 'exam-1',
    vote: null,
    graded_at: null,
    created_at: CREATED,
    ...overrides
  };
}

/** Interpolated values of the n-th tagged-template call */
function paramsOf(mock: jest.Mock, call = 0): unknown[] {
  return mock.mock.calls[call].slice(1);
}

/** SQL text of the n-th tagged-template call, whitespace collapsed */
function sqlOf(mock: jest.Mock, call = 0): string {
  const strings: TemplateStringsArray = mock.mock.calls[call][0];
  return strings.join('?').replace(/\s+/g, ' ').trim();
}

describe('MysqlAssignmentRepository', () => {
  let sql: jest.Mock;
  let repository: MysqlAssignmentRepository;

  beforeEach(() => {
    sql = jest.fn();
    repository = new MysqlAssignmentRepository({ sql } as unknown as DatabaseService);
  });

  describe('insertUngraded', () => {
    it('inserts an ungraded row', async () => {
      sql.mockResolvedValueOnce({ affectedRows: 1 });

      await expect(repository.insertUngraded('user-1', 'exam-1', CREATED)).resolves.toEqual({
        kind: 'created',
        assignment: { userId: 'user-1', examId: 'exam-1', vote: null, gradedAt: null, createdAt: CREATED }
      });
      expect(sqlOf(sql)).toBe(
        'INSERT INTO user_exams (user_id, exam_id, vote, graded_at, created_at) VALUES (?, ?, NULL, NULL, ?)'
      );
      expect(paramsOf(sql)).toEqual(['user-1', 'exam-1', CREATED]);
    });

    it('maps a primary key collision to duplicate', async () => {
      sql.mockRejectedValueOnce(mysqlError('ER_DUP_ENTRY'));
      await expect(repository.insertUngraded('user-1', 'exam-1', CREATED)).resolves.toEqual({ kind: 'duplicate' });
    });

    it('maps a missing exam row to exam_missing', async () => {
      sql.mockRejectedValueOnce(
        mysqlError('ER_NO_REFERENCED_ROW_2', `${FK_FAILURE} \`fk_user_exams_exam\` FOREIGN KEY (\`exam_id\`))`)
      );
      await expect(repository.insertUngraded('user-1', 'exam-1', CREATED)).resolves.toEqual({ kind: 'exam_missing' });
    });

    it('propagates a missing user row instead of reporting a missing exam', async () => {
      const failure = mysqlError('ER_NO_REFERENCED_ROW_2', `${FK_FAILURE} \`fk_user_exams_user\` FOREIGN KEY (\`user_id\`))`);
      sql.mockRejectedValueOnce(failure);
      await expect(repository.insertUngraded('user-9', 'exam-1', CREATED)).rejects.toBe(failure);
    });

    it('propagates any other storage error', async () => {
      sql.mockRejectedValueOnce(mysqlError('ECONNREFUSED'));
      await expect(repository.insertUngraded('user-1', 'exam-1', CREATED)).rejects.toThrow('ECONNREFUSED');
    });
  });

  describe('setVoteIfUngraded', () => {
    it('reports graded when the conditional update changed the row', async () => {
      sql.mockResolvedValueOnce({ affectedRows: 1 }).mockResolvedValueOnce([row({ vote: 77, graded_at: GRADED })]);

      await expect(repository.setVoteIfUngraded('user-1', 'exam-1', 77, GRADED)).resolves.toEqual({
        kind: 'graded',
        assignment: { userId: 'user-1', examId: 'exam-1', vote: 77, gradedAt: GRADED, createdAt: CREATED }
      });
      expect(sqlOf(sql)).toBe(
        'UPDATE user_exams SET vote = ?, graded_at = ? WHERE user_id = ? AND exam_id = ? AND vote IS NULL'
      );
      expect(paramsOf(sql)).toEqual([77, GRADED, 'user-1', 'exam-1']);
    });

    it('reports already_graded with the stored vote when nothing changed', async () => {
      sql.mockResolvedValueOnce({ affectedRows: 0 }).mockResolvedValueOnce([row({ vote: 85, graded_at: GRADED })]);

      await expect(repository.setVoteIfUngraded('user-1', 'exam-1', 90, GRADED)).resolves.toEqual({
        kind: 'already_graded',
        assignment: { userId: 'user-1', examId: 'exam-1', vote: 85, gradedAt: GRADED, createdAt: CREATED }
      });
    });

    it('reports not_found when the row does not exist', async () => {
      sql.mockResolvedValueOnce({ affectedRows: 0 }).mockResolvedValueOnce([]);
      await expect(repository.setVoteIfUngraded('user-1', 'exam-1', 90, GRADED)).resolves.toEqual({
        kind: 'not_found'
      });
    });
  });

  it('findByUser orders by creation time', async () => {
    sql.mockResolvedValueOnce([row(), row({ exam_id: 'exam-2', vote: 64, graded_at: GRADED })]);

    const assignments = await repository.findByUser('user-1');
    expect(assignments.map((a) => [a.examId, a.vote])).toEqual([
      ['exam-1', null],
      ['exam-2', 64]
    ]);
    expect(sqlOf(sql)).toContain('ORDER BY created_at, exam_id');
    expect(paramsOf(sql)).toEqual(['user-1']);
  });

  describe('streamUngraded', () => {
    it('passes null filters so the query matches every row', async () => {
      sql.mockResolvedValueOnce([row(), row({ user_id: 'user-2' })]);

      const listed = await collect(repository.streamUngraded({}));
      expect(listed.map((a) => a.userId)).toEqual(['user-1', 'user-2']);
      expect(paramsOf(sql)).toEqual([null, null, null, null]);
    });

    it('passes the user and exam filters', async () => {
      sql.mockResolvedValueOnce([]);

      await collect(repository.streamUngraded({ userId: 'user-1', examId: 'exam-2' }));
      expect(paramsOf(sql)).toEqual(['user-1', 'user-1', 'exam-2', 'exam-2']);
      expect(sqlOf(sql)).toContain('WHERE vote IS NULL');
    });

    it('runs a fresh query on every iteration', async () => {
      sql.mockResolvedValueOnce([row()]).mockResolvedValueOnce([]);

      await expect(collect(repository.streamUngraded({}))).resolves.toHaveLength(1);
      await expect(collect(repository.streamUngraded({}))).resolves.toHaveLength(0);
      expect(sql).toHaveBeenCalledTimes(2);
    });

    it('has finished its query before the first row reaches the consumer', async () => {
      let settled = false;
      sql.mockImplementationOnce(async () => {
        await Promise.resolve();
        settled = true;
        return [row(), row({ user_id: 'user-2' })];
      });

      for await (const assignment of repository.streamUngraded({})) {
        expect(settled).toBe(true);
        expect(assignment.vote).toBeNull();
      }
    });
  });
});
