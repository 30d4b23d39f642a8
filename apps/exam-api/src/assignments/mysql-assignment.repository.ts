import { Injectable } from '@nestjs/common';
import type { ResultSetHeader, RowDataPacket } from 'mysql2';
import { DatabaseService } from '../database/database.service';
import type { Assignment } from './assignment.entity';
import type {
  AssignmentRepository,
  InsertOutcome,
  SetVoteOutcome,
  UngradedFilter
} from './assignment.repository';

interface AssignmentRow extends RowDataPacket {
  user_id: string;
  exam_id: string;
  vote: number | null;
  graded_at: Date | null;
  created_at: Date;
}

function toAssignment(row: AssignmentRow): Assignment {
  return {
    userId: row.user_id,
    examId: row.exam_id,
    vote: row.vote,
    gradedAt: row.graded_at,
    createdAt: row.created_at
  };
}

function mysqlErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** The insert can violate either foreign key; only the exam one is an expected outcome. */
function mentionsExamForeignKey(error: unknown): boolean {
  return error instanceof Error && error.message.includes('fk_user_exams_exam');
}

/**
 * user_exams storage. Atomicity comes from the table itself:
 * PRIMARY KEY (user_id, exam_id) for registration and a conditional
 * `UPDATE ... WHERE vote IS NULL` for grading. No application locks.
 */
@Injectable()
export class MysqlAssignmentRepository implements AssignmentRepository {
  constructor(private readonly db: DatabaseService) {}

  async insertUngraded(userId: string, examId: string, createdAt: Date): Promise<InsertOutcome> {
    try {
      await this.db.sql<ResultSetHeader>`
        INSERT INTO user_exams (user_id, exam_id, vote, graded_at, created_at)
        VALUES (${userId}, ${examId}, NULL, NULL, ${createdAt})
      `;
    } catch (error) {
      const code = mysqlErrorCode(error);
      if (code === 'ER_DUP_ENTRY') return { kind: 'duplicate' };
      if (code === 'ER_NO_REFERENCED_ROW_2' && mentionsExamForeignKey(error)) return { kind: 'exam_missing' };
      throw error;
    }

    return {
      kind: 'created',
      assignment: { userId, examId, vote: null, gradedAt: null, createdAt }
    };
  }

  async setVoteIfUngraded(userId: string, examId: string, vote: number, gradedAt: Date): Promise<SetVoteOutcome> {
    const result = await this.db.sql<ResultSetHeader>`
      UPDATE user_exams SET vote = ${vote}, graded_at = ${gradedAt}
      WHERE user_id = ${userId} AND exam_id = ${examId} AND vote IS NULL
    `;

    // Read back only to report; the decision was made by the UPDATE above.
    const current = await this.findOne(userId, examId);
    if (!current) return { kind: 'not_found' };
    if (result.affectedRows === 1) return { kind: 'graded', assignment: current };
    return { kind: 'already_graded', assignment: current };
  }

  async findOne(userId: string, examId: string): Promise<Assignment | null> {
    const rows = await this.db.sql<AssignmentRow[]>`
      SELECT user_id, exam_id, vote, graded_at, created_at
      FROM user_exams WHERE user_id = ${userId} AND exam_id = ${examId} LIMIT 1
    `;
    return rows.length > 0 ? toAssignment(rows[0]) : null;
  }

  async findByUser(userId: string): Promise<Assignment[]> {
    const rows = await this.db.sql<AssignmentRow[]>`
      SELECT user_id, exam_id, vote, graded_at, created_at
      FROM user_exams WHERE user_id = ${userId}
      ORDER BY created_at, exam_id
    `;
    return rows.map(toAssignment);
  }

  async *streamUngraded(filter: UngradedFilter): AsyncGenerator<Assignment> {
    const userId = filter.userId ?? null;
    const examId = filter.examId ?? null;
    // A single SELECT; the connection is back in the pool before the
    // first row is handed out, so consumers may run their own queries per row.
    const rows = await this.db.sql<AssignmentRow[]>`
      SELECT user_id, exam_id, vote, graded_at, created_at
      FROM user_exams
      WHERE vote IS NULL
        AND (${userId} IS NULL OR user_id = ${userId})
        AND (${examId} IS NULL OR exam_id = ${examId})
      ORDER BY created_at, user_id, exam_id
    `;
    for (const row of rows) {
      yield toAssignment(row);
    }
  }
}
