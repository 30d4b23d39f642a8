import { Injectable } from '@nestjs/common';
import type { RowDataPacket } from 'mysql2';
import { DatabaseService } from '../database/database.service';
import type { Exam } from './exam.entity';
import type { ExamDirectory } from './exam-directory';

interface ExamRow extends RowDataPacket {
  id: string;
  title: string;
  date: Date;
}

@Injectable()
export class MysqlExamDirectory implements ExamDirectory {
  constructor(private readonly db: DatabaseService) {}

  async findById(id: string): Promise<Exam | null> {
    const rows = await this.db.sql<ExamRow[]>`SELECT id, title, date FROM exams WHERE id = ${id} LIMIT 1`;
    if (rows.length === 0) return null;
    const [row] = rows;
    return { id: row.id, title: row.title, date: row.date };
  }
}
