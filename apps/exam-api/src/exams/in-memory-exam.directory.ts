import { Injectable } from '@nestjs/common';
import type { Exam } from './exam.entity';
import type { ExamDirectory } from './exam-directory';

@Injectable()
export class InMemoryExamDirectory implements ExamDirectory {
  private readonly exams = new Map<string, Exam>();

  add(exam: Exam): void {
    for (const existing of this.exams.values()) {
      if (existing.title === exam.title) throw new Error(`Duplicate exam title: ${exam.title}`);
    }
    this.exams.set(exam.id, { ...exam });
  }

  async findById(id: string): Promise<Exam | null> {
    return this.exams.get(id) ?? null;
  }
}
