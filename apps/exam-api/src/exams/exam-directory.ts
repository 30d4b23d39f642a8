import type { Exam } from './exam.entity';

/** Injection token for the exam lookup collaborator */
export const EXAM_DIRECTORY = Symbol('EXAM_DIRECTORY');

/**
 * Exam existence and lookup. Exam CRUD lives outside this service.
 */
export interface ExamDirectory {
  findById(id: string): Promise<Exam | null>;
}
