/**
 * Exam as consumed by the grading core (read-only; managed elsewhere).
 */
export interface Exam {
  id: string;
  title: string;
  date: Date;
}
