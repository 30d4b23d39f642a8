// Import NestJS Injectable decorator
import { Injectable } from '@nestjs/common';
import { JsonLogger } from '../logging/json-logger.service';

/**
 * AuditAction - state changes and session events worth an audit trail
 */
export type AuditAction =
  | 'exam.register'     // User registered for an exam
  | 'assignment.grade'  // Supervisor set a vote
  | 'auth.logout';      // Client announced it discarded its token

/**
 * AuditService - writes audit records to the JSON log stream.
 * Records are flagged with `audit: true` so the log pipeline can route them.
 */
@Injectable()
export class AuditService {
  constructor(private readonly logger: JsonLogger) {}

  /**
   * @param params.actorUserId - user performing the action (from the validated token)
   * @param params.targetId - affected record, e.g. "userId/examId" for assignments
   * @param params.after - resulting state, for mutations
   * @param params.requestId - correlation id of the HTTP request, when known
   */
  record(params: {
    actorUserId: string;
    action: AuditAction;
    targetType: string;
    targetId?: string;
    after?: unknown;
    requestId?: string;
  }): void {
    this.logger.log('Audit', { audit: true, ...params });
  }
}
