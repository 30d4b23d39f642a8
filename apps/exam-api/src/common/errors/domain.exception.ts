import { HttpException, HttpStatus } from '@nestjs/common';
import { ERROR_CODES, type ErrorCode } from '../http/error-codes';

/**
 * Base class for every business-rule failure of the exam results core.
 *
 * Extends HttpException so Nest keeps treating it as a client error, while
 * `errorCode` keeps each failure distinguishable for callers and for the
 * HttpErrorFilter.
 */
export abstract class DomainException extends HttpException {
  protected constructor(
    readonly errorCode: ErrorCode,
    message: string,
    status: HttpStatus
  ) {
    super(message, status);
  }
}

export class InvalidCredentialsException extends DomainException {
  constructor() {
    super(ERROR_CODES.INVALID_CREDENTIALS, 'Invalid email or password', HttpStatus.UNAUTHORIZED);
  }
}

export class TokenMalformedException extends DomainException {
  constructor() {
    super(ERROR_CODES.TOKEN_MALFORMED, 'Malformed session token', HttpStatus.UNAUTHORIZED);
  }
}

export class TokenSignatureInvalidException extends DomainException {
  constructor() {
    super(ERROR_CODES.TOKEN_SIGNATURE_INVALID, 'Invalid session token signature', HttpStatus.UNAUTHORIZED);
  }
}

export class TokenExpiredException extends DomainException {
  constructor() {
    super(ERROR_CODES.TOKEN_EXPIRED, 'Session token expired', HttpStatus.UNAUTHORIZED);
  }
}

export class ForbiddenActionException extends DomainException {
  constructor() {
    super(ERROR_CODES.FORBIDDEN, 'Forbidden', HttpStatus.FORBIDDEN);
  }
}

export class AlreadyRegisteredException extends DomainException {
  constructor() {
    super(ERROR_CODES.ALREADY_REGISTERED, 'You are already registered for this exam', HttpStatus.CONFLICT);
  }
}

export class AlreadyGradedException extends DomainException {
  constructor() {
    super(ERROR_CODES.ALREADY_GRADED, 'This assignment has already been graded', HttpStatus.CONFLICT);
  }
}

export class InvalidVoteException extends DomainException {
  constructor() {
    super(ERROR_CODES.INVALID_VOTE, 'Vote must be a number between 0 and 100', HttpStatus.UNPROCESSABLE_ENTITY);
  }
}

export class ExamNotFoundException extends DomainException {
  constructor() {
    super(ERROR_CODES.EXAM_NOT_FOUND, 'Exam not found', HttpStatus.NOT_FOUND);
  }
}

export class AssignmentNotFoundException extends DomainException {
  constructor() {
    super(ERROR_CODES.ASSIGNMENT_NOT_FOUND, 'User exam assignment not found', HttpStatus.NOT_FOUND);
  }
}
