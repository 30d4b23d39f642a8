/**
 * ERROR_CODES - Machine-readable error identifiers returned to API clients.
 * Each domain failure has its own code so callers can tell them apart
 * (an ALREADY_GRADED conflict is never reported as FORBIDDEN).
 */
export const ERROR_CODES = {
  /** Email/password pair did not match a stored user */
  INVALID_CREDENTIALS: 'INVALID_CREDENTIALS',

  /** Bearer token missing, not a JWT, or carrying unusable claims */
  TOKEN_MALFORMED: 'TOKEN_MALFORMED',

  /** Token was not signed with the configured secret */
  TOKEN_SIGNATURE_INVALID: 'TOKEN_SIGNATURE_INVALID',

  /** Token expiry (plus leeway) has elapsed */
  TOKEN_EXPIRED: 'TOKEN_EXPIRED',

  /** Role is not allowed to perform the action */
  FORBIDDEN: 'FORBIDDEN',

  /** User is already registered for the exam */
  ALREADY_REGISTERED: 'ALREADY_REGISTERED',

  /** Assignment already carries a vote */
  ALREADY_GRADED: 'ALREADY_GRADED',

  /** Vote outside [0, 100] or not a finite number */
  INVALID_VOTE: 'INVALID_VOTE',

  EXAM_NOT_FOUND: 'EXAM_NOT_FOUND',

  ASSIGNMENT_NOT_FOUND: 'ASSIGNMENT_NOT_FOUND',

  /** Authentication required but no usable identity on the request */
  UNAUTHENTICATED: 'UNAUTHENTICATED',

  /** No route matches the request */
  NOT_FOUND: 'NOT_FOUND',

  /** Request body or query failed DTO validation */
  VALIDATION_FAILED: 'VALIDATION_FAILED',

  /** Internal server error or unexpected exception */
  INTERNAL: 'INTERNAL'
} as const;

/**
 * ErrorCode type - Union of all error code values
 */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
