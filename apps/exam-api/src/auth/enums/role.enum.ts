/**
 * Role - the closed set of user roles.
 * Values match what is stored in `users.role` and carried in the token `role` claim.
 */
export enum Role {
  ADMIN = 'admin',           // Defines exams
  SUPERVISOR = 'supervisor', // Grades user submissions
  USER = 'user'              // Registers for exams and reads own results
}

export const ROLES: readonly Role[] = [Role.ADMIN, Role.SUPERVISOR, Role.USER] as const;

/**
 * Type guard for role values coming from storage or token claims
 */
export function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}
