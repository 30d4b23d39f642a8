import { Role } from '../../auth/enums/role.enum';

/**
 * Action - every operation the Permission Gate decides on
 */
export type Action =
  | 'create_exam'        // Define a new exam
  | 'assign_vote'        // Grade a user's assignment
  | 'register_for_exam'  // Register oneself for an exam
  | 'view_own_results'   // Read one's own assignments and grades
  | 'view_ungraded';     // Read the ungraded assignments workbench

export const ACTIONS: readonly Action[] = [
  'create_exam',
  'assign_vote',
  'register_for_exam',
  'view_own_results',
  'view_ungraded'
] as const;

/**
 * Capability table: role -> granted actions. Anything not listed is denied.
 */
export const CAPABILITIES: Readonly<Record<Role, readonly Action[]>> = {
  [Role.ADMIN]: ['create_exam'],
  [Role.SUPERVISOR]: ['assign_vote', 'view_ungraded'],
  [Role.USER]: ['register_for_exam', 'view_own_results']
};
