// Import SetMetadata to attach custom metadata to routes
import { SetMetadata } from '@nestjs/common';
import type { Action } from './permission.types';

// Metadata key read by RbacGuard
export const REQUIRED_ACTION_KEY = 'iam:requiredAction';

/**
 * @RequireAction() - declares the Permission Gate action a route performs.
 * Pair with @UseGuards(JwtAuthGuard, RbacGuard).
 */
export function RequireAction(action: Action) {
  return SetMetadata(REQUIRED_ACTION_KEY, action);
}
