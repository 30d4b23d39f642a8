// Import Injectable decorator
import { Injectable } from '@nestjs/common';
import type { Role } from '../../auth/enums/role.enum';
import { ForbiddenActionException } from '../../common/errors/domain.exception';
import { CAPABILITIES, type Action } from './permission.types';

/**
 * PermissionService - the Permission Gate.
 * A pure lookup over (role, action); it never looks at the target resource,
 * so a denial says nothing about whether that resource exists.
 */
@Injectable()
export class PermissionService {
  isAllowed(role: Role, action: Action): boolean {
    return CAPABILITIES[role].includes(action);
  }

  /**
   * @throws ForbiddenActionException when the role lacks the action
   */
  authorize(role: Role, action: Action): void {
    if (!this.isAllowed(role, action)) {
      throw new ForbiddenActionException();
    }
  }

  /** Actions granted to a role, in table order */
  actionsFor(role: Role): readonly Action[] {
    return CAPABILITIES[role];
  }
}
