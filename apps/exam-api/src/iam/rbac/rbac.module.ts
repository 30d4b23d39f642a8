// Import Module decorator
import { Module } from '@nestjs/common';
// Import the Permission Gate
import { PermissionService } from './permission.service';
import { RbacGuard } from './rbac.guard';

/**
 * RbacModule - Role-based access control (static capability table)
 */
@Module({
  providers: [PermissionService, RbacGuard],
  exports: [PermissionService, RbacGuard]
})
export class RbacModule {}
