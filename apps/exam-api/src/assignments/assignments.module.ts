import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { RbacModule } from '../iam/rbac/rbac.module';
import { AssignmentLedgerService } from './assignment-ledger.service';
import { AssignmentsController } from './assignments.controller';
import { GradingWorkflowService } from './grading-workflow.service';

/**
 * AssignmentsModule - the user/exam ledger and the grading workflow on top of it
 */
@Module({
  imports: [AuthModule, RbacModule],
  controllers: [AssignmentsController],
  providers: [AssignmentLedgerService, GradingWorkflowService],
  exports: [AssignmentLedgerService, GradingWorkflowService]
})
export class AssignmentsModule {}
