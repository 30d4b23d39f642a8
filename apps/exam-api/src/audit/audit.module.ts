// Import Global and Module decorators
import { Global, Module } from '@nestjs/common';
import { LoggingModule } from '../logging/logging.module';
// Import AuditService for action logging
import { AuditService } from './audit.service';

/**
 * AuditModule - Global module providing audit logging
 */
@Global()
@Module({
  imports: [LoggingModule],
  providers: [AuditService],
  exports: [AuditService]
})
export class AuditModule {}
