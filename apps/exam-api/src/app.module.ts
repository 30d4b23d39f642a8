// Import NestJS Module decorator to define the root module
import { Module } from '@nestjs/common';
// Import ConfigModule to manage environment variables and configuration
import { ConfigModule } from '@nestjs/config';
import { AssignmentsModule } from './assignments/assignments.module';
import { AuditModule } from './audit/audit.module';
import { AuthModule } from './auth/auth.module';
import { TimeModule } from './common/time/time.module';
import { validateEnv } from './config/env.validation';
import { StorageModule } from './database/storage.module';
import { HealthModule } from './health/health.module';
import { RbacModule } from './iam/rbac/rbac.module';
import { LoggingModule } from './logging/logging.module';

/**
 * AppModule - Root module of the application
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '.env.local'], // local overrides default
      validate: validateEnv
    }),
    LoggingModule,
    TimeModule,
    StorageModule,
    AuditModule,
    RbacModule,
    AuthModule,
    AssignmentsModule,
    HealthModule
  ]
})
export class AppModule {}
