// Import Module decorator
import { Module } from '@nestjs/common';
import { HealthController } from './health.controller';

/**
 * HealthModule - Provides the liveness endpoint used by load balancers and deployment pipelines
 */
@Module({
  controllers: [HealthController]
})
export class HealthModule {}
