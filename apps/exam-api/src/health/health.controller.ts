// Import NestJS decorators for controllers
import { Controller, Get, Inject } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { CLOCK, type Clock } from '../common/time/clock';

/**
 * HealthController - unauthenticated liveness probe
 * Route: GET /health
 */
@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  @Get()
  @ApiOperation({ summary: 'Liveness probe for load balancers and monitoring' })
  health() {
    return { status: 'ok', service: 'exam-api', timestamp: this.clock.now().toISOString() };
  }
}
