import { Global, Module } from '@nestjs/common';
import { CLOCK, systemClock } from './clock';

/**
 * TimeModule - the wall clock every expiry and timestamp is read from.
 * Tests override CLOCK with a fixed or stepping clock.
 */
@Global()
@Module({
  providers: [{ provide: CLOCK, useValue: systemClock }],
  exports: [CLOCK]
})
export class TimeModule {}
