import { ConfigService } from '@nestjs/config';
import type { Clock } from '../../src/common/time/clock';
import type { JsonLogger } from '../../src/logging/json-logger.service';

export const TEST_SECRET = 'test-secret-test-secret-test-secret-0';

export function testConfig(overrides: Record<string, unknown> = {}): ConfigService {
  return new ConfigService({
    TOKEN_SECRET: TEST_SECRET,
    TOKEN_ISSUER: 'exam-results-api',
    TOKEN_TTL_SECONDS: 1800,
    TOKEN_CLOCK_LEEWAY_SECONDS: 5,
    TOKEN_REFRESH_GRACE_SECONDS: 0,
    PASSWORD_HASH_ROUNDS: 4,
    ...overrides
  });
}

/** Clock pinned to a settable instant */
export class FakeClock implements Clock {
  constructor(private current: Date) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(date: Date): void {
    this.current = new Date(date.getTime());
  }

  advanceSeconds(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }
}

/** Clock that moves forward one second on every read, so creation order is visible in timestamps */
export class SteppingClock implements Clock {
  private ticks = 0;

  constructor(private readonly start: Date) {}

  now(): Date {
    return new Date(this.start.getTime() + this.ticks++ * 1000);
  }
}

export function silentLogger(): JsonLogger {
  return {
    log: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    verbose: jest.fn()
  } as unknown as JsonLogger;
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
