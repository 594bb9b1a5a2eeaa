import { Injectable } from '@nestjs/common';

/**
 * Wall-clock source shared by the token cache, rate-limit tracker and retry engine.
 * Tests swap it for a virtual clock so waits complete instantly.
 */
@Injectable()
export class ClockService {
  /** Current time in epoch milliseconds */
  now(): number {
    return Date.now();
  }

  /** Current time in epoch seconds (the unit GitHub uses for rate-limit resets) */
  nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }

  sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
