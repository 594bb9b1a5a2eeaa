import { ClockService } from '../clock.service';

/**
 * Virtual clock for specs: sleeping advances time instead of waiting.
 */
export class FakeClock extends ClockService {
  readonly sleeps: number[] = [];

  constructor(private current: number = Date.UTC(2024, 0, 15, 12, 0, 0)) {
    super();
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    if (ms > 0) {
      this.current += ms;
    }
  }
}
