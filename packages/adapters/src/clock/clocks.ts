import type { ClockPort } from '@field-visit/domain';

/**
 * Clock under test control. Every `now()` returns the current instant, then moves it on by `stepMs`
 * (default 0: frozen until `advance` or `set`).
 */
export class DeterministicClock implements ClockPort {
  private instantMs: number;

  constructor(
    startMs: number,
    private readonly stepMs = 0,
  ) {
    this.instantMs = startMs;
  }

  async now(): Promise<Date> {
    const at = new Date(this.instantMs);
    this.instantMs += this.stepMs;
    return at;
  }

  /** The next `now()` without consuming a step. */
  peek(): Date {
    return new Date(this.instantMs);
  }

  advance(ms: number): void {
    this.instantMs += ms;
  }

  set(at: Date): void {
    this.instantMs = at.getTime();
  }
}

/** Process clock of the server. Trusted relative to the device, not to the database. */
export class SystemClock implements ClockPort {
  async now(): Promise<Date> {
    return new Date();
  }
}
