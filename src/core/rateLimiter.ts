export class SlidingWindowRateLimiter {
  private readonly maxEvents: number;
  private readonly windowMs: number;
  private readonly windows = new Map<string, number[]>();

  constructor(maxEvents: number, windowMs: number) {
    this.maxEvents = maxEvents;
    this.windowMs = windowMs;
  }

  /** Records an event for `key` unless the key is already at its limit. */
  allow(key: string, nowMs: number = Date.now()): boolean {
    const timestamps = this.windows.get(key) ?? [];
    this.prune(timestamps, nowMs);

    if (timestamps.length >= this.maxEvents) {
      this.windows.set(key, timestamps);
      return false;
    }

    timestamps.push(nowMs);
    this.windows.set(key, timestamps);
    return true;
  }

  /** Drops keys whose window has emptied. */
  sweep(nowMs: number = Date.now()): void {
    for (const [key, timestamps] of this.windows) {
      this.prune(timestamps, nowMs);
      if (!timestamps.length) {
        this.windows.delete(key);
      }
    }
  }

  private prune(timestamps: number[], nowMs: number): void {
    const threshold = nowMs - this.windowMs;
    while (timestamps.length && timestamps[0] < threshold) {
      timestamps.shift();
    }
  }
}
