type Release = () => void;

interface Lane {
  locked: boolean;
  waiters: Array<(release: Release) => void>;
}

/**
 * FIFO mutex per key. Work for one session runs one item at a time while
 * other sessions proceed independently.
 */
export class TurnQueue {
  private readonly lanes = new Map<string, Lane>();

  async acquire(key: string): Promise<Release> {
    const lane = this.lanes.get(key) ?? { locked: false, waiters: [] };
    this.lanes.set(key, lane);

    if (!lane.locked) {
      lane.locked = true;
      return this.releaser(key, lane);
    }

    return new Promise<Release>((resolve) => {
      lane.waiters.push(resolve);
    });
  }

  async run<T>(key: string, work: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await work();
    } finally {
      release();
    }
  }

  isBusy(key: string): boolean {
    return this.lanes.get(key)?.locked ?? false;
  }

  private releaser(key: string, lane: Lane): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      const next = lane.waiters.shift();
      if (next) {
        next(this.releaser(key, lane));
        return;
      }
      lane.locked = false;
      this.lanes.delete(key);
    };
  }
}
