export interface Clock {
  now(): number;
  /** Resolves after `ms`, or early once `signal` aborts. Never rejects. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class SystemClock implements Clock {
  constructor(private readonly offsetMs: number = 0) {}

  /** A clock whose "now" starts at `time` and then advances in real time. */
  static startingAt(time: number): SystemClock {
    return new SystemClock(time - Date.now());
  }

  get offset(): number {
    return this.offsetMs;
  }

  now(): number {
    return Date.now() + this.offsetMs;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (ms <= 0 || signal?.aborted) {
        resolve();
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/** Test clock: time moves only through `sleep`, `advance` and `setTime`. */
export class ManualClock implements Clock {
  private currentTime: number;

  constructor(startTime: number) {
    this.currentTime = startTime;
  }

  now(): number {
    return this.currentTime;
  }

  setTime(time: number): void {
    if (time < this.currentTime) {
      throw new Error('Cannot move time backwards');
    }
    this.currentTime = time;
  }

  advance(ms: number): void {
    this.setTime(this.currentTime + ms);
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return;
    }
    if (ms > 0) {
      this.currentTime += ms;
    }
    await Promise.resolve();
  }
}

export const sleepUntil = (clock: Clock, time: number, signal?: AbortSignal): Promise<void> =>
  clock.sleep(time - clock.now(), signal);
