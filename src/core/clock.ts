/**
 * Clock
 *
 * Time source and cancellable sleep for the scheduling loops. `sleep` resolves
 * early, without throwing, once the signal is aborted; callers check
 * `signal.aborted` afterwards.
 */

export interface Clock {
  now(): Date;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted || ms <= 0) return Promise.resolve();

    return new Promise((resolve) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}

/**
 * Clock that only moves when slept on. Each sleep advances time by the full
 * duration and resolves on the next microtask; `onSleep` runs after the
 * advance, which lets a test abort or change state at a given instant.
 */
export class ManualClock implements Clock {
  private current: number;
  readonly sleeps: number[] = [];
  onSleep: ((now: Date) => void) | null = null;

  constructor(start: Date) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    this.sleeps.push(ms);
    this.current += Math.max(0, ms);
    this.onSleep?.(this.now());
    await Promise.resolve();
  }
}
