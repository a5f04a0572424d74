export interface TimerHandle {
  cancel(): void;
}

export interface Clock {
  now(): Date;
  setTimeout(callback: () => void, delayMs: number): TimerHandle;
  setInterval(callback: () => void, periodMs: number): TimerHandle;
}

// Node fires timers immediately when the delay overflows a signed 32-bit int.
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

class SystemTimer implements TimerHandle {
  private timer: NodeJS.Timeout | null = null;
  private cancelled = false;

  constructor(
    private readonly callback: () => void,
    private readonly periodMs: number,
    private readonly repeats: boolean,
  ) {
    this.schedule(periodMs);
  }

  cancel(): void {
    this.cancelled = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private schedule(remainingMs: number): void {
    if (this.cancelled) return;
    const delay = Math.min(Math.max(remainingMs, 0), MAX_TIMER_DELAY_MS);

    this.timer = setTimeout(() => {
      this.timer = null;
      const left = remainingMs - delay;
      if (left > 0) {
        this.schedule(left);
        return;
      }
      if (this.repeats) {
        this.schedule(this.periodMs);
      }
      this.callback();
    }, delay);
  }
}

export const systemClock: Clock = {
  now: () => new Date(),
  setTimeout: (callback, delayMs) => new SystemTimer(callback, delayMs, false),
  setInterval: (callback, periodMs) => new SystemTimer(callback, periodMs, true),
};
