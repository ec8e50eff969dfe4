// Path: src/utils/timer.ts
// Timer management utilities

/**
 * Managed timer that tracks a single interval.
 * Setting a new interval replaces the previous one.
 */
export class ManagedTimer {
  private timer: NodeJS.Timeout | null = null;

  setInterval(callback: () => void, interval: number): void {
    this.clear();
    this.timer = setInterval(callback, interval);
  }

  clear(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isActive(): boolean {
    return this.timer !== null;
  }
}

/**
 * Resolve on the next turn of the event loop.
 * Used to break recursion between a crash and the restart it triggers.
 */
export function nextTick(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
