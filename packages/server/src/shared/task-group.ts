type TimerHandle = ReturnType<typeof setTimeout>;

/**
 * Owns a set of scheduled callbacks so they can be cancelled as a unit.
 * Once cancelled, the group refuses new work.
 */
export class TaskGroup {
  private readonly timeouts = new Set<TimerHandle>();
  private readonly intervals = new Set<TimerHandle>();
  private cancelled = false;

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get size(): number {
    return this.timeouts.size + this.intervals.size;
  }

  setTimeout(callback: () => void, delayMs: number): boolean {
    if (this.cancelled) {
      return false;
    }
    const handle = setTimeout(() => {
      this.timeouts.delete(handle);
      callback();
    }, delayMs);
    this.timeouts.add(handle);
    return true;
  }

  setInterval(callback: () => void, periodMs: number): boolean {
    if (this.cancelled) {
      return false;
    }
    this.intervals.add(setInterval(callback, periodMs));
    return true;
  }

  /** Clears pending timeouts but keeps the group usable. */
  clearTimeouts(): void {
    for (const handle of this.timeouts) {
      clearTimeout(handle);
    }
    this.timeouts.clear();
  }

  cancel(): void {
    this.cancelled = true;
    this.clearTimeouts();
    for (const handle of this.intervals) {
      clearInterval(handle);
    }
    this.intervals.clear();
  }
}
