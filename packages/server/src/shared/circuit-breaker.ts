/**
 * Three-state circuit breaker guarding one downstream dependency.
 *
 *   closed   : every call allowed; `threshold` consecutive failures open it
 *   open     : calls refused until `timeoutMs` has elapsed
 *   half-open: probe calls allowed; 3 successes close it, 1 failure reopens it
 *
 * The open → half-open transition happens inside `allow()`, not on a timer.
 * Every method runs to completion synchronously, so concurrent async callers
 * cannot observe a partially applied transition.
 */

export type CircuitState = "closed" | "open" | "half-open";

export interface CircuitBreakerConfig {
  readonly threshold: number;
  readonly timeoutMs: number;
  readonly halfOpenSuccesses: number;
}

export interface CircuitBreakerSnapshot {
  readonly state: CircuitState;
  readonly failureCount: number;
  readonly successCount: number;
  /** Epoch ms after which an open circuit admits a probe. null when not open. */
  readonly nextAttemptAt: number | null;
}

export type CircuitStateListener = (state: CircuitState, previous: CircuitState) => void;

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  threshold: 5,
  timeoutMs: 60_000,
  halfOpenSuccesses: 3,
};

export class CircuitBreaker {
  private readonly config: CircuitBreakerConfig;
  private readonly now: () => number;
  private readonly listeners = new Set<CircuitStateListener>();
  private state: CircuitState = "closed";
  private failureCount = 0;
  private successCount = 0;
  private nextAttemptAt: number | null = null;

  constructor(config?: Partial<CircuitBreakerConfig>, now?: () => number) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.now = now ?? Date.now;
  }

  allow(): boolean {
    switch (this.state) {
      case "closed":
      case "half-open":
        return true;
      case "open":
        if (this.nextAttemptAt !== null && this.now() >= this.nextAttemptAt) {
          this.successCount = 0;
          this.transition("half-open");
          return true;
        }
        return false;
    }
  }

  recordSuccess(): void {
    this.failureCount = 0;
    if (this.state !== "half-open") {
      return;
    }
    this.successCount += 1;
    if (this.successCount >= this.config.halfOpenSuccesses) {
      this.successCount = 0;
      this.nextAttemptAt = null;
      this.transition("closed");
    }
  }

  recordFailure(): void {
    this.failureCount += 1;
    if (this.state === "half-open") {
      this.trip();
      return;
    }
    if (this.state === "closed" && this.failureCount >= this.config.threshold) {
      this.trip();
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  snapshot(): CircuitBreakerSnapshot {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      nextAttemptAt: this.nextAttemptAt,
    };
  }

  subscribe(listener: CircuitStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private trip(): void {
    this.successCount = 0;
    this.nextAttemptAt = this.now() + this.config.timeoutMs;
    this.transition("open");
  }

  private transition(next: CircuitState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    for (const listener of this.listeners) {
      listener(next, previous);
    }
  }
}

/**
 * Lazily creates one breaker per protected dependency (e.g. per LLM provider).
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(
    private readonly config?: Partial<CircuitBreakerConfig>,
    private readonly now?: () => number
  ) {}

  get(name: string): CircuitBreaker {
    let breaker = this.breakers.get(name);
    if (!breaker) {
      breaker = new CircuitBreaker(this.config, this.now);
      this.breakers.set(name, breaker);
    }
    return breaker;
  }

  entries(): Array<[string, CircuitBreakerSnapshot]> {
    return Array.from(this.breakers, ([name, breaker]) => [name, breaker.snapshot()]);
  }
}
