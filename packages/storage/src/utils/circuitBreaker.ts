export interface CircuitBreakerOptions {
  failureThreshold: number;
  successThreshold?: number;
  resetTimeoutMs: number;
  onTransition?: (state: CircuitState) => void;
  now?: () => number;
}

export type CircuitState = "closed" | "open" | "half-open";

export class CircuitBreaker {
  private state: CircuitState = "closed";
  private failures = 0;
  private successes = 0;
  private nextAttempt = 0;
  private readonly now: () => number;

  constructor(private readonly options: CircuitBreakerOptions) {
    this.now = options.now ?? Date.now;
  }

  get current(): CircuitState {
    return this.state;
  }

  shouldAllow(): boolean {
    if (this.state === "open" && this.now() >= this.nextAttempt) {
      this.transition("half-open");
      return true;
    }
    return this.state !== "open";
  }

  recordSuccess(): void {
    if (this.state === "half-open") {
      this.successes++;
      if (this.successes >= (this.options.successThreshold ?? 1)) {
        this.reset();
      }
    } else {
      this.failures = 0;
    }
  }

  recordFailure(): void {
    if (this.state === "half-open") {
      this.trip();
      return;
    }
    this.failures++;
    if (this.failures >= this.options.failureThreshold) {
      this.trip();
    }
  }

  private trip(): void {
    this.successes = 0;
    this.nextAttempt = this.now() + this.options.resetTimeoutMs;
    this.transition("open");
  }

  private reset(): void {
    this.failures = 0;
    this.successes = 0;
    this.transition("closed");
  }

  private transition(state: CircuitState): void {
    if (this.state === state) return;
    this.state = state;
    this.options.onTransition?.(state);
  }
}
