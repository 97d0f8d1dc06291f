// Circuit Breaker Registry
// No framework imports. One state record per endpoint URL, keyed by the literal URL string.
//
// CLOSED → OPEN after `failureThreshold` consecutive failures.
// While OPEN, isOpen() is true until more than `resetTimeoutMs` has passed since the
// last failure; the next check after that closes the circuit and zeroes the count.
// Any success closes the circuit and zeroes the count.
//
// Every method is synchronous, so each read-modify-write on a key completes without
// interleaving with other in-flight tickets.

export interface CircuitState {
  failureCount: number;
  isOpen: boolean;
  lastFailureAt: number; // epoch ms
}

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  resetTimeoutMs?: number;
  now?: () => number;
}

export const DEFAULT_FAILURE_THRESHOLD = 5;
export const DEFAULT_RESET_TIMEOUT_MS = 300 * 1000; // 5 minutes

export class CircuitBreakerRegistry {
  private readonly circuits = new Map<string, CircuitState>();
  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly now: () => number;

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    this.resetTimeoutMs = options.resetTimeoutMs ?? DEFAULT_RESET_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * True when calls to the endpoint must be short-circuited.
   * Lazily closes an open circuit whose cool-down has elapsed.
   */
  isOpen(endpoint: string): boolean {
    const state = this.circuits.get(endpoint);
    if (!state || state.failureCount < this.failureThreshold) {
      return false;
    }

    if (this.now() - state.lastFailureAt > this.resetTimeoutMs) {
      state.failureCount = 0;
      state.isOpen = false;
      return false;
    }

    return state.isOpen;
  }

  recordFailure(endpoint: string): CircuitState {
    const state = this.circuits.get(endpoint) ?? { failureCount: 0, isOpen: false, lastFailureAt: 0 };

    state.failureCount += 1;
    state.lastFailureAt = this.now();
    if (state.failureCount >= this.failureThreshold) {
      state.isOpen = true;
    }

    this.circuits.set(endpoint, state);
    return { ...state };
  }

  recordSuccess(endpoint: string): void {
    const state = this.circuits.get(endpoint);
    if (!state) return;

    state.failureCount = 0;
    state.isOpen = false;
  }

  getState(endpoint: string): CircuitState | undefined {
    const state = this.circuits.get(endpoint);
    return state ? { ...state } : undefined;
  }

  snapshot(): Record<string, CircuitState> {
    const result: Record<string, CircuitState> = {};
    for (const [endpoint, state] of this.circuits) {
      result[endpoint] = { ...state };
    }
    return result;
  }

  get threshold(): number {
    return this.failureThreshold;
  }

  get resetTimeout(): number {
    return this.resetTimeoutMs;
  }
}
