import { logger } from '../observability/logger.js';
import { systemClock, type Clock } from './clock.js';

const log = logger.child({ module: 'circuit-breaker' });

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  failureThreshold: number;
  recoveryTimeoutMs: number;
  clock?: Clock;
}

export interface CircuitSnapshot {
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
  openedAt: number;
}

export class CircuitOpenError extends Error {
  constructor(readonly breaker: string) {
    super(`Circuit breaker [${breaker}] is OPEN`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Fail-fast gate around one class of unreliable dependency.
 *
 * OPEN becomes HALF_OPEN lazily, on the first call after the recovery timeout.
 * HALF_OPEN admits a single trial call; its outcome closes or reopens the circuit.
 */
export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private consecutiveFailures = 0;
  private openedAt = 0;
  private trialInFlight = false;
  private readonly clock: Clock;

  constructor(
    readonly name: string,
    private readonly options: CircuitBreakerOptions,
  ) {
    this.clock = options.clock ?? systemClock;
  }

  get currentState(): CircuitState {
    return this.state;
  }

  async call<T>(fn: () => Promise<T>): Promise<T> {
    this.beforeCall();

    if (this.state === 'OPEN' || (this.state === 'HALF_OPEN' && this.trialInFlight)) {
      log.debug(
        { breaker: this.name, retryInMs: this.openedAt + this.options.recoveryTimeoutMs - this.clock() },
        'Circuit open, rejecting call',
      );
      throw new CircuitOpenError(this.name);
    }

    const isTrial = this.state === 'HALF_OPEN';
    if (isTrial) this.trialInFlight = true;

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (err) {
      this.onFailure(err, isTrial);
      throw err;
    } finally {
      if (isTrial) this.trialInFlight = false;
    }
  }

  snapshot(): CircuitSnapshot {
    return {
      name: this.name,
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
    };
  }

  private beforeCall(): void {
    if (this.state !== 'OPEN') return;
    if (this.clock() - this.openedAt > this.options.recoveryTimeoutMs) {
      log.info({ breaker: this.name }, 'Circuit half-open, admitting trial call');
      this.state = 'HALF_OPEN';
    }
  }

  private onSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      log.info({ breaker: this.name }, 'Circuit closed');
      this.state = 'CLOSED';
    }
    this.consecutiveFailures = 0;
  }

  private onFailure(err: unknown, isTrial: boolean): void {
    this.consecutiveFailures++;
    this.openedAt = this.clock();
    log.warn({ err, breaker: this.name, failures: this.consecutiveFailures }, 'Protected call failed');

    if (isTrial || this.consecutiveFailures >= this.options.failureThreshold) {
      if (this.state !== 'OPEN') {
        log.error({ breaker: this.name, failures: this.consecutiveFailures }, 'Circuit opened');
      }
      this.state = 'OPEN';
    }
  }
}

/**
 * Owns the single breaker per protected dependency class. Built once at startup
 * and handed to the components that need a breaker.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(private readonly clock: Clock = systemClock) {}

  get(name: string, options: Omit<CircuitBreakerOptions, 'clock'>): CircuitBreaker {
    const existing = this.breakers.get(name);
    if (existing) return existing;

    const breaker = new CircuitBreaker(name, { ...options, clock: this.clock });
    this.breakers.set(name, breaker);
    return breaker;
  }

  snapshots(): CircuitSnapshot[] {
    return [...this.breakers.values()].map(b => b.snapshot());
  }
}
