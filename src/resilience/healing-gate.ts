import { logger } from '../observability/logger.js';
import { systemClock, type Clock } from './clock.js';

const log = logger.child({ module: 'healing-gate' });

export interface HealingGateOptions {
  failureThreshold: number;
  isolationMs: number;
  clock?: Clock;
}

/**
 * Process-wide kill switch for AI healing. Counts consecutive failures on its own,
 * independent of the healing circuit breaker, and isolates the model for a
 * cooldown window once the threshold is reached.
 */
export class HealingGate {
  private consecutiveFailures = 0;
  private isolatedUntil = 0;
  private readonly clock: Clock;

  constructor(private readonly options: HealingGateOptions) {
    this.clock = options.clock ?? systemClock;
  }

  allows(): boolean {
    return this.clock() >= this.isolatedUntil;
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
  }

  recordFailure(err: unknown): void {
    this.consecutiveFailures++;
    if (this.consecutiveFailures < this.options.failureThreshold) return;

    this.isolatedUntil = this.clock() + this.options.isolationMs;
    this.consecutiveFailures = 0;
    log.error(
      { err, isolatedUntil: new Date(this.isolatedUntil).toISOString() },
      'AI healing isolated after repeated failures',
    );
  }
}
