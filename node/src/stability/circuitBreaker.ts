// Circuit breaker for upstream text-generation providers
import { logger } from '@/services/logger';

export enum CircuitState {
  CLOSED = 'CLOSED',       // Normal operation
  OPEN = 'OPEN',           // Failing, skip calls
  HALF_OPEN = 'HALF_OPEN', // Letting calls through to test recovery
}

export interface CircuitBreakerConfig {
  failureThreshold: number;  // Open circuit after N consecutive failures
  successThreshold: number;  // Close circuit after N successes (half-open)
  resetTimeout: number;      // Time before attempting half-open (ms)
}

export const DEFAULT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 3,
  successThreshold: 1,
  resetTimeout: 60_000,
};

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime = 0;

  constructor(
    readonly name: string,
    private readonly config: CircuitBreakerConfig = DEFAULT_BREAKER_CONFIG,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Whether a call may go through right now. Moves OPEN → HALF_OPEN once the reset
   * timeout has passed.
   */
  canAttempt(): boolean {
    if (this.state !== CircuitState.OPEN) return true;
    if (this.now() - this.lastFailureTime > this.config.resetTimeout) {
      this.state = CircuitState.HALF_OPEN;
      this.successCount = 0;
      logger.info('circuit:half_open', { breaker: this.name });
      return true;
    }
    return false;
  }

  recordSuccess(): void {
    this.failureCount = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.successThreshold) {
        this.state = CircuitState.CLOSED;
        logger.info('circuit:closed', { breaker: this.name });
      }
    }
  }

  recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    // A failed probe while half-open reopens immediately.
    if (this.state === CircuitState.HALF_OPEN || this.failureCount >= this.config.failureThreshold) {
      if (this.state !== CircuitState.OPEN) {
        logger.warn('circuit:open', { breaker: this.name, failures: this.failureCount });
      }
      this.state = CircuitState.OPEN;
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = 0;
  }
}
