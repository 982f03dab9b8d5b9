import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import CircuitBreaker from 'opossum';

export interface BreakerSettings {
  timeoutMs: number;
  /** Failure percentage within the rolling window that opens the circuit */
  errorThresholdPercentage: number;
  resetTimeoutMs: number;
  /** Calls in the window before the percentage is considered */
  volumeThreshold: number;
}

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitHealth {
  state: CircuitState;
  failures: number;
  successes: number;
  rejects: number;
  timeouts: number;
}

const DEFAULT_SETTINGS: BreakerSettings = {
  timeoutMs: 10000,
  errorThresholdPercentage: 50,
  resetTimeoutMs: 30000,
  volumeThreshold: 10,
};

type RegisteredBreaker = Pick<
  CircuitBreaker,
  'opened' | 'halfOpen' | 'stats' | 'shutdown'
>;

/**
 * Builds opossum breakers with shared defaults and state-change logging.
 * Every breaker is registered under its key for health reporting and is shut
 * down with the module.
 */
@Injectable()
export class CircuitBreakerFactory implements OnModuleDestroy {
  private readonly logger = new Logger(CircuitBreakerFactory.name);
  private readonly breakers = new Map<string, RegisteredBreaker>();

  create<TArgs extends unknown[], TResult>(
    key: string,
    action: (...args: TArgs) => Promise<TResult>,
    settings: Partial<BreakerSettings> = {},
  ): CircuitBreaker<TArgs, TResult> {
    const { timeoutMs, errorThresholdPercentage, resetTimeoutMs, volumeThreshold } = {
      ...DEFAULT_SETTINGS,
      ...settings,
    };
    const breaker = new CircuitBreaker<TArgs, TResult>(action, {
      timeout: timeoutMs,
      errorThresholdPercentage,
      resetTimeout: resetTimeoutMs,
      volumeThreshold,
      // a 4xx is the receiver refusing this payload; the endpoint itself is up
      errorFilter: (error: unknown) => isClientError(error),
    });

    breaker.on('open', () =>
      this.logger.error(`Circuit ${key} opened; calls fail fast for ${resetTimeoutMs}ms`),
    );
    breaker.on('halfOpen', () => this.logger.warn(`Circuit ${key} half-open, allowing a trial call`));
    breaker.on('close', () => this.logger.log(`Circuit ${key} closed`));

    this.breakers.get(key)?.shutdown();
    this.breakers.set(key, breaker);
    return breaker;
  }

  health(): Record<string, CircuitHealth> {
    return Object.fromEntries(
      [...this.breakers].map(([key, breaker]) => [key, healthOf(breaker)]),
    );
  }

  onModuleDestroy(): void {
    this.breakers.forEach((breaker) => breaker.shutdown());
    this.breakers.clear();
  }
}

function healthOf(breaker: RegisteredBreaker): CircuitHealth {
  const { failures, successes, rejects, timeouts } = breaker.stats;
  let state: CircuitState = 'CLOSED';
  if (breaker.opened) state = 'OPEN';
  else if (breaker.halfOpen) state = 'HALF_OPEN';
  return { state, failures, successes, rejects, timeouts };
}

function isClientError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('statusCode' in error)) {
    return false;
  }
  const { statusCode } = error;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500;
}
