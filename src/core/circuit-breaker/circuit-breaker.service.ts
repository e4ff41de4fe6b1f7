import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import CircuitBreaker from 'opossum';
import { logger } from '../logger/logger.config';
import { describeError } from '../utils/timestamp.util';

export interface CircuitBreakerOptions {
  timeout?: number;
  errorThresholdPercentage?: number;
  resetTimeout?: number;
  name?: string;
}

export type CircuitState = 'open' | 'halfOpen' | 'closed';

export interface CircuitBreakerState {
  state: CircuitState;
  enabled: boolean;
  failures: number;
  fires: number;
}

const stateOf = (breaker: CircuitBreaker): CircuitState => {
  if (breaker.opened) return 'open';
  if (breaker.halfOpen) return 'halfOpen';
  return 'closed';
};

@Injectable()
export class CircuitBreakerService implements OnModuleDestroy {
  private readonly logger = logger();
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(private readonly configService: ConfigService) {}

  createCircuitBreaker<TArgs extends unknown[], TResult>(
    fn: (...args: TArgs) => Promise<TResult>,
    options?: CircuitBreakerOptions,
  ): CircuitBreaker<TArgs, TResult> {
    const name = options?.name || 'default';
    const timeout =
      options?.timeout ||
      this.configService.get<number>('CIRCUIT_BREAKER_TIMEOUT', 10000);
    const errorThresholdPercentage =
      options?.errorThresholdPercentage ||
      this.configService.get<number>('CIRCUIT_BREAKER_ERROR_THRESHOLD', 50);
    const resetTimeout =
      options?.resetTimeout ||
      this.configService.get<number>('CIRCUIT_BREAKER_RESET_TIMEOUT', 30000);

    const breaker = new CircuitBreaker(fn, {
      timeout,
      errorThresholdPercentage,
      resetTimeout,
      name,
    });

    breaker.on('open', () => {
      this.logger.warn(
        { circuitBreaker: name, state: 'open' },
        'Circuit breaker opened',
      );
    });

    breaker.on('halfOpen', () => {
      this.logger.info(
        { circuitBreaker: name, state: 'halfOpen' },
        'Circuit breaker half-open',
      );
    });

    breaker.on('close', () => {
      this.logger.info(
        { circuitBreaker: name, state: 'close' },
        'Circuit breaker closed',
      );
    });

    breaker.on('failure', (error: unknown) => {
      this.logger.error(
        { circuitBreaker: name, error: describeError(error) },
        'Circuit breaker failure',
      );
    });

    this.breakers.get(name)?.shutdown();
    this.breakers.set(name, breaker);
    return breaker;
  }

  getCircuitBreakerState(name: string): CircuitBreakerState | null {
    const breaker = this.breakers.get(name);
    if (!breaker) return null;

    return {
      state: stateOf(breaker),
      enabled: breaker.enabled,
      failures: breaker.stats.failures,
      fires: breaker.stats.fires,
    };
  }

  isOpen(name: string): boolean {
    return this.getCircuitBreakerState(name)?.state === 'open';
  }

  onModuleDestroy(): void {
    this.breakers.forEach((breaker) => breaker.shutdown());
    this.breakers.clear();
  }
}
