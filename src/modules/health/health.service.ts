import { Injectable } from '@nestjs/common';
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { CircuitBreakerService } from '../../core/circuit-breaker/circuit-breaker.service';
import { EXCHANGE_RATE_BREAKER } from '../exchange-rates/exchange-rates.service';

@Injectable()
export class HealthService extends HealthIndicator {
  constructor(private readonly circuitBreakerService: CircuitBreakerService) {
    super();
  }

  /**
   * Unhealthy only while the exchange-rate circuit is open; a breaker that
   * has not been created yet counts as closed.
   */
  async checkExchangeRates(): Promise<HealthIndicatorResult> {
    const state = this.circuitBreakerService.getCircuitBreakerState(
      EXCHANGE_RATE_BREAKER,
    );
    const isHealthy = !this.circuitBreakerService.isOpen(
      EXCHANGE_RATE_BREAKER,
    );
    const result = this.getStatus(EXCHANGE_RATE_BREAKER, isHealthy, {
      state: state?.state ?? 'closed',
      failures: state?.failures ?? 0,
      fires: state?.fires ?? 0,
    });

    if (!isHealthy) {
      throw new HealthCheckError('Exchange rate circuit breaker open', result);
    }
    return result;
  }
}
