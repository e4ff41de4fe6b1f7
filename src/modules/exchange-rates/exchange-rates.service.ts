import { HttpService } from '@nestjs/axios';
import {
  BadGatewayException,
  Injectable,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import CircuitBreaker from 'opossum';
import { firstValueFrom } from 'rxjs';
import { CircuitBreakerService } from '../../core/circuit-breaker/circuit-breaker.service';
import { logger } from '../../core/logger/logger.config';
import { describeError } from '../../core/utils/timestamp.util';

export const EXCHANGE_RATE_BREAKER = 'exchange-rate-api';

const PRIMARY_TIMEOUT_MS = 1000;
const BACKUP_TIMEOUT_MS = 5000;

export type ExchangeRates = Record<string, number>;

const isRatesResponse = (
  body: unknown,
): body is { rates: Record<string, unknown> } =>
  typeof body === 'object' &&
  body !== null &&
  'rates' in body &&
  typeof body.rates === 'object' &&
  body.rates !== null;

const isOpenBreakerError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'EOPENBREAKER';

@Injectable()
export class ExchangeRatesService {
  private readonly logger = logger('exchange-rates');
  private readonly breaker: CircuitBreaker<[string], ExchangeRates>;
  private readonly primaryUrl: string;
  private readonly backupUrl: string;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
    circuitBreakerService: CircuitBreakerService,
  ) {
    this.primaryUrl = this.configService.get<string>(
      'EXCHANGE_RATE_API_URL',
      'https://open.er-api.com/v6/latest',
    );
    this.backupUrl = this.configService.get<string>(
      'EXCHANGE_RATE_BACKUP_API_URL',
      'https://api.exchangerate-api.com/v4/latest',
    );
    this.breaker = circuitBreakerService.createCircuitBreaker(
      (base: string) => this.fetchRates(base),
      { name: EXCHANGE_RATE_BREAKER },
    );
  }

  async convert(amount: number, from: string, to: string): Promise<number> {
    const base = from.toUpperCase();
    const target = to.toUpperCase();
    if (base === target) return amount;

    let rates: ExchangeRates;
    try {
      rates = await this.breaker.fire(base);
    } catch (error) {
      if (isOpenBreakerError(error)) {
        throw new ServiceUnavailableException(
          'Exchange rate service temporarily unavailable',
        );
      }
      this.logger.error(
        { error: describeError(error), base },
        'Exchange rate lookup failed',
      );
      throw new BadGatewayException('Failed to retrieve exchange rate');
    }

    const rate = rates[target];
    if (rate === undefined) {
      this.logger.warn({ base, target }, 'Exchange rate missing from response');
      throw new BadGatewayException('Failed to retrieve exchange rate');
    }

    return amount * rate;
  }

  private async fetchRates(base: string): Promise<ExchangeRates> {
    try {
      return await this.request(`${this.primaryUrl}/${base}`, PRIMARY_TIMEOUT_MS);
    } catch (error) {
      this.logger.warn(
        { error: describeError(error), base },
        'Primary exchange rate API failed, trying backup',
      );
      return this.request(`${this.backupUrl}/${base}`, BACKUP_TIMEOUT_MS);
    }
  }

  private async request(url: string, timeout: number): Promise<ExchangeRates> {
    const response = await firstValueFrom(
      this.httpService.get<unknown>(url, { timeout }),
    );

    if (response.status !== 200 || !isRatesResponse(response.data)) {
      throw new Error(`Unexpected exchange rate response (${response.status})`);
    }

    const rates: ExchangeRates = {};
    for (const [currency, rate] of Object.entries(response.data.rates)) {
      if (typeof rate === 'number') rates[currency] = rate;
    }
    return rates;
  }
}
