import { HttpService } from '@nestjs/axios';
import {
  BadGatewayException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { AxiosHeaders, AxiosRequestConfig, AxiosResponse } from 'axios';
import { Observable, of, throwError } from 'rxjs';
import { CircuitBreakerService } from '../../core/circuit-breaker/circuit-breaker.service';
import { ExchangeRatesService } from './exchange-rates.service';

const response = (data: unknown, status = 200): AxiosResponse<unknown> => ({
  data,
  status,
  statusText: status === 200 ? 'OK' : 'Error',
  headers: {},
  config: { headers: new AxiosHeaders() },
});

describe('ExchangeRatesService', () => {
  let service: ExchangeRatesService;
  let breakers: CircuitBreakerService;
  const get = jest.fn<
    Observable<AxiosResponse<unknown>>,
    [string, AxiosRequestConfig | undefined]
  >();

  beforeEach(async () => {
    get.mockReset();
    const moduleRef = await Test.createTestingModule({
      providers: [
        ExchangeRatesService,
        CircuitBreakerService,
        { provide: HttpService, useValue: { get } },
        {
          provide: ConfigService,
          useValue: new ConfigService({
            EXCHANGE_RATE_API_URL: 'https://rates.test/primary',
            EXCHANGE_RATE_BACKUP_API_URL: 'https://rates.test/backup',
          }),
        },
      ],
    }).compile();

    service = moduleRef.get(ExchangeRatesService);
    breakers = moduleRef.get(CircuitBreakerService);
  });

  afterEach(() => {
    breakers.onModuleDestroy();
  });

  it('converts with the primary endpoint', async () => {
    get.mockReturnValue(of(response({ rates: { EUR: 0.5 } })));

    await expect(service.convert(10, 'usd', 'eur')).resolves.toBe(5);
    expect(get).toHaveBeenCalledTimes(1);
    expect(get).toHaveBeenCalledWith('https://rates.test/primary/USD', {
      timeout: 1000,
    });
  });

  it('skips the lookup when both currencies match', async () => {
    await expect(service.convert(7, 'EUR', 'eur')).resolves.toBe(7);
    expect(get).not.toHaveBeenCalled();
  });

  it('falls back to the backup endpoint', async () => {
    get
      .mockReturnValueOnce(throwError(() => new Error('timeout of 1000ms exceeded')))
      .mockReturnValueOnce(of(response({ rates: { GBP: 2 } })));

    await expect(service.convert(3, 'USD', 'GBP')).resolves.toBe(6);
    expect(get).toHaveBeenLastCalledWith('https://rates.test/backup/USD', {
      timeout: 5000,
    });
  });

  it('treats a non-200 answer as a failure', async () => {
    get
      .mockReturnValueOnce(of(response({ result: 'error' }, 503)))
      .mockReturnValueOnce(of(response({ rates: { JPY: 100 } })));

    await expect(service.convert(2, 'USD', 'JPY')).resolves.toBe(200);
  });

  it('fails with 502 when the target rate is missing', async () => {
    get.mockReturnValue(of(response({ rates: { EUR: 0.5 } })));

    await expect(service.convert(1, 'USD', 'XYZ')).rejects.toThrow(
      new BadGatewayException('Failed to retrieve exchange rate'),
    );
  });

  it('fails with 502 when both endpoints fail, then 503 once the circuit opens', async () => {
    get.mockReturnValue(throwError(() => new Error('getaddrinfo ENOTFOUND')));

    await expect(service.convert(1, 'USD', 'EUR')).rejects.toBeInstanceOf(
      BadGatewayException,
    );
    await expect(service.convert(1, 'USD', 'EUR')).rejects.toBeInstanceOf(
      ServiceUnavailableException,
    );
    expect(get).toHaveBeenCalledTimes(2);
  });
});
