import { BadRequestException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { KofiTransaction, KofiUser } from '../../../core/database/entities';
import { createInMemoryDataSource } from '../../../core/database/testing/in-memory-data-source';
import { PayloadValidatorService } from '../../../core/validation/payload-validator.service';
import { ExchangeRatesService } from '../../exchange-rates/exchange-rates.service';
import { UsersService } from '../../users/services/users.service';
import { KofiService } from './kofi.service';

const payload = (overrides: Record<string, unknown> = {}) => ({
  verification_token: 'token-1',
  message_id: 'msg-1',
  timestamp: '2024-09-20T10:00:00Z',
  type: 'Donation',
  is_public: true,
  from_name: 'Jo Example',
  message: 'Keep it up',
  amount: '3.00',
  url: 'https://ko-fi.com/Home/CoffeeShop?txid=test',
  email: 'jo@example.com',
  currency: 'USD',
  is_subscription_payment: false,
  is_first_subscription_payment: false,
  kofi_transaction_id: 'kofi-tx-1',
  shop_items: null,
  tier_name: null,
  shipping: null,
  ...overrides,
});

describe('KofiService', () => {
  let dataSource: DataSource;
  let service: KofiService;
  let users: UsersService;
  const convert = jest.fn<Promise<number>, [number, string, string]>();

  const receive = (overrides: Record<string, unknown> = {}) =>
    service.receiveWebhook(JSON.stringify(payload(overrides)));

  beforeEach(async () => {
    jest.useFakeTimers({
      now: new Date('2024-09-22T12:00:00.000Z'),
      doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'],
    });
    convert.mockReset();
    dataSource = await createInMemoryDataSource();

    const moduleRef = await Test.createTestingModule({
      providers: [
        KofiService,
        UsersService,
        PayloadValidatorService,
        { provide: DataSource, useValue: dataSource },
        {
          provide: getRepositoryToken(KofiTransaction),
          useValue: dataSource.getRepository(KofiTransaction),
        },
        {
          provide: getRepositoryToken(KofiUser),
          useValue: dataSource.getRepository(KofiUser),
        },
        {
          provide: ConfigService,
          useValue: new ConfigService({ DATA_RETENTION_DAYS: 10 }),
        },
        { provide: ExchangeRatesService, useValue: { convert } },
      ],
    }).compile();

    service = moduleRef.get(KofiService);
    users = moduleRef.get(UsersService);
  });

  afterEach(async () => {
    jest.useRealTimers();
    await dataSource.destroy();
  });

  describe('receiveWebhook', () => {
    it('stores the transaction and creates its user', async () => {
      await receive({
        shop_items: [{ direct_link_code: 'abc123', quantity: 1 }],
        shipping: { city: 'Lyon' },
      });

      const stored = await service.findTransaction('token-1', 'msg-1');
      expect(stored).toMatchObject({
        messageId: 'msg-1',
        amount: '3.00',
        isPublic: true,
        shopItems: [{ direct_link_code: 'abc123', quantity: 1 }],
        shipping: { city: 'Lyon' },
      });
      await expect(users.getOrFail('token-1')).resolves.toMatchObject({
        dataRetentionDays: 10,
        preferredCurrency: 'USD',
      });
    });

    it('rejects malformed JSON', async () => {
      await expect(service.receiveWebhook('{"message_id":')).rejects.toThrow(
        new BadRequestException('Invalid JSON format'),
      );
    });

    it('rejects payloads that fail validation', async () => {
      await expect(receive({ is_public: 'yes' })).rejects.toBeInstanceOf(
        BadRequestException,
      );
    });

    it('rejects a repeated message id', async () => {
      await receive();

      await expect(receive({ amount: '9.00' })).rejects.toThrow(
        new BadRequestException('Transaction already exists'),
      );
    });
  });

  describe('queries', () => {
    it('lists a token\'s transactions or reports the token unknown', async () => {
      await receive();
      await receive({ message_id: 'msg-2' });

      const found = await service.findTransactions('token-1');
      expect(found.map((row) => row.messageId).sort()).toEqual([
        'msg-1',
        'msg-2',
      ]);
      await expect(service.findTransactions('token-9')).rejects.toThrow(
        new NotFoundException('Invalid verification token'),
      );
    });

    it('reports a missing transaction', async () => {
      await receive();

      await expect(service.findTransaction('token-1', 'msg-9')).rejects.toThrow(
        new NotFoundException('Transaction not found'),
      );
    });
  });

  describe('computeAmount', () => {
    beforeEach(async () => {
      await users.create('token-1');
      await users.update('token-1', { latestRequestAt: '2024-09-21T00:00:00Z' });
      await receive({ message_id: 'm-old', timestamp: '2024-09-20T10:00:00Z', amount: '3.00' });
      await receive({ message_id: 'm-new', timestamp: '2024-09-21T10:00:00Z', amount: '2.50' });
      await receive({ message_id: 'm-eur', timestamp: '2024-09-21T09:00:00Z', amount: '10', currency: 'EUR' });
      await receive({ message_id: 'm-bad', timestamp: '2024-09-21T08:00:00Z', amount: 'n/a' });
      convert.mockImplementation(async (amount) => amount * 2);
    });

    it('totals every transaction, converting foreign currencies', async () => {
      await expect(
        service.computeAmount({ method: 'TOTAL', verificationToken: 'token-1' }),
      ).resolves.toBe(25.5);
      expect(convert).toHaveBeenCalledWith(10, 'EUR', 'USD');
    });

    it('converts into the requested currency', async () => {
      convert.mockImplementation(async (amount, from) =>
        from === 'USD' ? amount * 0.5 : amount,
      );

      await expect(
        service.computeAmount({
          method: 'total',
          verificationToken: 'token-1',
          currency: 'eur',
        }),
      ).resolves.toBe(12.75);
    });

    it('sums transactions since the last request and moves the marker', async () => {
      await expect(
        service.computeAmount({ method: 'recent', verificationToken: 'token-1' }),
      ).resolves.toBe(22.5);

      await expect(users.getOrFail('token-1')).resolves.toMatchObject({
        latestRequestAt: '2024-09-22T12:00:00Z',
      });
    });

    it('accepts an explicit since', async () => {
      await expect(
        service.computeAmount({
          method: 'recent',
          verificationToken: 'token-1',
          since: '2024-09-21T09:30:00+00:00',
        }),
      ).resolves.toBe(2.5);
    });

    it('rejects a since that is not a date', async () => {
      await expect(
        service.computeAmount({
          method: 'recent',
          verificationToken: 'token-1',
          since: 'yesterday',
        }),
      ).rejects.toThrow("Invalid 'since' parameter. Expected ISO 8601 format.");
    });

    it('returns the latest transaction amount', async () => {
      await expect(
        service.computeAmount({ method: 'latest', verificationToken: 'token-1' }),
      ).resolves.toBe(2.5);
      expect(convert).not.toHaveBeenCalled();
    });

    it('returns zero for latest when the user has no transactions', async () => {
      await users.create('token-2');

      await expect(
        service.computeAmount({ method: 'latest', verificationToken: 'token-2' }),
      ).resolves.toBe(0);
    });

    it('rejects unknown methods and users', async () => {
      await expect(
        service.computeAmount({ method: 'average', verificationToken: 'token-1' }),
      ).rejects.toBeInstanceOf(BadRequestException);
      await expect(
        service.computeAmount({ method: 'total', verificationToken: 'nobody' }),
      ).rejects.toThrow(new NotFoundException('Invalid verification token'));
    });
  });
});
