import {
  BadRequestException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { MoreThanOrEqual, QueryFailedError, Repository } from 'typeorm';
import { KofiTransaction } from '../../../core/database/entities';
import { logger } from '../../../core/logger/logger.config';
import {
  formatTimestamp,
  parseTimestamp,
} from '../../../core/utils/timestamp.util';
import { PayloadValidatorService } from '../../../core/validation/payload-validator.service';
import {
  parseTotalMethod,
  selectLatest,
  sumByCurrency,
  TotalMethod,
} from '../../../domain/donations/donation-totals.domain';
import { KofiMapper } from '../../../domain/donations/mappers/kofi-mapper';
import { ExchangeRatesService } from '../../exchange-rates/exchange-rates.service';
import { UsersService } from '../../users/services/users.service';
import { KofiTransactionDto } from '../dto/kofi-transaction.dto';

export interface AmountRequest {
  method: string;
  verificationToken: string;
  since?: string;
  currency?: string;
}

@Injectable()
export class KofiService {
  private readonly logger = logger();

  constructor(
    @InjectRepository(KofiTransaction)
    private readonly transactionRepository: Repository<KofiTransaction>,
    private readonly usersService: UsersService,
    private readonly exchangeRatesService: ExchangeRatesService,
    private readonly payloadValidator: PayloadValidatorService,
  ) {}

  /**
   * Stores a webhook delivery. `rawData` is the JSON document Ko-fi posts in
   * the `data` form field.
   */
  async receiveWebhook(rawData: string | undefined): Promise<KofiTransaction> {
    const payload = await this.payloadValidator.validateWithDto(
      this.payloadValidator.parseJson(rawData),
      KofiTransactionDto,
    );
    const transaction = KofiMapper.toTransactionEntity(payload);

    if (
      await this.transactionRepository.existsBy({
        messageId: transaction.messageId,
      })
    ) {
      throw new BadRequestException('Transaction already exists');
    }

    try {
      await this.transactionRepository.insert(transaction);
    } catch (error) {
      if (error instanceof QueryFailedError) {
        throw new BadRequestException('Transaction already exists');
      }
      throw error;
    }

    await this.usersService.ensureExists(transaction.verificationToken);

    this.logger.info(
      { type: transaction.type, currency: transaction.currency },
      'Ko-fi transaction stored',
    );
    return transaction;
  }

  async findTransactions(verificationToken: string): Promise<KofiTransaction[]> {
    const transactions = await this.transactionRepository.findBy({
      verificationToken,
    });
    if (transactions.length === 0) {
      throw new NotFoundException('Invalid verification token');
    }
    return transactions;
  }

  async findTransaction(
    verificationToken: string,
    messageId: string,
  ): Promise<KofiTransaction> {
    const transaction = await this.transactionRepository.findOneBy({
      verificationToken,
      messageId,
    });
    if (!transaction) {
      throw new NotFoundException('Transaction not found');
    }
    return transaction;
  }

  async computeAmount(request: AmountRequest): Promise<number> {
    const method = parseTotalMethod(request.method);
    if (!method) {
      throw new BadRequestException(
        `Invalid 'method' parameter (${request.method.toLowerCase()}). Expected 'total', 'recent', or 'latest'.`,
      );
    }

    const user = await this.usersService.getOrFail(request.verificationToken);
    const transactions = await this.selectTransactions(
      method,
      request.verificationToken,
      request.since ?? user.latestRequestAt,
    );

    const target = (request.currency ?? user.preferredCurrency).toUpperCase();
    let total = 0;
    for (const [currency, amount] of sumByCurrency(transactions)) {
      total +=
        currency.toUpperCase() === target
          ? amount
          : await this.exchangeRatesService.convert(amount, currency, target);
    }
    return total;
  }

  private async selectTransactions(
    method: TotalMethod,
    verificationToken: string,
    since: string,
  ): Promise<KofiTransaction[]> {
    switch (method) {
      case TotalMethod.TOTAL:
        return this.transactionRepository.findBy({ verificationToken });
      case TotalMethod.RECENT: {
        const sinceMs = parseTimestamp(since);
        if (sinceMs === null) {
          throw new BadRequestException(
            "Invalid 'since' parameter. Expected ISO 8601 format.",
          );
        }
        const transactions = await this.transactionRepository.findBy({
          verificationToken,
          timestamp: MoreThanOrEqual(formatTimestamp(new Date(sinceMs))),
        });
        await this.usersService.update(verificationToken, {
          latestRequestAt: formatTimestamp(new Date()),
        });
        return transactions;
      }
      case TotalMethod.LATEST: {
        const latest = selectLatest(
          await this.transactionRepository.findBy({ verificationToken }),
        );
        return latest ? [latest] : [];
      }
    }
  }
}
