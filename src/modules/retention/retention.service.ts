import { Injectable } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { InjectRepository } from '@nestjs/typeorm';
import { LessThan, Repository } from 'typeorm';
import { KofiTransaction, KofiUser } from '../../core/database/entities';
import { logger } from '../../core/logger/logger.config';
import {
  DAY_MS,
  describeError,
  formatTimestamp,
} from '../../core/utils/timestamp.util';

export interface RetentionSweepResult {
  usersChecked: number;
  transactionsDeleted: number;
}

@Injectable()
export class RetentionService {
  private readonly logger = logger('retention');

  constructor(
    @InjectRepository(KofiUser)
    private readonly userRepository: Repository<KofiUser>,
    @InjectRepository(KofiTransaction)
    private readonly transactionRepository: Repository<KofiTransaction>,
  ) {}

  @Cron(CronExpression.EVERY_DAY_AT_MIDNIGHT)
  async scheduledSweep(): Promise<void> {
    try {
      await this.sweep();
    } catch (error) {
      this.logger.error(
        { error: describeError(error) },
        'Scheduled retention sweep failed',
      );
    }
  }

  /**
   * Deletes each user's transactions older than their retention window.
   * Timestamps are stored as UTC ISO strings, so they order lexically.
   */
  async sweep(now: Date = new Date()): Promise<RetentionSweepResult> {
    const users = await this.userRepository.find();
    const result: RetentionSweepResult = {
      usersChecked: users.length,
      transactionsDeleted: 0,
    };

    for (const user of users) {
      const cutoff = formatTimestamp(
        new Date(now.getTime() - user.dataRetentionDays * DAY_MS),
      );
      const deleted = await this.transactionRepository.delete({
        verificationToken: user.verificationToken,
        timestamp: LessThan(cutoff),
      });
      result.transactionsDeleted += deleted.affected ?? 0;
    }

    this.logger.info({ result }, 'Retention sweep completed');
    return result;
  }
}
