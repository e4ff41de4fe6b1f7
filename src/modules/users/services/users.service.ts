import {
  BadRequestException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { KofiTransaction, KofiUser } from '../../../core/database/entities';
import { logger } from '../../../core/logger/logger.config';
import { formatTimestamp } from '../../../core/utils/timestamp.util';

export interface UserChanges {
  dataRetentionDays?: number;
  latestRequestAt?: string;
  preferredCurrency?: string;
}

export const DEFAULT_CURRENCY = 'USD';

@Injectable()
export class UsersService {
  private readonly logger = logger();

  constructor(
    @InjectRepository(KofiUser)
    private readonly userRepository: Repository<KofiUser>,
    private readonly dataSource: DataSource,
    private readonly configService: ConfigService,
  ) {}

  async create(
    verificationToken: string,
    dataRetentionDays?: number,
  ): Promise<KofiUser> {
    if (await this.userRepository.existsBy({ verificationToken })) {
      throw new BadRequestException('User already exists');
    }

    const user = await this.userRepository.save(
      this.buildUser(verificationToken, dataRetentionDays),
    );
    this.logger.info({ retentionDays: user.dataRetentionDays }, 'User created');
    return user;
  }

  /**
   * Creates the user with default settings unless it already exists.
   * Safe against concurrent webhooks for the same token.
   */
  async ensureExists(verificationToken: string): Promise<void> {
    await this.userRepository
      .createQueryBuilder()
      .insert()
      .into(KofiUser)
      .values(this.buildUser(verificationToken))
      .orIgnore()
      .execute();
  }

  findOne(verificationToken: string): Promise<KofiUser | null> {
    return this.userRepository.findOneBy({ verificationToken });
  }

  async getOrFail(verificationToken: string): Promise<KofiUser> {
    const user = await this.findOne(verificationToken);
    if (!user) {
      throw new NotFoundException('Invalid verification token');
    }
    return user;
  }

  findAll(): Promise<KofiUser[]> {
    return this.userRepository.find();
  }

  async update(
    verificationToken: string,
    changes: UserChanges,
  ): Promise<KofiUser> {
    const user = await this.getOrFail(verificationToken);

    if (changes.dataRetentionDays !== undefined) {
      user.dataRetentionDays = changes.dataRetentionDays;
    }
    if (changes.latestRequestAt !== undefined) {
      user.latestRequestAt = changes.latestRequestAt;
    }
    if (changes.preferredCurrency !== undefined) {
      user.preferredCurrency = changes.preferredCurrency.toUpperCase();
    }

    return this.userRepository.save(user);
  }

  async remove(
    verificationToken: string,
    includeTransactions: boolean,
  ): Promise<void> {
    await this.getOrFail(verificationToken);

    await this.dataSource.transaction(async (manager) => {
      await manager.delete(KofiUser, { verificationToken });
      if (includeTransactions) {
        await manager.delete(KofiTransaction, { verificationToken });
      }
    });

    this.logger.info({ includeTransactions }, 'User deleted');
  }

  private buildUser(
    verificationToken: string,
    dataRetentionDays?: number,
  ): KofiUser {
    const user = new KofiUser();
    user.verificationToken = verificationToken;
    user.dataRetentionDays =
      dataRetentionDays ||
      this.configService.get<number>('DATA_RETENTION_DAYS', 10);
    user.latestRequestAt = formatTimestamp(new Date());
    user.preferredCurrency = DEFAULT_CURRENCY;
    return user;
  }
}
