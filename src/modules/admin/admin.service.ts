import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { KofiTransaction, KofiUser } from '../../core/database/entities';

@Injectable()
export class AdminService {
  constructor(
    @InjectRepository(KofiTransaction)
    private readonly transactionRepository: Repository<KofiTransaction>,
    @InjectRepository(KofiUser)
    private readonly userRepository: Repository<KofiUser>,
  ) {}

  listTransactions(): Promise<KofiTransaction[]> {
    return this.transactionRepository.find({ order: { timestamp: 'ASC' } });
  }

  listUsers(): Promise<KofiUser[]> {
    return this.userRepository.find({ order: { verificationToken: 'ASC' } });
  }
}
