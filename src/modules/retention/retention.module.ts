import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { KofiTransaction, KofiUser } from '../../core/database/entities';
import { RetentionService } from './retention.service';

@Module({
  imports: [TypeOrmModule.forFeature([KofiTransaction, KofiUser])],
  providers: [RetentionService],
})
export class RetentionModule {}
