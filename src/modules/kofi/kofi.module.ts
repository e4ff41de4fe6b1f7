import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { KofiTransaction } from '../../core/database/entities';
import { ExchangeRatesModule } from '../exchange-rates/exchange-rates.module';
import { UsersModule } from '../users/users.module';
import { KofiController } from './controllers/kofi.controller';
import { KofiService } from './services/kofi.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([KofiTransaction]),
    UsersModule,
    ExchangeRatesModule,
  ],
  controllers: [KofiController],
  providers: [KofiService],
})
export class KofiModule {}
