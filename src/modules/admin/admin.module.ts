import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { KofiTransaction, KofiUser } from '../../core/database/entities';
import { AdminController } from './admin.controller';
import { AdminService } from './admin.service';

@Module({
  imports: [TypeOrmModule.forFeature([KofiTransaction, KofiUser])],
  controllers: [AdminController],
  providers: [AdminService],
})
export class AdminModule {}
