import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { logger } from '../logger/logger.config';
import { parseDatabaseUrl } from './database-url';
import { buildDatabaseOptions } from './database.options';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const target = parseDatabaseUrl(
          configService.get<string>('DATABASE_URL', 'sqlite:./data/kofi.db'),
        );
        logger().info({ driver: target.type }, 'Connecting to database');
        return buildDatabaseOptions(target);
      },
    }),
  ],
})
export class DatabaseModule {}
