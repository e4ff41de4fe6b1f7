import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { TerminusModule } from '@nestjs/terminus';
import { AppController } from './app.controller';
import { validateEnvironment } from './core/config/env.validation';
import { CoreModule } from './core/core.module';
import { DatabaseModule } from './core/database/database.module';
import { AdminModule } from './modules/admin/admin.module';
import { BackupModule } from './modules/backup/backup.module';
import { HealthModule } from './modules/health/health.module';
import { KofiModule } from './modules/kofi/kofi.module';
import { RetentionModule } from './modules/retention/retention.module';
import { UsersModule } from './modules/users/users.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate: validateEnvironment,
    }),
    CoreModule,
    DatabaseModule,
    ScheduleModule.forRoot(),
    TerminusModule,
    KofiModule,
    UsersModule,
    AdminModule,
    BackupModule,
    RetentionModule,
    HealthModule,
  ],
  controllers: [AppController],
  providers: [],
})
export class AppModule {}
