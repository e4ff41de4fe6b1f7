import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { tmpdir } from 'node:os';
import { DatabaseMergeDomain } from '../../domain/reconciliation/database-merge.domain';
import { BackupController } from './controllers/backup.controller';
import { DatabaseExportService } from './services/database-export.service';
import { DatabaseReconciliationService } from './services/database-reconciliation.service';

@Module({
  imports: [
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        dest: configService.get<string>('UPLOAD_DIR', tmpdir()),
      }),
    }),
  ],
  controllers: [BackupController],
  providers: [
    DatabaseMergeDomain,
    DatabaseExportService,
    DatabaseReconciliationService,
  ],
})
export class BackupModule {}
