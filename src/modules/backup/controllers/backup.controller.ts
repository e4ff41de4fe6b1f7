import {
  BadRequestException,
  ConflictException,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  InternalServerErrorException,
  Post,
  StreamableFile,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FileInterceptor } from '@nestjs/platform-express';
import { createReadStream } from 'node:fs';
import { AdminSecretGuard } from '../../../core/guards/admin-secret.guard';
import { logger } from '../../../core/logger/logger.config';
import { Timeout } from '../../../core/timeout/timeout.decorator';
import { TimeoutInterceptor } from '../../../core/timeout/timeout.interceptor';
import { MergeMode } from '../../../domain/reconciliation/models';
import {
  MalformedDatabaseError,
  MergeFailedError,
  ReconciliationInProgressError,
} from '../../../domain/reconciliation/reconciliation.errors';
import { DatabaseExportService } from '../services/database-export.service';
import { DatabaseReconciliationService } from '../services/database-reconciliation.service';

const RECONCILIATION_TIMEOUT_MS = 3600000;

@Controller('db')
@UseGuards(AdminSecretGuard)
@UseInterceptors(TimeoutInterceptor)
export class BackupController {
  private readonly logger = logger();

  constructor(
    private readonly exportService: DatabaseExportService,
    private readonly reconciliationService: DatabaseReconciliationService,
    private readonly configService: ConfigService,
  ) {}

  @Get('export')
  async exportDatabase(): Promise<StreamableFile> {
    const exportPath = await this.exportService.exportDatabase();
    const projectName = this.configService.get<string>(
      'PROJECT_NAME',
      'Ko-fi API',
    );
    const filename = `${projectName}_export_${Math.floor(Date.now() / 1000)}.db`;

    const stream = createReadStream(exportPath);
    stream.once('close', () => {
      void this.exportService.discard(exportPath);
    });

    return new StreamableFile(stream, {
      type: 'application/octet-stream',
      disposition: `attachment; filename="${filename}"`,
    });
  }

  @Post('recover')
  @HttpCode(HttpStatus.OK)
  @Timeout(RECONCILIATION_TIMEOUT_MS)
  @UseInterceptors(FileInterceptor('file'))
  async recover(
    @UploadedFile() file?: Express.Multer.File,
  ): Promise<{ message: string }> {
    const upload = this.requireUpload(file);
    await this.reconcile(upload, MergeMode.RECOVER);
    return { message: `Database recovered from ${upload.originalname}` };
  }

  @Post('import')
  @HttpCode(HttpStatus.OK)
  @Timeout(RECONCILIATION_TIMEOUT_MS)
  @UseInterceptors(FileInterceptor('file'))
  async import(
    @UploadedFile() file?: Express.Multer.File,
  ): Promise<{ message: string }> {
    const upload = this.requireUpload(file);
    await this.reconcile(upload, MergeMode.IMPORT);
    return { message: `Database imported from ${upload.originalname}` };
  }

  private requireUpload(file?: Express.Multer.File): Express.Multer.File {
    if (!file) {
      throw new BadRequestException('A database file is required');
    }
    return file;
  }

  private async reconcile(
    file: Express.Multer.File,
    mode: MergeMode,
  ): Promise<void> {
    this.logger.info(
      { mode, filename: file.originalname, size: file.size },
      'Database reconciliation requested',
    );

    try {
      await this.reconciliationService.reconcile(file.path, mode);
    } catch (error) {
      if (error instanceof MalformedDatabaseError) {
        throw new BadRequestException(error.message);
      }
      if (error instanceof ReconciliationInProgressError) {
        throw new ConflictException(error.message);
      }
      if (error instanceof MergeFailedError) {
        throw new InternalServerErrorException(error.message);
      }
      throw error;
    }
  }
}
