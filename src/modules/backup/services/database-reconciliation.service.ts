import { Injectable } from '@nestjs/common';
import { rm } from 'node:fs/promises';
import { DataSource, QueryRunner } from 'typeorm';
import { MIGRATIONS_TABLE } from '../../../core/database/database.options';
import { logger } from '../../../core/logger/logger.config';
import { describeError } from '../../../core/utils/timestamp.util';
import { DatabaseMergeDomain } from '../../../domain/reconciliation/database-merge.domain';
import { MergeMode, MergeSummary } from '../../../domain/reconciliation/models';
import {
  MalformedDatabaseError,
  MergeFailedError,
  ReconciliationError,
  ReconciliationInProgressError,
} from '../../../domain/reconciliation/reconciliation.errors';
import { TypeOrmDatabaseHandle } from '../adapters/typeorm-database-handle';

export interface ReconciliationResult extends MergeSummary {
  success: true;
  mode: MergeMode;
  durationMs: number;
}

@Injectable()
export class DatabaseReconciliationService {
  private readonly logger = logger('reconciliation');
  private running = false;

  constructor(
    private readonly dataSource: DataSource,
    private readonly mergeDomain: DatabaseMergeDomain,
  ) {}

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Merges the SQLite file at `uploadedPath` into the live database in one
   * transaction. The upload is removed once the merge has committed.
   */
  async reconcile(
    uploadedPath: string,
    mode: MergeMode,
  ): Promise<ReconciliationResult> {
    if (this.running) {
      throw new ReconciliationInProgressError();
    }

    this.running = true;
    try {
      const result = await this.mergeUpload(uploadedPath, mode);
      await this.discardUpload(uploadedPath);
      return result;
    } finally {
      this.running = false;
    }
  }

  private async mergeUpload(
    uploadedPath: string,
    mode: MergeMode,
  ): Promise<ReconciliationResult> {
    const startedAt = Date.now();
    const secondary = new DataSource({
      type: 'better-sqlite3',
      database: uploadedPath,
      fileMustExist: true,
      readonly: true,
    });

    let secondaryRunner: QueryRunner | undefined;
    let primaryRunner: QueryRunner | undefined;

    try {
      try {
        await secondary.initialize();
      } catch (error) {
        throw new MalformedDatabaseError(error);
      }
      secondaryRunner = secondary.createQueryRunner();

      try {
        primaryRunner = this.dataSource.createQueryRunner();
        await primaryRunner.connect();
        await primaryRunner.startTransaction();
      } catch (error) {
        throw new MergeFailedError(null, error);
      }

      const summary = await this.mergeDomain.merge(
        new TypeOrmDatabaseHandle(primaryRunner, [MIGRATIONS_TABLE]),
        new TypeOrmDatabaseHandle(secondaryRunner, [MIGRATIONS_TABLE]),
        mode,
      );

      try {
        await primaryRunner.commitTransaction();
      } catch (error) {
        throw new MergeFailedError(null, error);
      }

      const result: ReconciliationResult = {
        success: true,
        mode,
        ...summary,
        durationMs: Date.now() - startedAt,
      };
      this.logger.info({ result }, 'Database reconciliation completed');
      return result;
    } catch (error) {
      await this.rollback(primaryRunner);
      this.logger.error(
        { error: describeError(error), mode },
        'Database reconciliation failed',
      );
      if (error instanceof ReconciliationError) throw error;
      throw new MergeFailedError(null, error);
    } finally {
      await this.release(primaryRunner);
      await this.release(secondaryRunner);
      if (secondary.isInitialized) {
        await secondary.destroy();
      }
    }
  }

  private async rollback(runner: QueryRunner | undefined): Promise<void> {
    if (!runner?.isTransactionActive) return;
    try {
      await runner.rollbackTransaction();
    } catch (error) {
      this.logger.error(
        { error: describeError(error) },
        'Failed to roll back reconciliation transaction',
      );
    }
  }

  private async release(runner: QueryRunner | undefined): Promise<void> {
    if (!runner || runner.isReleased) return;
    await runner.release();
  }

  private async discardUpload(uploadedPath: string): Promise<void> {
    try {
      await rm(uploadedPath, { force: true });
    } catch (error) {
      this.logger.warn(
        { error: describeError(error) },
        'Failed to delete uploaded database',
      );
    }
  }
}
