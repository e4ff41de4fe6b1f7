import { Injectable, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { existsSync } from 'node:fs';
import { copyFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DataSource } from 'typeorm';
import { logger } from '../../../core/logger/logger.config';
import { describeError } from '../../../core/utils/timestamp.util';
import {
  buildCreateTableStatement,
  buildInsertStatement,
  quoteIdentifier,
} from '../utils/sql-dump';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

@Injectable()
export class DatabaseExportService {
  private readonly logger = logger();

  constructor(
    private readonly dataSource: DataSource,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Writes a snapshot of the live database to a temporary file and returns
   * its path. The caller owns the file and must remove it.
   */
  async exportDatabase(): Promise<string> {
    const exportPath = join(
      this.configService.get<string>('UPLOAD_DIR', tmpdir()),
      `export-${randomUUID()}.db`,
    );
    const options = this.dataSource.options;

    if (options.type === 'better-sqlite3' || options.type === 'sqlite') {
      await this.copySqliteFile(options.database, exportPath);
    } else {
      await this.writeSqlDump(exportPath);
    }

    this.logger.info({ driver: options.type }, 'Database exported');
    return exportPath;
  }

  async copySqliteFile(database: string, exportPath: string): Promise<void> {
    if (database === ':memory:' || !existsSync(database)) {
      throw new NotFoundException('SQLite database file not found.');
    }
    await copyFile(database, exportPath);
  }

  /**
   * Schema first, then one INSERT per row, for backends that have no single
   * database file to copy.
   */
  async writeSqlDump(exportPath: string): Promise<void> {
    const queryRunner = this.dataSource.createQueryRunner();
    try {
      const tables = (await queryRunner.getTables())
        .filter((table) => !table.name.startsWith('sqlite_'))
        .sort((a, b) => a.name.localeCompare(b.name));

      const lines: string[] = tables.map(
        (table) => `${buildCreateTableStatement(table)}\n`,
      );

      for (const table of tables) {
        const rows: unknown = await queryRunner.query(
          `SELECT * FROM ${quoteIdentifier(table.name)}`,
        );
        if (!Array.isArray(rows)) continue;
        for (const row of rows) {
          if (isRecord(row)) {
            lines.push(buildInsertStatement(table.name, row));
          }
        }
      }

      await writeFile(exportPath, `${lines.join('\n')}\n`, 'utf-8');
    } finally {
      await queryRunner.release();
    }
  }

  async discard(exportPath: string): Promise<void> {
    try {
      await rm(exportPath, { force: true });
    } catch (error) {
      this.logger.warn(
        { error: describeError(error) },
        'Failed to delete exported database',
      );
    }
  }
}
