import Database from 'better-sqlite3';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DataSource } from 'typeorm';
import { KofiUser } from '../../../core/database/entities';
import { createInMemoryDataSource } from '../../../core/database/testing/in-memory-data-source';
import { DatabaseMergeDomain } from '../../../domain/reconciliation/database-merge.domain';
import { MergeMode } from '../../../domain/reconciliation/models';
import {
  MalformedDatabaseError,
  MergeFailedError,
  ReconciliationInProgressError,
} from '../../../domain/reconciliation/reconciliation.errors';
import { DatabaseReconciliationService } from './database-reconciliation.service';

describe('DatabaseReconciliationService', () => {
  let workDir: string;
  let primary: DataSource;
  let service: DatabaseReconciliationService;

  const writeUpload = (name: string, statements: string[]): string => {
    const path = join(workDir, name);
    const db = new Database(path);
    for (const statement of statements) {
      db.exec(statement);
    }
    db.close();
    return path;
  };

  const accounts = async (): Promise<unknown> =>
    primary.query('SELECT token, currency FROM accounts ORDER BY token');

  beforeEach(async () => {
    workDir = mkdtempSync(join(tmpdir(), 'reconcile-'));
    primary = await createInMemoryDataSource();
    await primary.query(
      'CREATE TABLE accounts (token TEXT PRIMARY KEY, currency TEXT)',
    );
    await primary.query(
      "INSERT INTO accounts (token, currency) VALUES ('abc', NULL), ('def', 'USD'), ('live', 'GBP')",
    );
    service = new DatabaseReconciliationService(
      primary,
      new DatabaseMergeDomain(),
    );
  });

  afterEach(async () => {
    await primary.destroy();
    rmSync(workDir, { recursive: true, force: true });
  });

  const accountsUpload = () =>
    writeUpload('accounts.db', [
      'CREATE TABLE accounts (token TEXT PRIMARY KEY, currency TEXT)',
      "INSERT INTO accounts VALUES ('abc', 'EUR'), ('def', 'EUR'), ('new', 'JPY')",
    ]);

  it('import fills gaps, keeps live values and inserts unseen rows', async () => {
    const upload = accountsUpload();

    const result = await service.reconcile(upload, MergeMode.IMPORT);

    expect(await accounts()).toEqual([
      { token: 'abc', currency: 'EUR' },
      { token: 'def', currency: 'USD' },
      { token: 'live', currency: 'GBP' },
      { token: 'new', currency: 'JPY' },
    ]);
    expect(result).toMatchObject({
      success: true,
      mode: MergeMode.IMPORT,
      tablesMerged: ['accounts'],
      rowsInserted: 1,
      rowsUpdated: 1,
      cellsUpdated: 1,
    });
    expect([...result.tablesSkipped].sort()).toEqual([
      'kofi_transactions',
      'kofi_users',
    ]);
  });

  it('recover overwrites differing values from the upload', async () => {
    const upload = accountsUpload();

    const result = await service.reconcile(upload, MergeMode.RECOVER);

    expect(await accounts()).toEqual([
      { token: 'abc', currency: 'EUR' },
      { token: 'def', currency: 'EUR' },
      { token: 'live', currency: 'GBP' },
      { token: 'new', currency: 'JPY' },
    ]);
    expect(result.rowsUpdated).toBe(2);
  });

  it('removes the upload after a successful merge', async () => {
    const upload = accountsUpload();

    await service.reconcile(upload, MergeMode.IMPORT);

    expect(existsSync(upload)).toBe(false);
    expect(service.isRunning()).toBe(false);
  });

  it('lets rows from an older export pick up column defaults', async () => {
    const upload = writeUpload('users.db', [
      'CREATE TABLE kofi_users (verification_token VARCHAR PRIMARY KEY, data_retention_days INTEGER, latest_request_at VARCHAR)',
      "INSERT INTO kofi_users VALUES ('token-1', 30, '2024-09-22T10:00:00Z')",
    ]);

    await service.reconcile(upload, MergeMode.IMPORT);

    const user = await primary
      .getRepository(KofiUser)
      .findOneBy({ verificationToken: 'token-1' });
    expect(user).toEqual({
      verificationToken: 'token-1',
      dataRetentionDays: 30,
      latestRequestAt: '2024-09-22T10:00:00Z',
      preferredCurrency: 'USD',
    });
  });

  it('rejects a file that is not a database and leaves the live data alone', async () => {
    const upload = join(workDir, 'notes.db');
    writeFileSync(upload, 'these are not the bytes of a database file');

    await expect(
      service.reconcile(upload, MergeMode.RECOVER),
    ).rejects.toBeInstanceOf(MalformedDatabaseError);

    expect(await accounts()).toEqual([
      { token: 'abc', currency: null },
      { token: 'def', currency: 'USD' },
      { token: 'live', currency: 'GBP' },
    ]);
    expect(existsSync(upload)).toBe(true);
  });

  it('rejects a missing upload as malformed', async () => {
    await expect(
      service.reconcile(join(workDir, 'missing.db'), MergeMode.IMPORT),
    ).rejects.toBeInstanceOf(MalformedDatabaseError);
  });

  it('rejects an empty upload and keeps it', async () => {
    const upload = join(workDir, 'empty.db');
    writeFileSync(upload, '');

    await expect(
      service.reconcile(upload, MergeMode.RECOVER),
    ).rejects.toBeInstanceOf(MalformedDatabaseError);
    expect(existsSync(upload)).toBe(true);
  });

  it('recover is a no-op when numbers arrive as text', async () => {
    await primary.getRepository(KofiUser).save({
      verificationToken: 't',
      dataRetentionDays: 30,
      latestRequestAt: '2024-09-22T10:00:00Z',
      preferredCurrency: 'USD',
    });
    const textUpload = () =>
      writeUpload('text-days.db', [
        'CREATE TABLE kofi_users (verification_token TEXT PRIMARY KEY, data_retention_days TEXT)',
        "INSERT INTO kofi_users VALUES ('t', '30')",
      ]);

    const first = await service.reconcile(textUpload(), MergeMode.RECOVER);
    const second = await service.reconcile(textUpload(), MergeMode.RECOVER);

    expect([first.cellsUpdated, second.cellsUpdated]).toEqual([0, 0]);
    expect(second.tablesMerged).toEqual(['kofi_users']);
    await expect(
      primary.getRepository(KofiUser).findOneBy({ verificationToken: 't' }),
    ).resolves.toMatchObject({ dataRetentionDays: 30 });
  });

  it('rolls back every table when one write fails', async () => {
    await primary.query(
      'CREATE TABLE ledger (id INTEGER PRIMARY KEY, note TEXT NOT NULL)',
    );
    const upload = writeUpload('broken.db', [
      'CREATE TABLE accounts (token TEXT PRIMARY KEY, currency TEXT)',
      "INSERT INTO accounts VALUES ('abc', 'EUR')",
      'CREATE TABLE ledger (id INTEGER PRIMARY KEY, note TEXT)',
      "INSERT INTO ledger VALUES (1, 'kept'), (2, NULL)",
    ]);

    const failure = service.reconcile(upload, MergeMode.RECOVER);

    await expect(failure).rejects.toBeInstanceOf(MergeFailedError);
    await expect(failure).rejects.toMatchObject({ table: 'ledger' });
    expect(await primary.query('SELECT * FROM ledger')).toEqual([]);
    expect(await accounts()).toEqual([
      { token: 'abc', currency: null },
      { token: 'def', currency: 'USD' },
      { token: 'live', currency: 'GBP' },
    ]);
  });

  it('refuses a second reconciliation while one is running', async () => {
    const first = service.reconcile(accountsUpload(), MergeMode.IMPORT);

    await expect(
      service.reconcile(join(workDir, 'other.db'), MergeMode.IMPORT),
    ).rejects.toBeInstanceOf(ReconciliationInProgressError);
    await first;
  });
});
