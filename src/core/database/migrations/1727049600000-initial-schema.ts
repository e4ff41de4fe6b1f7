import { MigrationInterface, QueryRunner, Table, TableIndex } from 'typeorm';

export class InitialSchema1727049600000 implements MigrationInterface {
  name = 'InitialSchema1727049600000';

  async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'kofi_users',
        columns: [
          { name: 'verification_token', type: 'varchar', isPrimary: true },
          { name: 'data_retention_days', type: 'integer' },
          { name: 'latest_request_at', type: 'varchar' },
          { name: 'prefered_currency', type: 'varchar', default: "'USD'" },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'kofi_transactions',
        columns: [
          { name: 'message_id', type: 'varchar', isPrimary: true },
          { name: 'verification_token', type: 'varchar' },
          { name: 'timestamp', type: 'varchar' },
          { name: 'type', type: 'varchar' },
          { name: 'is_public', type: 'boolean' },
          { name: 'from_name', type: 'varchar' },
          { name: 'message', type: 'varchar', isNullable: true },
          { name: 'amount', type: 'varchar' },
          { name: 'url', type: 'varchar' },
          { name: 'email', type: 'varchar' },
          { name: 'currency', type: 'varchar' },
          { name: 'is_subscription_payment', type: 'boolean' },
          { name: 'is_first_subscription_payment', type: 'boolean' },
          { name: 'kofi_transaction_id', type: 'varchar' },
          { name: 'shop_items', type: 'text', isNullable: true },
          { name: 'tier_name', type: 'varchar', isNullable: true },
          { name: 'shipping', type: 'text', isNullable: true },
        ],
      }),
      true,
    );

    await queryRunner.createIndex(
      'kofi_transactions',
      new TableIndex({
        name: 'IDX_kofi_transactions_verification_token',
        columnNames: ['verification_token'],
      }),
    );
  }

  async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropIndex(
      'kofi_transactions',
      'IDX_kofi_transactions_verification_token',
    );
    await queryRunner.dropTable('kofi_transactions');
    await queryRunner.dropTable('kofi_users');
  }
}
