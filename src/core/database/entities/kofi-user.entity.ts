import { Column, Entity, PrimaryColumn } from 'typeorm';

@Entity('kofi_users')
export class KofiUser {
  @PrimaryColumn({ name: 'verification_token', type: 'varchar' })
  verificationToken!: string;

  @Column({ name: 'data_retention_days', type: 'integer' })
  dataRetentionDays!: number;

  @Column({ name: 'latest_request_at', type: 'varchar' })
  latestRequestAt!: string;

  // Column name kept as-is so older database exports still merge column by column.
  @Column({ name: 'prefered_currency', type: 'varchar', default: 'USD' })
  preferredCurrency!: string;
}
