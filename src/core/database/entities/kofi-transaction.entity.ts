import { Column, Entity, Index, PrimaryColumn } from 'typeorm';
import type {
  KofiShipping,
  KofiShopItem,
} from '../../../domain/donations/models/kofi-payload.model';

@Entity('kofi_transactions')
export class KofiTransaction {
  @PrimaryColumn({ name: 'message_id', type: 'varchar' })
  messageId!: string;

  @Index('IDX_kofi_transactions_verification_token')
  @Column({ name: 'verification_token', type: 'varchar' })
  verificationToken!: string;

  @Column({ type: 'varchar' })
  timestamp!: string;

  @Column({ type: 'varchar' })
  type!: string;

  @Column({ name: 'is_public', type: 'boolean' })
  isPublic!: boolean;

  @Column({ name: 'from_name', type: 'varchar' })
  fromName!: string;

  @Column({ type: 'varchar', nullable: true })
  message!: string | null;

  /** Decimal string, exactly as Ko-fi sends it */
  @Column({ type: 'varchar' })
  amount!: string;

  @Column({ type: 'varchar' })
  url!: string;

  @Column({ type: 'varchar' })
  email!: string;

  @Column({ type: 'varchar' })
  currency!: string;

  @Column({ name: 'is_subscription_payment', type: 'boolean' })
  isSubscriptionPayment!: boolean;

  @Column({ name: 'is_first_subscription_payment', type: 'boolean' })
  isFirstSubscriptionPayment!: boolean;

  @Column({ name: 'kofi_transaction_id', type: 'varchar' })
  kofiTransactionId!: string;

  @Column({ name: 'shop_items', type: 'simple-json', nullable: true })
  shopItems!: KofiShopItem[] | null;

  @Column({ name: 'tier_name', type: 'varchar', nullable: true })
  tierName!: string | null;

  @Column({ type: 'simple-json', nullable: true })
  shipping!: KofiShipping | null;
}
