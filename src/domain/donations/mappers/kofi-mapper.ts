/**
 * Kofi Mapper
 *
 * Converts between the Ko-fi wire format (snake_case, as posted by the webhook
 * and returned by the API) and the persisted entities.
 */

import { KofiTransaction, KofiUser } from '../../../core/database/entities';
import { KofiTransactionPayload, KofiUserView } from '../models/kofi-payload.model';

export class KofiMapper {
  static toTransactionEntity(payload: KofiTransactionPayload): KofiTransaction {
    const entity = new KofiTransaction();
    entity.verificationToken = payload.verification_token;
    entity.messageId = payload.message_id;
    entity.timestamp = payload.timestamp;
    entity.type = payload.type;
    entity.isPublic = payload.is_public;
    entity.fromName = payload.from_name;
    entity.message = payload.message ?? null;
    entity.amount = payload.amount;
    entity.url = payload.url;
    entity.email = payload.email;
    entity.currency = payload.currency;
    entity.isSubscriptionPayment = payload.is_subscription_payment;
    entity.isFirstSubscriptionPayment = payload.is_first_subscription_payment;
    entity.kofiTransactionId = payload.kofi_transaction_id;
    entity.shopItems = payload.shop_items ?? null;
    entity.tierName = payload.tier_name ?? null;
    entity.shipping = payload.shipping ?? null;
    return entity;
  }

  static toTransactionPayload(entity: KofiTransaction): KofiTransactionPayload {
    return {
      verification_token: entity.verificationToken,
      message_id: entity.messageId,
      timestamp: entity.timestamp,
      type: entity.type,
      is_public: entity.isPublic,
      from_name: entity.fromName,
      message: entity.message,
      amount: entity.amount,
      url: entity.url,
      email: entity.email,
      currency: entity.currency,
      is_subscription_payment: entity.isSubscriptionPayment,
      is_first_subscription_payment: entity.isFirstSubscriptionPayment,
      kofi_transaction_id: entity.kofiTransactionId,
      shop_items: entity.shopItems,
      tier_name: entity.tierName,
      shipping: entity.shipping,
    };
  }

  static toTransactionPayloads(entities: KofiTransaction[]): KofiTransactionPayload[] {
    return entities.map((entity) => this.toTransactionPayload(entity));
  }

  static toUserView(user: KofiUser): KofiUserView {
    return {
      verification_token: user.verificationToken,
      data_retention_days: user.dataRetentionDays,
      latest_request_at: user.latestRequestAt,
      preferred_currency: user.preferredCurrency,
    };
  }
}
