/**
 * Ko-fi webhook payload, as documented at https://ko-fi.com/manage/webhooks.
 * Field names follow the wire format.
 */

export interface KofiShopItem {
  direct_link_code: string;
  variation_name?: string;
  quantity?: number;
}

export interface KofiShipping {
  full_name?: string;
  street_address?: string;
  city?: string;
  state_or_province?: string;
  postal_code?: string;
  country?: string;
  country_code?: string;
  telephone?: string;
}

export interface KofiTransactionPayload {
  verification_token: string;
  message_id: string;
  timestamp: string;
  /** Donation, Subscription, Commission or Shop Order */
  type: string;
  is_public: boolean;
  from_name: string;
  message: string | null;
  amount: string;
  url: string;
  email: string;
  currency: string;
  is_subscription_payment: boolean;
  is_first_subscription_payment: boolean;
  kofi_transaction_id: string;
  shop_items: KofiShopItem[] | null;
  tier_name: string | null;
  shipping: KofiShipping | null;
}

export interface KofiUserView {
  verification_token: string;
  data_retention_days: number;
  latest_request_at: string;
  preferred_currency: string;
}
