import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import {
  KofiShipping,
  KofiShopItem,
  KofiTransactionPayload,
} from '../../../domain/donations/models/kofi-payload.model';

export class KofiShopItemDto implements KofiShopItem {
  @IsString()
  direct_link_code!: string;

  @IsOptional()
  @IsString()
  variation_name?: string;

  @IsOptional()
  @IsInt()
  quantity?: number;
}

export class KofiTransactionDto implements KofiTransactionPayload {
  @IsString()
  @IsNotEmpty()
  verification_token!: string;

  @IsString()
  @IsNotEmpty()
  message_id!: string;

  @IsString()
  timestamp!: string;

  @IsString()
  type!: string;

  @IsBoolean()
  is_public!: boolean;

  @IsString()
  from_name!: string;

  @IsOptional()
  @IsString()
  message: string | null = null;

  @IsString()
  amount!: string;

  @IsString()
  url!: string;

  @IsString()
  email!: string;

  @IsString()
  currency!: string;

  @IsBoolean()
  is_subscription_payment!: boolean;

  @IsBoolean()
  is_first_subscription_payment!: boolean;

  @IsString()
  kofi_transaction_id!: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => KofiShopItemDto)
  shop_items: KofiShopItemDto[] | null = null;

  @IsOptional()
  @IsString()
  tier_name: string | null = null;

  @IsOptional()
  @IsObject()
  shipping: KofiShipping | null = null;
}
