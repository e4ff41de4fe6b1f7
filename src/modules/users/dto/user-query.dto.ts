import {
  IsBooleanString,
  IsInt,
  IsISO8601,
  IsOptional,
  Matches,
  Min,
} from 'class-validator';

export class CreateUserQueryDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  data_retention_days?: number;
}

export class UpdateUserQueryDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  days?: number;

  @IsOptional()
  @IsISO8601()
  latest_request_at?: string;

  @IsOptional()
  @Matches(/^[A-Za-z]{3}$/, { message: 'currency must be a 3-letter code' })
  currency?: string;
}

export class DeleteUserQueryDto {
  @IsOptional()
  @IsBooleanString()
  include_transactions?: string;

  /** Spelling accepted by earlier clients */
  @IsOptional()
  @IsBooleanString()
  inculde_transactions?: string;
}
