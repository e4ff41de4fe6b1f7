import { IsOptional, IsString, Matches } from 'class-validator';

export class AmountQueryDto {
  @IsOptional()
  @IsString()
  since?: string;

  @IsOptional()
  @Matches(/^[A-Za-z]{3}$/, { message: 'currency must be a 3-letter code' })
  currency?: string;
}
