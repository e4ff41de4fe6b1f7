import { tmpdir } from 'node:os';
import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { logger } from '../logger/logger.config';

export const DEFAULT_SECRET = 'changethis';

export const ENVIRONMENTS = ['local', 'staging', 'production'] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  PROJECT_NAME: string = 'Ko-fi API';

  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 8000;

  @IsIn(ENVIRONMENTS)
  ENVIRONMENT: Environment = 'local';

  @IsString()
  @IsNotEmpty()
  DATABASE_URL: string = 'sqlite:./data/kofi.db';

  @IsInt()
  @Min(1)
  DATA_RETENTION_DAYS: number = 10;

  @IsString()
  @IsNotEmpty()
  ADMIN_SECRET_KEY: string = DEFAULT_SECRET;

  @IsString()
  @IsNotEmpty()
  UPLOAD_DIR: string = tmpdir();

  @IsString()
  EXCHANGE_RATE_API_URL: string = 'https://open.er-api.com/v6/latest';

  @IsString()
  EXCHANGE_RATE_BACKUP_API_URL: string =
    'https://api.exchangerate-api.com/v4/latest';

  @IsInt()
  @Min(1)
  CIRCUIT_BREAKER_TIMEOUT: number = 10000;

  @IsInt()
  @Min(1)
  @Max(100)
  CIRCUIT_BREAKER_ERROR_THRESHOLD: number = 50;

  @IsInt()
  @Min(1)
  CIRCUIT_BREAKER_RESET_TIMEOUT: number = 30000;
}

/**
 * `validate` hook for ConfigModule. Empty values fall back to the defaults,
 * and the default admin secret is only tolerated in the local environment.
 */
export const validateEnvironment = (
  config: Record<string, unknown>,
): EnvironmentVariables => {
  const provided = Object.fromEntries(
    Object.entries(config).filter(([, value]) => value !== ''),
  );

  const validated = plainToInstance(EnvironmentVariables, provided, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.flatMap((error) =>
      Object.values(error.constraints || {}),
    );
    throw new Error(`Invalid environment: ${messages.join('; ')}`);
  }

  if (validated.ADMIN_SECRET_KEY === DEFAULT_SECRET) {
    const message = `The value of ADMIN_SECRET_KEY is "${DEFAULT_SECRET}", for security, please change it, at least for deployments.`;
    if (validated.ENVIRONMENT !== 'local') {
      throw new Error(message);
    }
    logger().warn(message);
  }

  return validated;
};
