import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  ValidateIf,
  validateSync,
} from 'class-validator';

const ENVIRONMENTS = ['development', 'production', 'test'] as const;

const isRequired = (env: EnvironmentVariables): boolean =>
  env.NODE_ENV !== 'test';

export class EnvironmentVariables {
  @IsOptional()
  @IsIn(ENVIRONMENTS)
  NODE_ENV?: (typeof ENVIRONMENTS)[number];

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @ValidateIf(isRequired)
  @IsString()
  @IsNotEmpty()
  DATABASE_URL?: string;

  @IsOptional()
  @IsBooleanString()
  DATABASE_SYNCHRONIZE?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  STRIPE_BASE_URL?: string;

  @ValidateIf(isRequired)
  @IsString()
  @IsNotEmpty()
  STRIPE_API_KEY?: string;

  @ValidateIf(isRequired)
  @IsString()
  @IsNotEmpty()
  STRIPE_WEBHOOK_SECRET?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  STRIPE_TIMEOUT_MS?: number;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  PAYMENT_CURRENCY?: string;

  @IsOptional()
  @IsBooleanString()
  PAYMENT_SWEEP_ENABLED?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  PAYMENT_SWEEP_BATCH_SIZE?: number;
}

/**
 * Validates the raw environment once at boot. Numeric variables are
 * converted implicitly; unknown variables are left alone.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.flatMap((error) =>
      Object.values(error.constraints || {}),
    );
    throw new Error(`Invalid environment: ${messages.join('; ')}`);
  }

  return validated;
}
