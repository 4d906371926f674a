import { ConfigType, registerAs } from '@nestjs/config';

const toBoolean = (value: string | undefined, fallback: boolean): boolean =>
  value === undefined ? fallback : value === 'true';

const toNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const appConfig = registerAs('app', () => ({
  nodeEnv: process.env.NODE_ENV || 'development',
  port: toNumber(process.env.PORT, 3000),
}));

export const databaseConfig = registerAs('database', () => ({
  url: process.env.DATABASE_URL || '',
  synchronize: toBoolean(process.env.DATABASE_SYNCHRONIZE, false),
  logging: toBoolean(process.env.DATABASE_LOGGING, false),
}));

export const paymentsConfig = registerAs('payments', () => ({
  currency: (process.env.PAYMENT_CURRENCY || 'usd').toLowerCase(),
  sweepEnabled: toBoolean(process.env.PAYMENT_SWEEP_ENABLED, true),
  sweepStaleAfterMinutes: toNumber(
    process.env.PAYMENT_SWEEP_STALE_AFTER_MINUTES,
    5,
  ),
  sweepBatchSize: toNumber(process.env.PAYMENT_SWEEP_BATCH_SIZE, 50),
}));

export const stripeConfig = registerAs('stripe', () => ({
  baseUrl: process.env.STRIPE_BASE_URL || 'https://api.stripe.com/v1',
  apiKey: process.env.STRIPE_API_KEY || '',
  webhookSecret: process.env.STRIPE_WEBHOOK_SECRET || '',
  webhookToleranceSeconds: toNumber(
    process.env.STRIPE_WEBHOOK_TOLERANCE_SECONDS,
    300,
  ),
  timeoutMs: toNumber(process.env.STRIPE_TIMEOUT_MS, 10000),
  maxRetries: toNumber(process.env.STRIPE_MAX_RETRIES, 2),
  retryBackoffBaseMs: toNumber(process.env.STRIPE_RETRY_BACKOFF_BASE_MS, 500),
}));

export type AppConfig = ConfigType<typeof appConfig>;
export type DatabaseConfig = ConfigType<typeof databaseConfig>;
export type PaymentsConfig = ConfigType<typeof paymentsConfig>;
export type StripeConfig = ConfigType<typeof stripeConfig>;
