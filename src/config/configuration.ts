import { ConfigType, registerAs } from '@nestjs/config';

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const toBool = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') {
    return fallback;
  }
  return ['true', '1', 'yes'].includes(value.toLowerCase());
};

export const gatewayConfig = registerAs('gateway', () => ({
  key: process.env.GATEWAY_KEY ?? '',
  salt: process.env.GATEWAY_SALT ?? '',
  initiateUrl:
    process.env.GATEWAY_INITIATE_URL ?? 'https://testpay.easebuzz.in/payment/initiateLink',
  paymentUrl: process.env.GATEWAY_PAYMENT_URL ?? 'https://testpay.easebuzz.in/pay/',
  successUrl: process.env.GATEWAY_SUCCESS_URL ?? 'http://localhost:3000/payment/success',
  failureUrl: process.env.GATEWAY_FAILURE_URL ?? 'http://localhost:3000/payment/failure',
  timeoutMs: toInt(process.env.GATEWAY_TIMEOUT_MS, 5000), // Outbound initiation call timeout
  acceptLegacyHash: toBool(process.env.GATEWAY_ACCEPT_LEGACY_HASH, true),
}));

export const reconciliationConfig = registerAs('reconciliation', () => ({
  enabled: toBool(process.env.RECONCILIATION_ENABLED, true),
  intervalMs: toInt(process.env.RECONCILIATION_INTERVAL_MS, 60 * 60 * 1000),
  staleMinutes: toInt(process.env.RECONCILIATION_STALE_MINUTES, 15),
  batchSize: toInt(process.env.RECONCILIATION_BATCH_SIZE, 500),
}));

export const storageConfig = registerAs('storage', () => ({
  driver: process.env.STORAGE_DRIVER === 'postgres' ? ('postgres' as const) : ('memory' as const),
  host: process.env.DB_HOST ?? 'localhost',
  port: toInt(process.env.DB_PORT, 5432),
  username: process.env.DB_USERNAME ?? 'payments',
  password: process.env.DB_PASSWORD ?? 'payments',
  database: process.env.DB_NAME ?? 'payments',
  synchronize: toBool(process.env.DB_SYNCHRONIZE, false),
  logging: toBool(process.env.DB_LOGGING, false),
  merchantsFile: process.env.MERCHANTS_FILE ?? '',
}));

export type GatewayConfig = ConfigType<typeof gatewayConfig>;
export type ReconciliationConfig = ConfigType<typeof reconciliationConfig>;
export type StorageConfig = ConfigType<typeof storageConfig>;
