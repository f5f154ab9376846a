import { LogLevel } from '@nestjs/common';
import { z } from 'zod';

const TierSchema = z.object({
  name: z.string().min(1),
  minConfirmations: z.number().int().min(1),
  pollIntervalMs: z.number().int().min(1),
  maxAgeHours: z.number().positive(),
});

export type ReconciliationTierConfig = z.infer<typeof TierSchema>;

export const DEFAULT_TIERS: ReconciliationTierConfig[] = [
  { name: 'fast', minConfirmations: 1, pollIntervalMs: 15_000, maxAgeHours: 2 },
  { name: 'secure', minConfirmations: 6, pollIntervalMs: 60_000, maxAgeHours: 24 },
];

const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;

const flag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((value) => value === 'true');

const integerString = z.string().regex(/^\d+$/, 'must be a non-negative integer');

const tiersFromJson = z
  .string()
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `RECONCILIATION_TIERS is not valid JSON: ${String(error)}`,
      });
      return z.NEVER;
    }
  })
  .pipe(z.array(TierSchema).min(1));

export const EnvironmentSchema = z.object({
  DATABASE_HOST: z.string().default('localhost'),
  DATABASE_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  DATABASE_USER: z.string().default('postgres'),
  DATABASE_PASSWORD: z.string().default(''),
  DATABASE_NAME: z.string().default('custody'),
  DATABASE_SYNCHRONIZE: flag('false'),
  DATABASE_LOGGING: flag('false'),

  LEDGER_RPC_URL: z.string().url().default('http://localhost:8545'),
  LEDGER_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),
  NATIVE_SYMBOL: z.string().min(1).default('ETH'),
  NATIVE_DECIMALS: z.coerce.number().int().min(0).max(36).default(18),
  MAX_SUPPLY: z.string().regex(/^\d+(\.\d+)?$/).default('120000000'),
  NATIVE_GAS_LIMIT: z.coerce.number().int().min(1).default(21_000),
  FEE_MARGIN: z.string().regex(/^\d+(\.\d+)?$/).default('1.2'),
  PRIORITY_FEE_FALLBACK_WEI: integerString.default('2000000000'),

  VAULT_URL: z.string().url().default('http://127.0.0.1:8200'),
  VAULT_TOKEN: z.string().default(''),
  VAULT_MOUNT: z.string().min(1).default('secret'),
  VAULT_SECRET_PATH: z.string().min(1).default('wallets'),
  VAULT_TIMEOUT_MS: z.coerce.number().int().min(1).default(5_000),

  READ_MIN_CONFIRMATIONS: z.coerce.number().int().min(1).default(12),
  RECONCILIATION_TIERS: tiersFromJson.default(JSON.stringify(DEFAULT_TIERS)),
  RECONCILIATION_CHECK_DELAY_MS: z.coerce.number().int().min(0).default(500),
  RECONCILIATION_AUTOSTART: flag('true'),

  LOG_LEVEL: z.enum(LOG_LEVELS).default('log'),
});

export type AppConfig = {
  database: {
    host: string;
    port: number;
    username: string;
    password: string;
    database: string;
    synchronize: boolean;
    // TypeORM query logging
    logging: boolean;
  };
  ledger: {
    rpcUrl: string;
    timeoutMs: number;
    nativeSymbol: string;
    decimals: number;
    maxSupply: string;
    nativeGasLimit: number;
    feeMargin: string;
    priorityFeeFallbackWei: string;
  };
  vault: {
    url: string;
    token: string;
    mount: string;
    secretPath: string;
    timeoutMs: number;
  };
  classification: {
    readMinConfirmations: number;
  };
  reconciliation: {
    tiers: ReconciliationTierConfig[];
    checkDelayMs: number;
    autoStart: boolean;
  };
  logLevels: LogLevel[];
};

/**
 * Levels enabled for a given threshold, most severe first.
 */
export function logLevelsFrom(threshold: (typeof LOG_LEVELS)[number]): LogLevel[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(threshold) + 1);
}

/**
 * Load and validate configuration from environment variables.
 *
 * @throws {z.ZodError} if a variable is present but malformed
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = EnvironmentSchema.parse(env);
  return {
    database: {
      host: parsed.DATABASE_HOST,
      port: parsed.DATABASE_PORT,
      username: parsed.DATABASE_USER,
      password: parsed.DATABASE_PASSWORD,
      database: parsed.DATABASE_NAME,
      synchronize: parsed.DATABASE_SYNCHRONIZE,
      logging: parsed.DATABASE_LOGGING,
    },
    ledger: {
      rpcUrl: parsed.LEDGER_RPC_URL,
      timeoutMs: parsed.LEDGER_TIMEOUT_MS,
      nativeSymbol: parsed.NATIVE_SYMBOL.toUpperCase(),
      decimals: parsed.NATIVE_DECIMALS,
      maxSupply: parsed.MAX_SUPPLY,
      nativeGasLimit: parsed.NATIVE_GAS_LIMIT,
      feeMargin: parsed.FEE_MARGIN,
      priorityFeeFallbackWei: parsed.PRIORITY_FEE_FALLBACK_WEI,
    },
    vault: {
      url: parsed.VAULT_URL,
      token: parsed.VAULT_TOKEN,
      mount: parsed.VAULT_MOUNT,
      secretPath: parsed.VAULT_SECRET_PATH,
      timeoutMs: parsed.VAULT_TIMEOUT_MS,
    },
    classification: {
      readMinConfirmations: parsed.READ_MIN_CONFIRMATIONS,
    },
    reconciliation: {
      tiers: parsed.RECONCILIATION_TIERS,
      checkDelayMs: parsed.RECONCILIATION_CHECK_DELAY_MS,
      autoStart: parsed.RECONCILIATION_AUTOSTART,
    },
    logLevels: logLevelsFrom(parsed.LOG_LEVEL),
  };
}

export default (): AppConfig => loadConfig();
