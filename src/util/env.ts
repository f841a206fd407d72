import { config } from 'dotenv';
import { z } from 'zod';

config();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  MARKET_PROVIDER: z.enum(['binance', 'coingecko']).default('binance'),
  BINANCE_API_URL: z.string().url().default('https://api.binance.com'),
  COINGECKO_API_URL: z
    .string()
    .url()
    .default('https://api.coingecko.com/api/v3'),
  CRYPTOCOMPARE_API_URL: z
    .string()
    .url()
    .default('https://min-api.cryptocompare.com'),
  CRYPTOPANIC_API_URL: z
    .string()
    .url()
    .default('https://api.cryptopanic.com/v1'),
  CRYPTOPANIC_API_KEY: z.string().optional(),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FETCH_MAX_RETRIES: z.coerce.number().int().positive().default(3),
  ANALYSIS_WINDOW_DAYS: z.coerce.number().int().min(3).max(90).default(30),
  ANALYSIS_DEADLINE_MS: z.coerce.number().int().positive().default(60_000),
  CATALOG_FAILURE_COOLDOWN_MS: z.coerce.number().int().min(0).default(60_000),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
