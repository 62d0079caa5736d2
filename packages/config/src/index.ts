import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { resolve } from 'path';

dotenvConfig({ path: resolve(process.cwd(), '.env') });
dotenvConfig({ path: resolve(process.cwd(), '..', '..', '.env') });

export const FUTURES_TESTNET_URL = 'https://testnet.binancefuture.com';
export const FUTURES_MAINNET_URL = 'https://fapi.binance.com';

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  BINANCE_API_KEY: z.string().min(1),
  BINANCE_API_SECRET: z.string().min(1),
  USE_TESTNET: booleanString.default('true'),
  FUTURES_BASE_URL: z.string().url().optional(),

  RECV_WINDOW: z.coerce.number().int().positive().max(60000).default(5000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().positive().default(1000),

  API_PORT: z.coerce.number().int().positive().default(3000),
  API_HOST: z.string().default('127.0.0.1'),

  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_FORMAT: z.enum(['json', 'pretty']).default('json'),
});

export type Env = z.infer<typeof envSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): Env {
  return envSchema.parse(env);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    console.error('Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export interface GatewayConfig {
  baseUrl: string;
  testnet: boolean;
  apiKey: string;
  apiSecret: string;
  recvWindow: number;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

export function gatewayConfig(config: Env): GatewayConfig {
  return {
    baseUrl:
      config.FUTURES_BASE_URL ?? (config.USE_TESTNET ? FUTURES_TESTNET_URL : FUTURES_MAINNET_URL),
    testnet: config.USE_TESTNET,
    apiKey: config.BINANCE_API_KEY,
    apiSecret: config.BINANCE_API_SECRET,
    recvWindow: config.RECV_WINDOW,
    timeoutMs: config.REQUEST_TIMEOUT_MS,
    maxRetries: config.MAX_RETRIES,
    retryBaseDelayMs: config.RETRY_BASE_DELAY_MS,
  };
}

export function apiConfig(config: Env) {
  return {
    port: config.API_PORT,
    host: config.API_HOST,
  };
}

export function logConfig(config: Env) {
  return {
    level: config.LOG_LEVEL,
    format: config.LOG_FORMAT,
  };
}
