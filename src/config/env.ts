import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .transform(value => ['1', 'true', 'yes', 'on'].includes(value));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('debug'),
  LOG_TO_FILE: booleanFlag.default('0'),
  SKYSCANNER_LOCALE: z.string().min(2).default('en-US'),
  SKYSCANNER_CURRENCY: z.string().length(3).default('USD'),
  SKYSCANNER_MARKET: z.string().min(2).default('US'),
  SKYSCANNER_RETRY_DELAY: z.coerce.number().nonnegative().default(2),
  SKYSCANNER_MAX_RETRIES: z.coerce.number().int().positive().default(15),
  SKYSCANNER_PROXY: z.string().default(''),
  SKYSCANNER_PX_AUTHORIZATION: z.string().optional(),
  SKYSCANNER_PX_UUID: z.string().optional(),
  SKYSCANNER_VERIFY: booleanFlag.default('true')
});

export interface SearchSettings {
  locale: string;
  currency: string;
  market: string;
  retryDelay: number; // seconds
  maxRetries: number;
  proxy: string;
  pxAuthorization?: string;
  pxUuid?: string;
  verify: boolean;
}

export interface AppConfig {
  port: number;
  logLevel: string;
  logToFile: boolean;
  search: SearchSettings;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join('; ')}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    logToFile: e.LOG_TO_FILE,
    search: {
      locale: e.SKYSCANNER_LOCALE,
      currency: e.SKYSCANNER_CURRENCY,
      market: e.SKYSCANNER_MARKET,
      retryDelay: e.SKYSCANNER_RETRY_DELAY,
      maxRetries: e.SKYSCANNER_MAX_RETRIES,
      proxy: e.SKYSCANNER_PROXY,
      pxAuthorization: e.SKYSCANNER_PX_AUTHORIZATION || undefined,
      pxUuid: e.SKYSCANNER_PX_UUID || undefined,
      verify: e.SKYSCANNER_VERIFY
    }
  };
}

export const DEFAULT_SEARCH_SETTINGS: SearchSettings = {
  locale: 'en-US',
  currency: 'USD',
  market: 'US',
  retryDelay: 2,
  maxRetries: 15,
  proxy: '',
  verify: true
};
