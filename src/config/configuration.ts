import * as os from 'os';
import * as path from 'path';

import { z } from 'zod';

import { formatIssues } from '../common/errors';

const HOME_DIR = os.homedir();

/**
 * Environment configuration schema with zod validation.
 * Every variable is optional; the CLI fails fast only on values it cannot use.
 */
const envSchema = z.object({
  // Files
  MIQAT_CONFIG_PATH: z.string().min(1).default(path.join(HOME_DIR, '.config', 'miqat', 'config.json')),
  MIQAT_CACHE_PATH: z
    .string()
    .min(1)
    .default(path.join(HOME_DIR, '.cache', 'miqat', 'prayer_cache.json')),
  MIQAT_COMPLETIONS_DIR: z
    .string()
    .min(1)
    .default(path.join(HOME_DIR, '.config', 'miqat', 'completions')),

  // Remote APIs
  MIQAT_DIYANET_URL: z.string().url().default('https://ezanvakti.emushaf.net/vakitler'),
  MIQAT_ALADHAN_URL: z.string().url().default('https://api.aladhan.com/v1'),
  MIQAT_IP_LOOKUP_URL: z.string().url().default('https://ipapi.co/json/'),
  MIQAT_GEOCODER_URL: z.string().url().default('https://nominatim.openstreetmap.org/search'),
  MIQAT_HTTP_TIMEOUT_MS: z
    .string()
    .regex(/^\d+$/, 'must be a whole number of milliseconds')
    .default('20000')
    .transform((v) => parseInt(v, 10)),

  // Notifications
  MIQAT_NOTIFIER: z.enum(['auto', 'macos', 'linux', 'none']).default('auto'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'log', 'debug', 'verbose']).default('warn'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export type NotifierPreference = EnvConfig['MIQAT_NOTIFIER'];

/**
 * Validate and parse environment variables.
 * Throws a descriptive error if validation fails.
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new Error(`Environment validation failed:\n${formatIssues(result.error.errors)}`);
  }

  return result.data;
}

/**
 * NestJS configuration factory.
 * Called by ConfigModule.forRoot({ load: [configuration] })
 */
export default () => {
  const env = validateEnv();

  return {
    logLevel: env.LOG_LEVEL,

    paths: {
      settings: env.MIQAT_CONFIG_PATH,
      cache: env.MIQAT_CACHE_PATH,
      completions: env.MIQAT_COMPLETIONS_DIR,
    },

    api: {
      diyanetBaseUrl: env.MIQAT_DIYANET_URL,
      aladhanBaseUrl: env.MIQAT_ALADHAN_URL,
      ipLookupUrl: env.MIQAT_IP_LOOKUP_URL,
      geocoderUrl: env.MIQAT_GEOCODER_URL,
      timeoutMs: env.MIQAT_HTTP_TIMEOUT_MS,
    },

    notify: {
      notifier: env.MIQAT_NOTIFIER,
    },
  };
};
