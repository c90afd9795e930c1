/**
 * Environment configuration for the digest runner
 * Loads and validates required environment variables
 */

import { z } from 'zod';
import { ConfigError } from '../utils/errors';
import { isValidTimeZone } from '../utils/time';
import { splitList } from '../utils/text';
import { BLOCKLIST_PHRASES } from './keywords';
import { mergeBlocklist } from '../digest/blocklist';

export interface EnvironmentConfig {
  freshrss: {
    baseUrl: string;
    username: string;
    apiPassword: string;
    label: string | null;
  };
  digest: {
    timeZone: string;
    lookbackHours: number;
    maxItems: number;
    blocklist: string[];
  };
  email: {
    from: string;
    to: string[];
  };
  smtp: {
    host: string;
    port: number;
    username: string | null;
    password: string | null;
    useTls: boolean;
  };
  logging: {
    level: string;
  };
}

type Env = Record<string, string | undefined>;

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

export function parseBool(value: string | undefined, fallback = true): boolean {
  if (value === undefined) return fallback;
  return TRUTHY.has(value.trim().toLowerCase());
}

const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalsSchema = z.object({
  TIMEZONE: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .default('Europe/London')
      .refine(isValidTimeZone, tz => ({ message: `Invalid TIMEZONE: ${tz}` }))
  ),
  LOOKBACK_HOURS: z.preprocess(emptyToUndefined, z.coerce.number().positive().default(24)),
  MAX_ITEMS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(1000)),
  SMTP_PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(65535).default(587)),
  FRESHRSS_LABEL: z.preprocess(emptyToUndefined, z.string().optional()),
  SMTP_USERNAME: z.preprocess(emptyToUndefined, z.string().optional()),
  SMTP_PASSWORD: z.preprocess(emptyToUndefined, z.string().optional()),
  LOG_LEVEL: z.preprocess(emptyToUndefined, z.string().default('info'))
});

/**
 * Load and validate environment configuration
 * @throws ConfigError if required variables are missing or values are malformed
 */
export function loadEnvironmentConfig(env: Env = process.env): EnvironmentConfig {
  const required = {
    FRESHRSS_BASE_URL: env.FRESHRSS_BASE_URL?.trim(),
    FRESHRSS_USERNAME: env.FRESHRSS_USERNAME?.trim(),
    FRESHRSS_API_PASSWORD: env.FRESHRSS_API_PASSWORD,
    FROM_EMAIL: env.FROM_EMAIL?.trim(),
    TO_EMAILS: env.TO_EMAILS,
    SMTP_HOST: env.SMTP_HOST?.trim()
  };

  const missing = Object.entries(required)
    .filter(([, value]) => !value)
    .map(([name]) => name);
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const to = splitList(required.TO_EMAILS);
  if (to.length === 0) {
    throw new ConfigError('TO_EMAILS must contain at least one address');
  }

  const parsed = optionalsSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const opts = parsed.data;

  return {
    freshrss: {
      baseUrl: required.FRESHRSS_BASE_URL ?? '',
      username: required.FRESHRSS_USERNAME ?? '',
      apiPassword: required.FRESHRSS_API_PASSWORD ?? '',
      label: opts.FRESHRSS_LABEL ?? null
    },
    digest: {
      timeZone: opts.TIMEZONE,
      lookbackHours: opts.LOOKBACK_HOURS,
      maxItems: opts.MAX_ITEMS,
      blocklist: mergeBlocklist(BLOCKLIST_PHRASES, env.BLOCKLIST_PHRASES)
    },
    email: {
      from: required.FROM_EMAIL ?? '',
      to
    },
    smtp: {
      host: required.SMTP_HOST ?? '',
      port: opts.SMTP_PORT,
      username: opts.SMTP_USERNAME ?? null,
      password: opts.SMTP_PASSWORD ?? null,
      useTls: parseBool(env.SMTP_USE_TLS, true)
    },
    logging: {
      level: opts.LOG_LEVEL
    }
  };
}
