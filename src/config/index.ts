// ──────────────────────────────────────────
// Configuration: env vars parsed once into a frozen AppConfig
// ──────────────────────────────────────────

import { z } from 'zod';
import { MAX_DAY_COUNT } from '../shared/validate';

const csvCountries = z
  .string()
  .default('GB')
  .transform((raw) =>
    raw
      .split(',')
      .map((c) => c.trim().toUpperCase())
      .filter((c) => c.length > 0)
  )
  .pipe(z.array(z.string().regex(/^[A-Z]{2}$/, 'must be a two-letter country code')).min(1));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const dayCount = (fallback: number) => z.coerce.number().int().positive().max(MAX_DAY_COUNT).default(fallback);

const ConfigSchema = z.object({
  PORT: positiveInt(3000),
  DATABASE_URL: z.string().optional(),
  COUNTRIES: csvCountries,
  DEFAULT_EVENT_SLUG: z.string().min(1).default('uk-age-verify-2025'),
  DEFAULT_WINDOW_DAYS: dayCount(14),
  MIN_WINDOW_POINTS: positiveInt(3),
  TOP_DOMAINS_LIMIT: positiveInt(100),
  CLOUDFLARE_API_BASE: z.string().url().default('https://api.cloudflare.com/client/v4'),
  CLOUDFLARE_API_TOKEN: z.string().optional(),
  OONI_API_BASE: z.string().url().default('https://api.ooni.io/api/v1'),
  INGEST_LOOKBACK_DAYS: dayCount(30),
  INGEST_INTERVAL_MS: positiveInt(6 * 60 * 60 * 1000),
  INGEST_MAX_ATTEMPTS: positiveInt(3),
  INGEST_BACKOFF_MS: z.coerce.number().int().nonnegative().default(500),
});

type RawConfig = z.infer<typeof ConfigSchema>;

export interface AppConfig {
  port: number;
  databaseUrl: string | undefined;
  countries: string[];
  defaultEventSlug: string;
  defaultWindowDays: number;
  minWindowPoints: number;
  topDomainsLimit: number;
  cloudflare: { apiBase: string; apiToken: string | undefined };
  ooni: { apiBase: string };
  ingest: { lookbackDays: number; intervalMs: number; maxAttempts: number; backoffMs: number };
}

/** Empty strings count as unset, so `FOO=` in .env falls back to the default. */
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = ConfigSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return Object.freeze(toAppConfig(parsed.data));
}

function toAppConfig(raw: RawConfig): AppConfig {
  return {
    port: raw.PORT,
    databaseUrl: raw.DATABASE_URL,
    countries: raw.COUNTRIES,
    defaultEventSlug: raw.DEFAULT_EVENT_SLUG,
    defaultWindowDays: raw.DEFAULT_WINDOW_DAYS,
    minWindowPoints: raw.MIN_WINDOW_POINTS,
    topDomainsLimit: raw.TOP_DOMAINS_LIMIT,
    cloudflare: { apiBase: raw.CLOUDFLARE_API_BASE, apiToken: raw.CLOUDFLARE_API_TOKEN },
    ooni: { apiBase: raw.OONI_API_BASE },
    ingest: {
      lookbackDays: raw.INGEST_LOOKBACK_DAYS,
      intervalMs: raw.INGEST_INTERVAL_MS,
      maxAttempts: raw.INGEST_MAX_ATTEMPTS,
      backoffMs: raw.INGEST_BACKOFF_MS,
    },
  };
}

let cached: Readonly<AppConfig> | undefined;

export function getConfig(): Readonly<AppConfig> {
  if (!cached) cached = loadConfig();
  return cached;
}
