import { z } from 'zod';

const digits = z
  .string()
  .regex(/^\d+$/)
  .optional();

const rawConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: digits,
  STATIONS_FILE: z.string().min(1).optional(),
  STATIONS_URL: z.string().url().optional(),
  STATION_REFRESH_ENABLED: z.string().optional(),
  STATION_REFRESH_INTERVAL_MINUTES: digits,
  REPORT_SOURCE_URL: z.string().url().optional(),
  UPSTREAM_TIMEOUT_MS: digits,
  REPORT_CACHE_TTL_SECONDS: digits,
  REPORT_CACHE_MAX_ENTRIES: digits,
  REPORT_CACHE_SWEEP_SECONDS: digits,
  QUOTA_WINDOW_POLICY: z.enum(['fixed', 'sliding']).optional(),
  QUOTA_WINDOW_SECONDS: digits,
  ALLOW_ANONYMOUS: z.string().optional(),
  ANONYMOUS_LIMIT: digits,
  ACCOUNT_CACHE_TTL_SECONDS: digits,
  ACCOUNTS_FILE: z.string().min(1).optional(),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),
  APPINSIGHTS_CONNECTION_STRING: z.string().optional(),
  APPINSIGHTS_ROLE_NAME: z.string().optional(),
  APPINSIGHTS_SAMPLING_PERCENTAGE: z.string().optional(),
});

type RawConfig = z.infer<typeof rawConfigSchema>;

export type QuotaWindowPolicyName = 'fixed' | 'sliding';

export type AppConfig = {
  nodeEnv: RawConfig['NODE_ENV'];
  port: number;
  stations: {
    file: string;
    url: string | null;
    refresh: {
      enabled: boolean;
      intervalMinutes: number;
    };
  };
  upstream: {
    baseUrl: string;
    timeoutMs: number;
  };
  reportCache: {
    ttlSeconds: number;
    maxEntries: number | null;
    sweepIntervalSeconds: number;
  };
  quota: {
    policy: QuotaWindowPolicyName;
    windowSeconds: number;
    allowAnonymous: boolean;
    anonymousLimit: number;
    accountCacheTtlSeconds: number;
  };
  accounts: {
    file: string | null;
    supabase: {
      url: string;
      serviceRoleKey: string;
    } | null;
  };
  telemetry: {
    appInsights: {
      connectionString: string;
      roleName: string | null;
      samplingPercentage: number | null;
    } | null;
  };
};

export const DEFAULT_REPORT_SOURCE_URL = 'https://tgftp.nws.noaa.gov/data';

const normalizeBoolean = (name: string, value?: string | null): boolean => {
  if (!value) {
    return false;
  }

  const normalized = value.trim().toLowerCase();
  if (!normalized) {
    return false;
  }

  if (['true', '1', 'yes'].includes(normalized)) {
    return true;
  }

  if (['false', '0', 'no'].includes(normalized)) {
    return false;
  }

  throw new Error(`${name} must be one of true, false, 1, 0, yes, or no when provided`);
};

const normalizeSamplingPercentage = (value?: string | null): number | null => {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed === '') {
    return null;
  }

  const parsed = Number.parseFloat(trimmed);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 100) {
    throw new Error(
      'APPINSIGHTS_SAMPLING_PERCENTAGE must be a number between 0 and 100 when provided',
    );
  }

  return parsed;
};

const toInt = (value: string | undefined, fallback: number): number =>
  value ? Number.parseInt(value, 10) : fallback;

const requirePositive = (name: string, value: number): number => {
  if (value <= 0) {
    throw new Error(`${name} must be greater than zero`);
  }

  return value;
};

const buildSupabaseSettings = (parsed: RawConfig): AppConfig['accounts']['supabase'] => {
  const url = parsed.SUPABASE_URL?.trim();
  const serviceRoleKey = parsed.SUPABASE_SERVICE_ROLE_KEY?.trim();

  if (!url && !serviceRoleKey) {
    return null;
  }

  if (!url || !serviceRoleKey) {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be provided together');
  }

  return { url, serviceRoleKey };
};

export const buildConfig = (env: NodeJS.ProcessEnv): AppConfig => {
  const parsed = rawConfigSchema.parse(env);

  const samplingPercentage = normalizeSamplingPercentage(parsed.APPINSIGHTS_SAMPLING_PERCENTAGE);
  const appInsightsConnectionString = parsed.APPINSIGHTS_CONNECTION_STRING?.trim();
  const maxEntries = parsed.REPORT_CACHE_MAX_ENTRIES
    ? requirePositive('REPORT_CACHE_MAX_ENTRIES', toInt(parsed.REPORT_CACHE_MAX_ENTRIES, 0))
    : null;

  return {
    nodeEnv: parsed.NODE_ENV,
    port: toInt(parsed.PORT, 3000),
    stations: {
      file: parsed.STATIONS_FILE?.trim() || 'data/stations.json',
      url: parsed.STATIONS_URL ?? null,
      refresh: {
        enabled: normalizeBoolean('STATION_REFRESH_ENABLED', parsed.STATION_REFRESH_ENABLED),
        intervalMinutes: toInt(parsed.STATION_REFRESH_INTERVAL_MINUTES, 1440),
      },
    },
    upstream: {
      baseUrl: (parsed.REPORT_SOURCE_URL ?? DEFAULT_REPORT_SOURCE_URL).replace(/\/+$/, ''),
      timeoutMs: requirePositive('UPSTREAM_TIMEOUT_MS', toInt(parsed.UPSTREAM_TIMEOUT_MS, 5000)),
    },
    reportCache: {
      ttlSeconds: requirePositive(
        'REPORT_CACHE_TTL_SECONDS',
        toInt(parsed.REPORT_CACHE_TTL_SECONDS, 120),
      ),
      maxEntries,
      sweepIntervalSeconds: toInt(parsed.REPORT_CACHE_SWEEP_SECONDS, 300),
    },
    quota: {
      policy: parsed.QUOTA_WINDOW_POLICY ?? 'fixed',
      windowSeconds: requirePositive(
        'QUOTA_WINDOW_SECONDS',
        toInt(parsed.QUOTA_WINDOW_SECONDS, 3600),
      ),
      allowAnonymous: normalizeBoolean('ALLOW_ANONYMOUS', parsed.ALLOW_ANONYMOUS),
      anonymousLimit: toInt(parsed.ANONYMOUS_LIMIT, 30),
      accountCacheTtlSeconds: requirePositive(
        'ACCOUNT_CACHE_TTL_SECONDS',
        toInt(parsed.ACCOUNT_CACHE_TTL_SECONDS, 60),
      ),
    },
    accounts: {
      file: parsed.ACCOUNTS_FILE?.trim() || null,
      supabase: buildSupabaseSettings(parsed),
    },
    telemetry: {
      appInsights: appInsightsConnectionString
        ? {
            connectionString: appInsightsConnectionString,
            roleName: parsed.APPINSIGHTS_ROLE_NAME?.trim() || null,
            samplingPercentage,
          }
        : null,
    },
  };
};
