import 'dotenv/config';
import path from 'path';
import { validate as isValidCron } from 'node-cron';
import { MAX_BATCH_SIZE, MAX_GROUP_PAGE_SIZE } from './directory/types';
import { ConfigurationError } from './errors';

// ---------------------------------------------------------------------------
// Configuration
//
// Every setting is read once, validated and handed to the components as an
// explicit structure. Nothing downstream reads process.env.
// ---------------------------------------------------------------------------

export type Env = Record<string, string | undefined>;

export type CertificateSource = 'file' | 'env';

export interface IdentityConfig {
  tenantId: string;
  clientId: string;
  certificateThumbprint: string;
  certificateSource: CertificateSource;
  certificatePath: string | null;
  certificatePem: string | null;
}

export interface CleanupConfig {
  adminGroupId: string | null;
  exclusiveDemosGroupId: string | null;
  inactivityDays: number;
  pageDelayMs: number;
  batchDelayMs: number;
  batchSize: number;
  groupPageSize: number;
  dryRun: boolean;
}

export interface ScheduleConfig {
  expression: string;
  timezone: string;
  runOnStartup: boolean;
}

export interface ServerConfig {
  port: number;
  /** When null the authenticated /runs routes are not registered. */
  apiKey: string | null;
}

export interface AppConfig {
  identity: IdentityConfig;
  cleanup: CleanupConfig;
  schedule: ScheduleConfig;
  server: ServerConfig;
  databaseFile: string;
  logLevel: string;
}

export const DEFAULT_SCHEDULE = '30 9 * * *';

const DEFAULT_DATABASE_FILE = path.join(__dirname, '..', 'dormant-cleanup.db');

// ---------------------------------------------------------------------------
// Readers
// ---------------------------------------------------------------------------

function optionalEnv(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function requireEnv(env: Env, name: string): string {
  const value = optionalEnv(env, name);
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${name}`, name);
  }
  return value;
}

function intEnv(
  env: Env,
  name: string,
  fallback: number,
  range: { min: number; max: number },
): number {
  const raw = optionalEnv(env, name);
  if (raw === null) return fallback;

  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got '${raw}'`, name);
  }
  const value = Number(raw);
  if (value < range.min || value > range.max) {
    throw new ConfigurationError(
      `${name} must be between ${range.min} and ${range.max}, got ${value}`,
      name,
    );
  }
  return value;
}

function boolEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = optionalEnv(env, name);
  if (raw === null) return fallback;

  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigurationError(`${name} must be true or false, got '${raw}'`, name);
  }
}

function certificateSourceEnv(env: Env): CertificateSource {
  const raw = optionalEnv(env, 'CertificateSource') ?? 'file';
  if (raw !== 'file' && raw !== 'env') {
    throw new ConfigurationError(
      `CertificateSource must be 'file' or 'env', got '${raw}'`,
      'CertificateSource',
    );
  }
  return raw;
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

function loadIdentity(env: Env): IdentityConfig {
  const certificateSource = certificateSourceEnv(env);

  const identity: IdentityConfig = {
    tenantId: requireEnv(env, 'TenantId'),
    clientId: requireEnv(env, 'ClientId'),
    certificateThumbprint: requireEnv(env, 'CertificateThumbprint'),
    certificateSource,
    certificatePath: null,
    certificatePem: null,
  };

  if (certificateSource === 'file') {
    identity.certificatePath = path.resolve(requireEnv(env, 'CertificatePath'));
  } else {
    // App settings usually carry the PEM on one line with escaped newlines
    identity.certificatePem = requireEnv(env, 'CertificatePem').replace(/\\n/g, '\n');
  }

  return identity;
}

function loadSchedule(env: Env): ScheduleConfig {
  const expression = optionalEnv(env, 'CleanupSchedule') ?? DEFAULT_SCHEDULE;
  if (!isValidCron(expression)) {
    throw new ConfigurationError(
      `CleanupSchedule is not a valid cron expression: '${expression}'`,
      'CleanupSchedule',
    );
  }

  return {
    expression,
    timezone: optionalEnv(env, 'CleanupTimeZone') ?? 'UTC',
    runOnStartup: boolEnv(env, 'RunOnStartup', false),
  };
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    identity: loadIdentity(env),

    cleanup: {
      adminGroupId: optionalEnv(env, 'AdminGroupId'),
      exclusiveDemosGroupId: optionalEnv(env, 'ExclusiveDemosGroupId'),
      inactivityDays: intEnv(env, 'InactivityDays', 30, { min: 1, max: 3650 }),
      pageDelayMs: intEnv(env, 'PageDelayMs', 3000, { min: 0, max: 600_000 }),
      batchDelayMs: intEnv(env, 'BatchDelayMs', 3000, { min: 0, max: 600_000 }),
      batchSize: intEnv(env, 'BatchSize', MAX_BATCH_SIZE, { min: 1, max: MAX_BATCH_SIZE }),
      groupPageSize: intEnv(env, 'GroupPageSize', MAX_GROUP_PAGE_SIZE, {
        min: 1,
        max: MAX_GROUP_PAGE_SIZE,
      }),
      dryRun: boolEnv(env, 'DryRun', false),
    },

    schedule: loadSchedule(env),

    server: {
      port: intEnv(env, 'PORT', 3000, { min: 0, max: 65_535 }),
      apiKey: optionalEnv(env, 'API_KEY'),
    },

    databaseFile: optionalEnv(env, 'DATABASE_FILE') ?? DEFAULT_DATABASE_FILE,
    logLevel: optionalEnv(env, 'LOG_LEVEL') ?? 'info',
  };
}
