import dotenv from 'dotenv';
import { resolve } from 'path';
import { parseArgs } from 'util';
import { z } from 'zod';
import { ConfigError } from '../core/errors';
import type { LogLevel } from '../core/logger';
import type { TargetRef } from '../domain/message.types';

export type BackendKind = 'file' | 'database';

export interface ClientConfig {
  apiId: number;
  apiHash: string;
  stringSession: string | null;
  dataDir: string;
  sessionPath: string;
  logLevel: LogLevel;
}

export interface IngestionConfig extends ClientConfig {
  target: TargetRef;
  lookbackHours: number;
  follow: boolean;
  resetCursor: boolean;
  backend: BackendKind;
  databaseUrl: string | null;
  stateDir: string;
}

const DEFAULT_DATA_DIR = './.telegram-scraper-data';
const DEFAULT_LOOKBACK_HOURS = 24;

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const required = () => z.preprocess(blankToUndefined, z.string({ required_error: 'environment variable is required' }));

const positiveInteger = z
  .string()
  .regex(/^\d+$/, 'must be a positive integer')
  .transform(Number)
  .refine((value) => value > 0, 'must be a positive integer');

const clientEnvSchema = z.object({
  TELEGRAM_API_ID: z.preprocess(
    blankToUndefined,
    z
      .string({ required_error: 'environment variable is required' })
      .pipe(positiveInteger),
  ),
  TELEGRAM_API_HASH: required(),
  TELEGRAM_STRING_SESSION: z.preprocess(blankToUndefined, z.string().optional()),
  DATA_DIR: z.preprocess(blankToUndefined, z.string().optional()),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(['debug', 'info', 'warn', 'error']).optional()),
});

const envSchema = clientEnvSchema.extend({
  TELEGRAM_CHAT_ID: required(),
  LOOKBACK_HOURS: z.preprocess(blankToUndefined, positiveInteger.optional()),
  DATABASE_URL: z.preprocess(blankToUndefined, z.string().optional()),
});

export type RawEnv = Record<string, string | undefined>;

export interface CliFlags {
  db: boolean;
  follow: boolean;
  reset: boolean;
}

export function parseCliFlags(argv: string[]): CliFlags {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        db: { type: 'boolean', default: false },
        follow: { type: 'boolean', short: 'f', default: false },
        reset: { type: 'boolean', default: false },
      },
      strict: true,
      allowPositionals: false,
    });
    return {
      db: values.db === true,
      follow: values.follow === true,
      reset: values.reset === true,
    };
  } catch (error) {
    throw new ConfigError([error instanceof Error ? error.message : String(error)]);
  }
}

/** Numeric handles (including negative chat ids) become numbers, usernames and links stay strings. */
export function parseTargetRef(raw: string): TargetRef {
  const trimmed = raw.trim();
  if (/^-?\d+$/.test(trimmed)) {
    const parsed = Number(trimmed);
    if (Number.isSafeInteger(parsed)) return parsed;
  }
  return trimmed;
}

export function loadDotenv(path: string = resolve(process.cwd(), '.env')) {
  dotenv.config({ path });
}

function toConfigError(error: z.ZodError): ConfigError {
  return new ConfigError(error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
}

/** Credentials and session location only; used by the helper scripts. */
export function loadClientConfig(env: RawEnv = process.env): ClientConfig {
  const parsed = clientEnvSchema.safeParse(env);
  if (!parsed.success) throw toConfigError(parsed.error);

  const values = parsed.data;
  const dataDir = resolve(values.DATA_DIR ?? DEFAULT_DATA_DIR);
  return {
    apiId: values.TELEGRAM_API_ID,
    apiHash: values.TELEGRAM_API_HASH,
    stringSession: values.TELEGRAM_STRING_SESSION ?? null,
    dataDir,
    sessionPath: resolve(dataDir, 'session'),
    logLevel: values.LOG_LEVEL ?? 'info',
  };
}

export function loadConfig(argv: string[] = process.argv.slice(2), env: RawEnv = process.env): IngestionConfig {
  const flags = parseCliFlags(argv);
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) throw toConfigError(parsed.error);

  const values = parsed.data;
  const useDatabase = flags.db || values.DATABASE_URL !== undefined;

  if (useDatabase && values.DATABASE_URL === undefined) {
    throw new ConfigError(['--db set but DATABASE_URL is missing']);
  }

  const dataDir = resolve(values.DATA_DIR ?? DEFAULT_DATA_DIR);

  return {
    apiId: values.TELEGRAM_API_ID,
    apiHash: values.TELEGRAM_API_HASH,
    stringSession: values.TELEGRAM_STRING_SESSION ?? null,
    target: parseTargetRef(values.TELEGRAM_CHAT_ID),
    lookbackHours: values.LOOKBACK_HOURS ?? DEFAULT_LOOKBACK_HOURS,
    follow: flags.follow,
    resetCursor: flags.reset,
    backend: useDatabase ? 'database' : 'file',
    databaseUrl: values.DATABASE_URL ?? null,
    dataDir,
    stateDir: resolve(dataDir, 'state'),
    sessionPath: resolve(dataDir, 'session'),
    logLevel: values.LOG_LEVEL ?? 'info',
  };
}
