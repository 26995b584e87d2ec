import { z } from 'zod';

export const APP_CONFIG = Symbol('APP_CONFIG');

export const STORAGE_PROVIDERS = ['none', 'gcs', 'supabase', 's3'] as const;
export type StorageProvider = (typeof STORAGE_PROVIDERS)[number];

export const JOB_STORES = ['memory', 'postgres'] as const;
export type JobStore = (typeof JOB_STORES)[number];

// Hosting dashboards commonly export unset variables as empty strings.
const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional(),
);

const withDefault = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema);

const flag = (fallback: boolean) =>
  withDefault(
    z
      .enum(['true', 'false', '1', '0'])
      .default(fallback ? 'true' : 'false')
      .transform((value) => value === 'true' || value === '1'),
  );

const envSchema = z.object({
  PORT: withDefault(z.coerce.number().int().positive().default(5000)),
  APP_VERSION: withDefault(z.string().default('1.0.0')),

  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: withDefault(z.string().default('gpt-4o')),
  OPENAI_BASE_URL: withDefault(z.string().url().default('https://api.openai.com/v1')),
  OPENAI_TRANSCRIPTION_MODEL: withDefault(z.string().default('whisper-1')),

  ELEVENLABS_API_KEY: optionalString,
  ELEVENLABS_MODEL_ID: withDefault(z.string().default('eleven_multilingual_v2')),
  ELEVENLABS_VOICE: withDefault(z.string().default('adam')),

  PEXELS_API_KEY: optionalString,

  STORAGE_PROVIDER: withDefault(z.enum(STORAGE_PROVIDERS).default('none')),
  STORAGE_BUCKET: optionalString,
  CLOUD_STORAGE_BUCKET: optionalString,
  STORAGE_PUBLIC: flag(true),
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  AWS_ACCESS_KEY_ID: optionalString,
  AWS_SECRET_ACCESS_KEY: optionalString,
  AWS_REGION: withDefault(z.string().default('us-east-1')),
  SPACES_ENDPOINT: withDefault(z.string().url().optional()),
  SPACES_ACCESS_KEY_ID: optionalString,
  SPACES_SECRET_ACCESS_KEY: optionalString,
  SPACES_REGION: withDefault(z.string().default('nyc3')),

  JOB_STORE: withDefault(z.enum(JOB_STORES).default('memory')),
  DATABASE_URL: optionalString,
  DB_HOST: withDefault(z.string().default('localhost')),
  DB_PORT: withDefault(z.coerce.number().int().positive().default(5432)),
  DB_USERNAME: withDefault(z.string().default('postgres')),
  DB_PASSWORD: withDefault(z.string().default('postgres')),
  DB_DATABASE: withDefault(z.string().default('videogen')),

  OUTPUT_DIR: withDefault(z.string().default('output')),
  MAX_CONCURRENT_JOBS: withDefault(z.coerce.number().int().positive().default(2)),
  JOB_QUEUE_LIMIT: withDefault(z.coerce.number().int().nonnegative().default(20)),
  JOB_RETENTION_MINUTES: withDefault(z.coerce.number().nonnegative().default(60)),
  JOB_SWEEP_INTERVAL_SECONDS: withDefault(z.coerce.number().positive().default(60)),
});

export interface DatabaseConfig {
  url?: string;
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
}

/**
 * S3-compatible object storage. An endpoint selects DigitalOcean Spaces (or
 * another compatible service) with the SPACES_* credentials; without one the
 * AWS_* credentials and region are used.
 */
export interface S3Config {
  endpoint?: string;
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

export interface AppConfig {
  port: number;
  version: string;
  openai: { apiKey?: string; model: string; baseUrl: string; transcriptionModel: string };
  elevenlabs: { apiKey?: string; modelId: string; defaultVoice: string };
  pexels: { apiKey?: string };
  storage: {
    provider: StorageProvider;
    bucket: string;
    public: boolean;
    supabaseUrl?: string;
    supabaseServiceRoleKey?: string;
    s3: S3Config;
  };
  jobs: {
    store: JobStore;
    outputDir: string;
    maxConcurrent: number;
    /** Waiting jobs allowed before submissions are refused; 0 disables the cap. */
    queueLimit: number;
    /** Time a finished job is kept; 0 keeps finished jobs until cleaned up. */
    retentionMs: number;
    sweepIntervalMs: number;
  };
  database: DatabaseConfig;
}

export class ConfigValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const e = parsed.data;
  const s3: S3Config = e.SPACES_ENDPOINT
    ? {
        endpoint: e.SPACES_ENDPOINT,
        region: e.SPACES_REGION,
        accessKeyId: e.SPACES_ACCESS_KEY_ID,
        secretAccessKey: e.SPACES_SECRET_ACCESS_KEY,
      }
    : { region: e.AWS_REGION, accessKeyId: e.AWS_ACCESS_KEY_ID, secretAccessKey: e.AWS_SECRET_ACCESS_KEY };
  return {
    port: e.PORT,
    version: e.APP_VERSION,
    openai: {
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
      baseUrl: e.OPENAI_BASE_URL,
      transcriptionModel: e.OPENAI_TRANSCRIPTION_MODEL,
    },
    elevenlabs: {
      apiKey: e.ELEVENLABS_API_KEY,
      modelId: e.ELEVENLABS_MODEL_ID,
      defaultVoice: e.ELEVENLABS_VOICE,
    },
    pexels: { apiKey: e.PEXELS_API_KEY },
    storage: {
      provider: e.STORAGE_PROVIDER,
      bucket: e.STORAGE_BUCKET ?? e.CLOUD_STORAGE_BUCKET ?? 'text-to-video-ai',
      public: e.STORAGE_PUBLIC,
      supabaseUrl: e.SUPABASE_URL,
      supabaseServiceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY,
      s3,
    },
    jobs: {
      store: e.JOB_STORE,
      outputDir: e.OUTPUT_DIR,
      maxConcurrent: e.MAX_CONCURRENT_JOBS,
      queueLimit: e.JOB_QUEUE_LIMIT,
      retentionMs: e.JOB_RETENTION_MINUTES * 60_000,
      sweepIntervalMs: e.JOB_SWEEP_INTERVAL_SECONDS * 1000,
    },
    database: {
      url: e.DATABASE_URL,
      host: e.DB_HOST,
      port: e.DB_PORT,
      username: e.DB_USERNAME,
      password: e.DB_PASSWORD,
      database: e.DB_DATABASE,
    },
  };
}

/**
 * Names of the environment variables the generation pipeline cannot run without.
 * Their absence degrades /health instead of stopping the process.
 */
export function missingRequiredKeys(config: AppConfig): string[] {
  const missing: string[] = [];
  if (!config.openai.apiKey) missing.push('OPENAI_API_KEY');
  if (!config.elevenlabs.apiKey) missing.push('ELEVENLABS_API_KEY');
  if (!config.pexels.apiKey) missing.push('PEXELS_API_KEY');
  if (config.storage.provider === 'supabase') {
    if (!config.storage.supabaseUrl) missing.push('SUPABASE_URL');
    if (!config.storage.supabaseServiceRoleKey) missing.push('SUPABASE_SERVICE_ROLE_KEY');
  }
  if (config.storage.provider === 's3') {
    const prefix = config.storage.s3.endpoint ? 'SPACES' : 'AWS';
    if (!config.storage.s3.accessKeyId) missing.push(`${prefix}_ACCESS_KEY_ID`);
    if (!config.storage.s3.secretAccessKey) missing.push(`${prefix}_SECRET_ACCESS_KEY`);
  }
  return missing;
}
