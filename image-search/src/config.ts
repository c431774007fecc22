/**
 * Runtime configuration, read from the environment.
 *
 * Every tunable has a default. loadConfig() never reads process.env on its
 * own, so tests can pass a plain object; index.ts loads `.env` through dotenv
 * before calling it.
 */
import { ConfigurationError } from './errors';
import { parseLevel, LogLevel } from './utils/logger';

export type Env = Record<string, string | undefined>;

export type EmbeddingProvider = 'local' | 'openai';
export type CaptionProvider = 'local' | 'http';

export interface AppConfig {
  port: number;
  databasePath: string;
  uploadDir: string;
  maxFileSize: number;
  allowedExtensions: string[];
  embedding: {
    provider: EmbeddingProvider;
    dimension: number;
    model: string;
    openaiApiKey?: string;
  };
  caption: {
    provider: CaptionProvider;
    apiUrl?: string;
    apiToken?: string;
    concurrent: boolean;
  };
  modelTimeoutMs: number;
  search: {
    defaultLimit: number;
    maxLimit: number;
    defaultThreshold: number;
  };
  history: {
    defaultLimit: number;
    maxLimit: number;
  };
  apiToken?: string;
  logLevel: LogLevel;
}

function optionalEnv(env: Env, name: string, fallback: string): string {
  return env[name] || fallback;
}

function optionalNumericEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`Environment variable ${name} must be a number, got: ${raw}`);
  }
  return parsed;
}

function optionalBooleanEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw) return fallback;
  const value = raw.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(value)) return true;
  if (['0', 'false', 'no', 'off'].includes(value)) return false;
  throw new ConfigurationError(`Environment variable ${name} must be a boolean, got: ${raw}`);
}

function optionalListEnv(env: Env, name: string, fallback: string[]): string[] {
  const raw = env[name];
  if (!raw) return fallback;
  return raw
    .split(',')
    .map((part) => part.trim().toLowerCase().replace(/^\./, ''))
    .filter(Boolean);
}

function oneOf<T extends string>(env: Env, name: string, allowed: readonly T[], fallback: T): T {
  const raw = env[name];
  if (!raw) return fallback;
  const match = allowed.find((option) => option === raw.toLowerCase());
  if (!match) {
    throw new ConfigurationError(`Environment variable ${name} must be one of ${allowed.join(', ')}, got: ${raw}`);
  }
  return match;
}

export function loadConfig(env: Env): AppConfig {
  const config: AppConfig = {
    port: optionalNumericEnv(env, 'PORT', 3000),
    databasePath: optionalEnv(env, 'DATABASE_PATH', 'images.db'),
    uploadDir: optionalEnv(env, 'UPLOAD_DIR', 'uploads'),
    maxFileSize: optionalNumericEnv(env, 'MAX_FILE_SIZE', 10 * 1024 * 1024),
    allowedExtensions: optionalListEnv(env, 'ALLOWED_EXTENSIONS', ['jpg', 'jpeg', 'png']),
    embedding: {
      provider: oneOf(env, 'EMBEDDING_PROVIDER', ['local', 'openai'] as const, 'local'),
      dimension: optionalNumericEnv(env, 'EMBEDDING_DIM', 384),
      model: optionalEnv(env, 'EMBEDDING_MODEL', 'text-embedding-3-small'),
      openaiApiKey: env.OPENAI_API_KEY || undefined,
    },
    caption: {
      provider: oneOf(env, 'CAPTION_PROVIDER', ['local', 'http'] as const, 'local'),
      apiUrl: env.CAPTION_API_URL || undefined,
      apiToken: env.CAPTION_API_TOKEN || undefined,
      concurrent: optionalBooleanEnv(env, 'CAPTION_CONCURRENT', false),
    },
    modelTimeoutMs: optionalNumericEnv(env, 'MODEL_TIMEOUT_MS', 30_000),
    search: {
      defaultLimit: optionalNumericEnv(env, 'SEARCH_DEFAULT_LIMIT', 3),
      maxLimit: optionalNumericEnv(env, 'SEARCH_MAX_LIMIT', 20),
      defaultThreshold: optionalNumericEnv(env, 'SEARCH_DEFAULT_THRESHOLD', 0),
    },
    history: {
      defaultLimit: optionalNumericEnv(env, 'HISTORY_DEFAULT_LIMIT', 50),
      maxLimit: optionalNumericEnv(env, 'HISTORY_MAX_LIMIT', 100),
    },
    apiToken: env.API_TOKEN || undefined,
    logLevel: parseLevel(env.LOG_LEVEL),
  };

  validateConfig(config);
  return config;
}

function validateConfig(config: AppConfig) {
  const { embedding, caption, search, history } = config;
  if (!Number.isInteger(embedding.dimension) || embedding.dimension < 1) {
    throw new ConfigurationError(`EMBEDDING_DIM must be a positive integer, got: ${embedding.dimension}`);
  }
  if (embedding.provider === 'openai' && !embedding.openaiApiKey) {
    throw new ConfigurationError('Missing required environment variable: OPENAI_API_KEY');
  }
  if (caption.provider === 'http' && !caption.apiUrl) {
    throw new ConfigurationError('Missing required environment variable: CAPTION_API_URL');
  }
  if (config.allowedExtensions.length === 0) {
    throw new ConfigurationError('ALLOWED_EXTENSIONS must list at least one extension');
  }
  if (config.maxFileSize <= 0) {
    throw new ConfigurationError('MAX_FILE_SIZE must be positive');
  }
  for (const [name, limits] of [['SEARCH', search], ['HISTORY', history]] as const) {
    if (!Number.isInteger(limits.maxLimit) || limits.maxLimit < 1) {
      throw new ConfigurationError(`${name}_MAX_LIMIT must be a positive integer`);
    }
    if (!Number.isInteger(limits.defaultLimit) || limits.defaultLimit < 1 || limits.defaultLimit > limits.maxLimit) {
      throw new ConfigurationError(`${name}_DEFAULT_LIMIT must be between 1 and ${name}_MAX_LIMIT`);
    }
  }
  if (search.defaultThreshold < 0 || search.defaultThreshold > 1) {
    throw new ConfigurationError('SEARCH_DEFAULT_THRESHOLD must be between 0 and 1');
  }
}
