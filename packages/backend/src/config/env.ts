import type { OpenAIConfig, ServerConfig } from '@rgi-reader/backend/types';
import { DEFAULT_MODEL, SUPPORTED_MODELS } from '@rgi-reader/backend/config/extraction';
import { ConfigurationError } from '@rgi-reader/backend/errors';
import { DEFAULT_MEMORY_CACHE_ENTRIES } from '@rgi-reader/backend/services/cache';

/**
 * Read an environment variable, treating blank values as unset
 */
export const readEnv = (name: string): string | null => {
  const value = process.env[name];
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

const readPositiveNumber = (name: string, fallback: number): number => {
  const raw = readEnv(name);
  if (raw === null) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number, got "${raw}"`);
  }
  return value;
};

/**
 * Model used when a request does not choose one
 */
export const getDefaultModel = (): string => readEnv('OPENAI_MODEL') ?? DEFAULT_MODEL;

/**
 * OpenAI settings. OPENAI_CREDENTIALS is accepted as an alternative key name.
 */
export const getOpenAIConfig = (): OpenAIConfig => {
  const apiKey = readEnv('OPENAI_API_KEY') ?? readEnv('OPENAI_CREDENTIALS');

  if (!apiKey) {
    throw new ConfigurationError(
      'OpenAI is not configured. Set OPENAI_API_KEY (or OPENAI_CREDENTIALS) in the environment or .env file',
    );
  }

  return {
    apiKey,
    baseURL: readEnv('OPENAI_BASE_URL') ?? 'https://api.openai.com/v1',
    model: getDefaultModel(),
  };
};

export const getServerConfig = (): ServerConfig => {
  return {
    port: readPositiveNumber('PORT', 8000),
    maxFileBytes: readPositiveNumber('MAX_FILE_MB', 25) * 1024 * 1024,
    databaseUrl: readEnv('DATABASE_URL'),
    memoryCacheEntries: Math.floor(readPositiveNumber('MEMORY_CACHE_ENTRIES', DEFAULT_MEMORY_CACHE_ENTRIES)),
  };
};

/**
 * Models accepted by the API: the offered list plus the configured default
 */
export const getSupportedModels = (): string[] => [...new Set([...SUPPORTED_MODELS, getDefaultModel()])];
