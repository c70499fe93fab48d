import type { ImageProfile } from '@rgi-reader/backend/types';

/**
 * Models offered to clients. Only the gpt-4o family accepts an explicit temperature.
 */
export const SUPPORTED_MODELS = ['gpt-4o', 'gpt-4o-mini', 'gpt-5', 'gpt-5-mini'];

export const DEFAULT_MODEL = 'gpt-4o';

/**
 * Substring identifying models that take `temperature: 0`
 */
export const TEMPERATURE_MODEL_FAMILY = 'gpt-4o';

/**
 * Pages sent per request, keeps payloads under the API size limit
 */
export const PAGES_PER_BATCH = 2;

export const DPI_RANGE = {
  min: 120,
  max: 300,
  step: 20,
  default: 240,
};

export const STANDARD_PROFILE: ImageProfile = {
  name: 'standard',
  maxWidth: 1600,
  quality: 80,
};

/**
 * Used for the single retry after a payload-too-large failure
 */
export const LIGHT_PROFILE: ImageProfile = {
  name: 'light',
  maxWidth: 1200,
  quality: 70,
};
