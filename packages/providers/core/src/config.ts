import {
  DEFAULT_FUZZY_THRESHOLD,
  DEFAULT_READ_TRACK_LIMIT,
  DEFAULT_SEARCH_LIMIT,
  MAX_SEARCH_LIMIT,
} from '@tracklift/contracts';

/**
 * Provider request configuration
 */
export interface ProviderRequestConfig {
  /**
   * Per-call timeout for platform and oracle requests in milliseconds
   * @default 10000
   */
  timeoutMs: number;

  /**
   * Candidates requested per catalog search, capped at 50
   * @default 5
   */
  searchLimit: number;

  /**
   * Maximum entries read from a source playlist
   * @default 500
   */
  readTrackLimit: number;

  /**
   * Fuzzy-tier acceptance threshold (0-1)
   * @default 0.7
   */
  fuzzyThreshold: number;
}

export const DEFAULT_PROVIDER_REQUEST_CONFIG: ProviderRequestConfig = {
  timeoutMs: 10000,
  searchLimit: DEFAULT_SEARCH_LIMIT,
  readTrackLimit: DEFAULT_READ_TRACK_LIMIT,
  fuzzyThreshold: DEFAULT_FUZZY_THRESHOLD,
};

const positiveNumber = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
};

/**
 * Get provider request configuration from environment variables
 */
export function getProviderConfigFromEnv(
  source: NodeJS.ProcessEnv = process.env,
): Partial<ProviderRequestConfig> {
  const config: Partial<ProviderRequestConfig> = {};
  const timeoutMs = positiveNumber(source.REQUEST_TIMEOUT_MS);
  const searchLimit = positiveNumber(source.SEARCH_LIMIT);
  const readTrackLimit = positiveNumber(source.READ_TRACK_LIMIT);
  const fuzzyThreshold = positiveNumber(source.FUZZY_THRESHOLD);

  if (timeoutMs !== undefined) config.timeoutMs = timeoutMs;
  if (searchLimit !== undefined) config.searchLimit = Math.min(Math.max(Math.trunc(searchLimit), 1), MAX_SEARCH_LIMIT);
  if (readTrackLimit !== undefined) config.readTrackLimit = Math.trunc(readTrackLimit);
  if (fuzzyThreshold !== undefined && fuzzyThreshold <= 1) config.fuzzyThreshold = fuzzyThreshold;

  return config;
}

/**
 * Merge provider request config with defaults
 */
export function resolveProviderConfig(
  overrides: Partial<ProviderRequestConfig> = {},
  source: NodeJS.ProcessEnv = process.env,
): ProviderRequestConfig {
  return {
    ...DEFAULT_PROVIDER_REQUEST_CONFIG,
    ...getProviderConfigFromEnv(source),
    ...overrides,
  };
}
