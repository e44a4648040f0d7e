// Global configuration defaults for commute-rank
// Environment variables override the built-in defaults; config files and CLI flags override these.
// Read on every call so that variables loaded from .env after import are seen.

import { DepartureTime, TravelMode } from '../types';
import { GOOGLE_MAPS_ENDPOINTS, MODE_ALIASES, REQUEST_DEFAULTS, RETRY_DEFAULTS, SUPPORTED_MODES } from '../constants';
import { ConfigError } from '../utils/errors';

export function getGlobalConfig(env: NodeJS.ProcessEnv = process.env) {
  return {
    googleMaps: {
      apiKey: env.GOOGLE_MAPS_API_KEY || '',
      baseUrl: env.GOOGLE_MAPS_BASE_URL || GOOGLE_MAPS_ENDPOINTS.BASE_URL,
      timeoutMs: parseInt(env.COMMUTE_RANK_TIMEOUT_MS || String(REQUEST_DEFAULTS.TIMEOUT_MS)),
      departureTime: env.COMMUTE_RANK_DEPARTURE_TIME || 'now',
    },

    retry: {
      maxAttempts: parseInt(env.COMMUTE_RANK_MAX_ATTEMPTS || String(RETRY_DEFAULTS.MAX_ATTEMPTS)),
      baseDelayMs: parseInt(env.COMMUTE_RANK_BACKOFF_BASE_MS || String(RETRY_DEFAULTS.BASE_DELAY_MS)),
    },

    defaultMode: 'driving',
    verbose: env.COMMUTE_RANK_VERBOSE === 'true',
  } as const;
}

function isTravelMode(value: string): value is TravelMode {
  return SUPPORTED_MODES.some(mode => mode === value);
}

function isModeAlias(value: string): value is keyof typeof MODE_ALIASES {
  return Object.prototype.hasOwnProperty.call(MODE_ALIASES, value);
}

// Helper functions for configuration values coming from env, YAML or the command line
export const configHelpers = {
  /**
   * Normalize a travel mode, resolving aliases such as `bicycling`
   */
  parseMode(value: unknown): TravelMode {
    const mode = typeof value === 'string' ? value.trim().toLowerCase() : '';
    if (isTravelMode(mode)) {
      return mode;
    }
    if (isModeAlias(mode)) {
      return MODE_ALIASES[mode];
    }
    throw new ConfigError(`Unsupported mode "${String(value)}". Expected one of: ${SUPPORTED_MODES.join(', ')}`);
  },

  /**
   * Positive integer from a number or a numeric string
   */
  parsePositiveInteger(value: unknown, name: string): number {
    const parsed = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value.trim()) : value;
    if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < 1) {
      throw new ConfigError(`${name} must be a positive integer, got "${String(value)}"`);
    }
    return parsed;
  },

  parseNonNegativeNumber(value: unknown, name: string): number {
    const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < 0) {
      throw new ConfigError(`${name} must be a nonnegative number, got "${String(value)}"`);
    }
    return parsed;
  },

  /**
   * `now` or epoch seconds
   */
  parseDepartureTime(value: unknown): DepartureTime {
    if (value === 'now') {
      return 'now';
    }
    const seconds = configHelpers.parseNonNegativeNumber(value, 'departureTime');
    return Math.floor(seconds);
  },
};
