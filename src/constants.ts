/**
 * commute-rank constants
 */

export const COMMUTE_RANK_VERSION = '1.0.0';

export const SUPPORTED_MODES = [
  'driving',
  'transit',
  'bicycle',
  'walking'
] as const;

// Accepted on the command line and in config files, normalized before use
export const MODE_ALIASES = {
  bicycling: 'bicycle'
} as const;

export const GOOGLE_MAPS_ENDPOINTS = {
  BASE_URL: 'https://maps.googleapis.com/maps/api',
  DISTANCE_MATRIX_PATH: '/distancematrix/json',
  DIRECTIONS_PATH: '/directions/json'
} as const;

// Wire values expected by the Google Maps services
export const GOOGLE_MODE_PARAMS = {
  driving: 'driving',
  transit: 'transit',
  bicycle: 'bicycling',
  walking: 'walking'
} as const;

export const RETRY_DEFAULTS = {
  MAX_ATTEMPTS: 3,
  BASE_DELAY_MS: 1000
} as const;

export const REQUEST_DEFAULTS = {
  TIMEOUT_MS: 10000
} as const;

export const SECONDS_PER_HOUR = 3600;

export const OUTPUT_SETTINGS = {
  SCORE_DECIMALS: 3,
  ADDRESS_COLUMN_WIDTH: 20
} as const;

export const REQUEST_LOGGER_NAME = 'request';
export const CLI_LOGGER_NAME = 'commute-rank';
