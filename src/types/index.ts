/**
 * commute-rank Type Definitions
 */

import { SUPPORTED_MODES } from '../constants';

// Free-form location text, sent to the provider as is
export type Address = string;

export type TravelMode = typeof SUPPORTED_MODES[number];

export interface KeyPoint {
  readonly weight: number;
  readonly address: Address;
}

// [origin][destination], seconds
export type DurationMatrix = number[][];

// Weighted mean commute time in hours, per origin
export type Scores = Map<Address, number>;

export interface RankedOrigin {
  address: Address;
  score: number;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

// 'now' resolves to the current time when each request is built
export type DepartureTime = number | 'now';

export interface GoogleMapsConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  departureTime: DepartureTime;
}

export interface CommuteRankConfig {
  googleMaps: GoogleMapsConfig;
  retry: RetryPolicy;
  mode: TravelMode;
  verbose: boolean;
}
