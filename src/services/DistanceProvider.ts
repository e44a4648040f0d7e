import axios, { AxiosRequestConfig } from 'axios';
import { Address, DurationMatrix, GoogleMapsConfig, RetryPolicy, TravelMode } from '../types';
import { GOOGLE_MAPS_ENDPOINTS, GOOGLE_MODE_PARAMS } from '../constants';
import { ConfigError, DataFormatError, TransportError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { DEFAULT_RETRY_POLICY, RetryOptions, withRetry } from '../utils/retry';

/**
 * Source of origin × destination travel durations
 */
export interface DistanceProvider {
  getDurationMatrix(origins: Address[], destinations: Address[], mode: TravelMode): Promise<DurationMatrix>;
}

// The slice of axios the provider needs; the default axios instance satisfies it
export interface HttpClient {
  get(url: string, config?: AxiosRequestConfig): Promise<{ data: unknown; status: number }>;
}

export interface GoogleMapsDistanceProviderOptions {
  config: GoogleMapsConfig;
  logger: Logger;
  retry?: RetryPolicy;
  http?: HttpClient;
  sleep?: RetryOptions['sleep'];
  random?: RetryOptions['random'];
  now?: () => Date;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readDurationValue(holder: unknown): number | null {
  if (!isObject(holder) || !isObject(holder.duration)) {
    return null;
  }
  const value = holder.duration.value;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    return null;
  }
  return value;
}

function describeStatus(payload: JsonObject): string {
  const status = typeof payload.status === 'string' ? payload.status : 'missing status';
  return typeof payload.error_message === 'string' ? `${status} - ${payload.error_message}` : status;
}

/**
 * Parse a Distance Matrix payload into an m×n matrix of seconds
 */
export function parseDistanceMatrixResponse(payload: unknown, originCount: number, destinationCount: number): DurationMatrix {
  if (!isObject(payload)) {
    throw new DataFormatError('Distance matrix response is not a JSON object', payload);
  }
  if (payload.status !== 'OK') {
    throw new DataFormatError(`Distance matrix request failed: ${describeStatus(payload)}`, payload);
  }

  const rows = payload.rows;
  if (!Array.isArray(rows) || rows.length !== originCount) {
    const found = Array.isArray(rows) ? rows.length : 0;
    throw new DataFormatError(`Expected ${originCount} rows in distance matrix, found ${found}`, payload);
  }

  return rows.map((row: unknown, i) => {
    const elements = isObject(row) ? row.elements : undefined;
    if (!Array.isArray(elements) || elements.length !== destinationCount) {
      const found = Array.isArray(elements) ? elements.length : 0;
      throw new DataFormatError(`Expected ${destinationCount} elements in row ${i}, found ${found}`, payload);
    }

    return elements.map((element: unknown, j) => {
      if (isObject(element) && typeof element.status === 'string' && element.status !== 'OK') {
        throw new DataFormatError(`No duration for row ${i}, element ${j}: ${element.status}`, payload);
      }
      const seconds = readDurationValue(element);
      if (seconds === null) {
        throw new DataFormatError(`Missing or non-numeric duration for row ${i}, element ${j}`, payload);
      }
      return seconds;
    });
  });
}

/**
 * Parse a Directions payload into the duration (seconds) of the first leg of the first route
 */
export function parseDirectionsResponse(payload: unknown): number {
  if (!isObject(payload)) {
    throw new DataFormatError('Directions response is not a JSON object', payload);
  }
  if (payload.status !== 'OK') {
    throw new DataFormatError(`Directions request failed: ${describeStatus(payload)}`, payload);
  }

  const route = Array.isArray(payload.routes) ? payload.routes[0] : undefined;
  const leg = isObject(route) && Array.isArray(route.legs) ? route.legs[0] : undefined;
  const seconds = readDurationValue(leg);
  if (seconds === null) {
    throw new DataFormatError('Directions response has no route leg with a numeric duration', payload);
  }
  return seconds;
}

/**
 * Google Maps backed provider. Transit goes through the Directions service one
 * pair at a time since the Distance Matrix service does not serve it here;
 * every other mode is a single Distance Matrix request.
 */
export class GoogleMapsDistanceProvider implements DistanceProvider {
  private readonly config: GoogleMapsConfig;
  private readonly logger: Logger;
  private readonly retry: RetryPolicy;
  private readonly http: HttpClient;
  private readonly retryOptions: RetryOptions;
  private readonly now: () => Date;

  constructor(options: GoogleMapsDistanceProviderOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.http = options.http ?? axios;
    this.now = options.now ?? (() => new Date());
    this.retryOptions = {
      logger: this.logger,
      sleep: options.sleep,
      random: options.random
    };
  }

  async getDurationMatrix(origins: Address[], destinations: Address[], mode: TravelMode): Promise<DurationMatrix> {
    this.validateAddresses('origin', origins);
    this.validateAddresses('destination', destinations);
    if (!this.config.apiKey) {
      throw new ConfigError('A Google Maps API key is required (set GOOGLE_MAPS_API_KEY or pass --api-key)');
    }

    if (mode === 'transit') {
      return this.loadPairwiseDurations(origins, destinations);
    }
    return this.loadBatchedDurations(origins, destinations, mode);
  }

  private validateAddresses(kind: string, addresses: Address[]): void {
    if (addresses.length === 0) {
      throw new ConfigError(`At least one ${kind} address is required`);
    }
    const blank = addresses.findIndex(address => address.trim().length === 0);
    if (blank !== -1) {
      throw new ConfigError(`The ${kind} address at index ${blank} is empty`);
    }
  }

  private async loadBatchedDurations(origins: Address[], destinations: Address[], mode: TravelMode): Promise<DurationMatrix> {
    const params = new URLSearchParams({
      origins: origins.join('|'),
      destinations: destinations.join('|'),
      mode: GOOGLE_MODE_PARAMS[mode]
    });

    return this.requestWithRetry(GOOGLE_MAPS_ENDPOINTS.DISTANCE_MATRIX_PATH, params, payload =>
      parseDistanceMatrixResponse(payload, origins.length, destinations.length)
    );
  }

  private async loadPairwiseDurations(origins: Address[], destinations: Address[]): Promise<DurationMatrix> {
    const durations: DurationMatrix = origins.map(() => new Array<number>(destinations.length).fill(0));

    for (let i = 0; i < origins.length; i++) {
      for (let j = 0; j < destinations.length; j++) {
        const params = new URLSearchParams({
          origin: origins[i],
          destination: destinations[j],
          mode: GOOGLE_MODE_PARAMS.transit,
          departure_time: this.resolveDepartureTime()
        });

        durations[i][j] = await this.requestWithRetry(GOOGLE_MAPS_ENDPOINTS.DIRECTIONS_PATH, params, parseDirectionsResponse);
      }
    }

    return durations;
  }

  private resolveDepartureTime(): string {
    const departure = this.config.departureTime;
    const seconds = departure === 'now' ? Math.floor(this.now().getTime() / 1000) : departure;
    return seconds.toString();
  }

  /**
   * One logical request: fetch, then parse. A parse failure is retried like a transport failure.
   */
  private async requestWithRetry<T>(path: string, params: URLSearchParams, parse: (payload: unknown) => T): Promise<T> {
    const url = `${this.config.baseUrl}${path}?${params.toString()}`;
    const redacted = `${this.config.baseUrl}${path}?${params.toString()}&key=***`;
    params.append('key', this.config.apiKey);
    const signedUrl = `${this.config.baseUrl}${path}?${params.toString()}`;

    return withRetry(
      async () => {
        this.logger.info(`GET ${redacted}`);
        const payload = await this.fetchJson(signedUrl, url);
        return parse(payload);
      },
      this.retry,
      { ...this.retryOptions, label: `GET ${url}` }
    );
  }

  private async fetchJson(signedUrl: string, displayUrl: string): Promise<unknown> {
    let response: { data: unknown; status: number };
    try {
      response = await this.http.get(signedUrl, {
        timeout: this.config.timeoutMs,
        responseType: 'json'
      });
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new TransportError(`Request failed: ${error.message}`, displayUrl, error.response?.status);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Request failed: ${reason}`, displayUrl);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new TransportError(`Request failed with status ${response.status}`, displayUrl, response.status);
    }
    return response.data;
  }
}
