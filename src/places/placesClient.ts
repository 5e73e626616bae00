import axios, { AxiosInstance, isAxiosError } from 'axios';
import { z } from 'zod';
import { PlacesConfig, maskSecret } from '../config/config';
import { ConfigurationError, ExternalServiceError, ValidationError, errorMessage } from '../lib/errors';
import logger from '../lib/logger';
import {
  Place,
  PlacesFailureStatus,
  PlacesSearchOptions,
  PlacesSearchResult,
  PlacesSuccessStatus,
} from '../model/place';
import { isSupportedLanguage, isSupportedPlaceType } from './placeAttributes';

export const PLACES_API_URL = 'https://maps.googleapis.com/maps/api/place';
export const TEXT_SEARCH_PATH = '/textsearch/json';

export const DEFAULT_RADIUS = 100; // meters
export const MAX_RADIUS = 50000; // meters
export const MAX_ABS_LATITUDE = 90;
export const MAX_ABS_LONGITUDE = 180;

const SERVICE = 'googleplaces';

const SUCCESS_STATUSES: ReadonlySet<string> = new Set<PlacesSuccessStatus>(['OK', 'ZERO_RESULTS']);

const FAILURE_STATUSES: Readonly<Record<PlacesFailureStatus, { retryable: boolean }>> = {
  OVER_QUERY_LIMIT: { retryable: true },
  REQUEST_DENIED: { retryable: false },
  INVALID_REQUEST: { retryable: false },
};

// "<lat><sep><lng>" where sep is a comma, a slash, whitespace or a dash.
const LOCATION_PATTERN = /^\s*(-?\d{1,2}(?:\.\d+)?)(?:\s*[,/]\s*|\s+|-)(-?\d{1,3}(?:\.\d+)?)\s*$/;

const placeSchema = z
  .object({
    place_id: z.string().optional(),
    name: z.string().optional(),
    geometry: z
      .object({
        location: z.object({ lat: z.number(), lng: z.number() }).optional(),
      })
      .passthrough()
      .optional(),
    rating: z.number().optional(),
    types: z.array(z.string()).optional(),
    formatted_address: z.string().optional(),
    icon: z.string().optional(),
    reference: z.string().optional(),
  })
  .passthrough();

const textSearchResponseSchema = z.object({
  status: z.string(),
  results: z.array(placeSchema).default([]),
  html_attributions: z.array(z.string()).default([]),
  next_page_token: z.string().optional(),
  error_message: z.string().optional(),
});

type RawPlace = z.infer<typeof placeSchema>;

export type PlacesHttpClient = Pick<AxiosInstance, 'get'>;

function isFailureStatus(status: string): status is PlacesFailureStatus {
  return status in FAILURE_STATUSES;
}

function isSuccessStatus(status: string): status is PlacesSuccessStatus {
  return SUCCESS_STATUSES.has(status);
}

function toCoordinate(value: number | string, field: string): number {
  const coordinate = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isFinite(coordinate) || (typeof value === 'string' && value.trim() === '')) {
    throw new ValidationError(field, value, 'Invalid coordinate');
  }
  return coordinate;
}

function checkBounds(latitude: number, longitude: number): void {
  if (Math.abs(latitude) > MAX_ABS_LATITUDE || Math.abs(longitude) > MAX_ABS_LONGITUDE) {
    throw new ValidationError('location', `${latitude},${longitude}`, 'Coordinate parameters out of bounds');
  }
}

/**
 * Resolves the `location` request parameter. Explicit coordinates win over
 * a free-text location; with neither, no location is sent.
 */
export function resolveLocation(options: PlacesSearchOptions): string | undefined {
  const { latitude, longitude, location } = options;

  if (latitude !== undefined && longitude !== undefined) {
    const lat = toCoordinate(latitude, 'latitude');
    const lng = toCoordinate(longitude, 'longitude');
    checkBounds(lat, lng);
    return `${lat},${lng}`;
  }

  if (location !== undefined && location.trim() !== '') {
    const match = LOCATION_PATTERN.exec(location);
    if (!match) {
      throw new ValidationError('location', location, 'Malformed location');
    }
    const [, latText, lngText] = match;
    checkBounds(Number(latText), Number(lngText));
    return `${latText},${lngText}`;
  }

  return undefined;
}

export function clampRadius(radius: number = DEFAULT_RADIUS): number {
  if (!Number.isFinite(radius) || radius <= 0) {
    throw new ValidationError('radius', radius, 'Radius must be a positive number');
  }
  return Math.min(radius, MAX_RADIUS);
}

function toPlace(raw: RawPlace): Place {
  return {
    placeId: raw.place_id ?? null,
    name: raw.name ?? null,
    location: raw.geometry?.location ?? null,
    rating: raw.rating ?? null,
    types: raw.types ?? [],
    formattedAddress: raw.formatted_address ?? null,
    icon: raw.icon ?? null,
    reference: raw.reference ?? null,
  };
}

export class PlacesClient {
  private readonly apiKey: string;
  private readonly http: PlacesHttpClient;

  constructor(config: PlacesConfig, http?: PlacesHttpClient) {
    if (!config.apiKey) {
      throw new ConfigurationError('Places API key is not configured');
    }
    this.apiKey = config.apiKey;
    this.http = http ?? axios.create({ baseURL: PLACES_API_URL });
  }

  toString(): string {
    return `<PlacesClient: url=${PLACES_API_URL}${TEXT_SEARCH_PATH}, key=${maskSecret(this.apiKey)}>`;
  }

  /**
   * Assembles the query parameters of a text search. Throws a
   * ValidationError for a bad location or radius, before anything is sent.
   */
  buildRequestParams(options: PlacesSearchOptions): Record<string, string> {
    const params: Record<string, string> = {};

    if (options.query !== undefined && options.query.trim() !== '') {
      params.query = options.query.trim();
    }
    const location = resolveLocation(options);
    if (location !== undefined) {
      params.location = location;
    }
    params.radius = String(clampRadius(options.radius));
    if (isSupportedPlaceType(options.type)) {
      params.type = options.type;
    }
    if (isSupportedLanguage(options.language)) {
      params.language = options.language;
    }
    if (options.pageToken !== undefined && options.pageToken !== '') {
      params.pagetoken = options.pageToken;
    }
    params.key = this.apiKey;

    return params;
  }

  async search(options: PlacesSearchOptions = {}): Promise<PlacesSearchResult> {
    const params = this.buildRequestParams(options);
    const requestUrl = this.describeRequest(params);

    let body: unknown;
    try {
      const response = await this.http.get<unknown>(TEXT_SEARCH_PATH, { params });
      body = response.data;
    } catch (error) {
      throw this.transportError(requestUrl, error);
    }

    const parsed = textSearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.error('[PlacesClient] Unexpected response body', { requestUrl, issues: parsed.error.issues });
      throw new ExternalServiceError(
        `Unexpected response from ${requestUrl}`,
        SERVICE,
        'MALFORMED_RESPONSE',
        false,
        undefined,
        parsed.error
      );
    }

    const { status } = parsed.data;
    if (!isSuccessStatus(status)) {
      const retryable = isFailureStatus(status) ? FAILURE_STATUSES[status].retryable : status === 'UNKNOWN_ERROR';
      logger.error(`[PlacesClient] Failed request to URL ${requestUrl} with status code: ${status}`, {
        errorMessage: parsed.data.error_message,
      });
      throw new ExternalServiceError(
        `Failed request to URL ${requestUrl} with status code: ${status}`,
        SERVICE,
        status,
        retryable
      );
    }

    logger.info(`[PlacesClient] Successful request to URL ${requestUrl} with status code: ${status}`);
    return {
      status,
      requestUrl,
      places: parsed.data.results.map(toPlace),
      htmlAttributions: parsed.data.html_attributions,
      nextPageToken: parsed.data.next_page_token ?? null,
    };
  }

  private describeRequest(params: Record<string, string>): string {
    const url = new URL(`${PLACES_API_URL}${TEXT_SEARCH_PATH}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, key === 'key' ? maskSecret(value) : value);
    }
    return url.toString();
  }

  private transportError(requestUrl: string, error: unknown): ExternalServiceError {
    const httpStatus = isAxiosError(error) ? error.response?.status : undefined;
    const retryable = httpStatus === undefined || httpStatus === 429 || httpStatus >= 500;
    logger.error(`[PlacesClient] Request to URL ${requestUrl} failed`, {
      httpStatus,
      error: errorMessage(error),
    });
    return new ExternalServiceError(
      `Request to URL ${requestUrl} failed`,
      SERVICE,
      'TRANSPORT_ERROR',
      retryable,
      httpStatus,
      error
    );
  }
}
