/**
 * County Data Service
 * Transport-neutral handling of one lookup request: parse, validate, query, shape
 */

import type { CountyDataResponse } from '../types/index.js';
import type { HealthRecordSource } from '../storage/county-health-store.js';
import { LookupError, toErrorResponse } from './errors.js';
import { validateLookupRequest } from './validator.js';

/** Field/value pair that short-circuits with 418 before any validation */
export const TEAPOT_FIELD = 'coffee';
export const TEAPOT_VALUE = 'teapot';

/** Paths both front-ends serve the lookup on */
export const LOOKUP_ROUTES = ['/county_data', '/api/county_data'];

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a raw body. Anything other than a JSON object (empty body, bad
 * syntax, arrays, scalars, null) is a MalformedBody.
 */
export function parseRequestBody(rawBody: string | undefined): Record<string, unknown> {
  if (rawBody === undefined || rawBody.trim() === '') {
    throw new LookupError('MalformedBody');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody);
  } catch (error) {
    throw new LookupError('MalformedBody', { cause: error });
  }

  if (!isJsonObject(parsed)) {
    throw new LookupError('MalformedBody');
  }
  return parsed;
}

export class CountyDataService {
  constructor(private readonly store: HealthRecordSource) {}

  handle(rawBody: string | undefined): CountyDataResponse {
    try {
      const payload = parseRequestBody(rawBody);

      if (payload[TEAPOT_FIELD] === TEAPOT_VALUE) {
        throw new LookupError('Teapot');
      }

      const request = validateLookupRequest(payload);
      const records = this.store.lookup(request.zip, request.measureName);

      if (records.length === 0) {
        throw new LookupError('NoMatch');
      }

      return { status: 200, body: records };
    } catch (error) {
      const response = toErrorResponse(error);
      if (response.status >= 500 || (error instanceof LookupError && error.kind === 'StoreUnavailable')) {
        console.error('Lookup failed:', error);
      }
      return response;
    }
  }
}
