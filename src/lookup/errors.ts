/**
 * Lookup Errors
 * Closed set of failure kinds and the mapping from each kind to a response
 */

import type { CountyDataResponse } from '../types/index.js';

// ============================================
// Types
// ============================================

export type LookupErrorKind =
  | 'MalformedBody'
  | 'Teapot'
  | 'MissingField'
  | 'InvalidZip'
  | 'InvalidType'
  | 'UnknownMeasure'
  | 'NoMatch'
  | 'StoreUnavailable'
  | 'Unclassified';

/** Why the store could not serve a lookup */
export type StoreFailure = 'missing' | 'unreadable';

export class LookupError extends Error {
  readonly kind: LookupErrorKind;
  readonly storeFailure?: StoreFailure;

  constructor(
    kind: LookupErrorKind,
    options: { storeFailure?: StoreFailure; cause?: unknown } = {}
  ) {
    super(describeFailure(kind, options.storeFailure), { cause: options.cause });
    this.name = 'LookupError';
    this.kind = kind;
    this.storeFailure = options.storeFailure;
  }
}

export function storeUnavailable(failure: StoreFailure, cause?: unknown): LookupError {
  return new LookupError('StoreUnavailable', { storeFailure: failure, cause });
}

// ============================================
// Response Shaping
// ============================================

/** Client-facing message per kind. Never includes paths, SQL or driver text. */
function describeFailure(kind: LookupErrorKind, storeFailure?: StoreFailure): string {
  switch (kind) {
    case 'MalformedBody':
      return 'Request body must be JSON';
    case 'Teapot':
      return "Request rejected: I'm a teapot.";
    case 'MissingField':
      return 'zip and measure_name are required';
    case 'InvalidZip':
      return 'zip must be a 5-digit string';
    case 'InvalidType':
    case 'UnknownMeasure':
      return 'measure_name must be one of the documented measures';
    case 'NoMatch':
      return 'no matching records';
    case 'StoreUnavailable':
      return storeFailure === 'missing'
        ? 'county data store not found'
        : 'county data store could not be read';
    case 'Unclassified':
      return 'Internal server error';
  }
}

function statusFor(error: LookupError): number {
  switch (error.kind) {
    case 'MalformedBody':
    case 'MissingField':
    case 'InvalidZip':
    case 'InvalidType':
    case 'UnknownMeasure':
      return 400;
    case 'Teapot':
      return 418;
    case 'NoMatch':
      return 404;
    case 'StoreUnavailable':
      // A missing store file reads as "not found"; anything else is a server fault
      return error.storeFailure === 'missing' ? 404 : 500;
    case 'Unclassified':
      return 500;
  }
}

/**
 * Classify any thrown value into the uniform `{ error }` contract.
 * Values that are not a LookupError become Unclassified.
 */
export function toErrorResponse(error: unknown): CountyDataResponse {
  const classified = error instanceof LookupError
    ? error
    : new LookupError('Unclassified', { cause: error });

  return {
    status: statusFor(classified),
    body: { error: classified.message },
  };
}
