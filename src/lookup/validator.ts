/**
 * Request Validator
 * Turns an untrusted JSON object into a ValidatedRequest or a LookupError
 */

import {
  MeasureNameSchema,
  ZipCodeSchema,
  type MeasureName,
  type ValidatedRequest,
} from '../types/index.js';
import { LookupError } from './errors.js';

export function isMeasureName(value: unknown): value is MeasureName {
  return MeasureNameSchema.safeParse(value).success;
}

/**
 * Validate a parsed request body.
 *
 * Checks run in a fixed order (presence, zip, measure type, measure
 * membership) and the first failure wins. Accepted values are returned
 * exactly as given: no trimming or case folding.
 */
export function validateLookupRequest(payload: Record<string, unknown>): ValidatedRequest {
  const zip = payload.zip;
  const measureName = payload.measure_name;

  if (zip === undefined || zip === null || measureName === undefined || measureName === null) {
    throw new LookupError('MissingField');
  }

  const parsedZip = ZipCodeSchema.safeParse(zip);
  if (!parsedZip.success) {
    throw new LookupError('InvalidZip');
  }

  if (typeof measureName !== 'string') {
    throw new LookupError('InvalidType');
  }

  const parsedMeasure = MeasureNameSchema.safeParse(measureName);
  if (!parsedMeasure.success) {
    throw new LookupError('UnknownMeasure');
  }

  return { zip: parsedZip.data, measureName: parsedMeasure.data };
}
