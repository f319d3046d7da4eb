/**
 * Core types for the county health lookup
 * Focus: the request vocabulary and the records a lookup returns
 */

import { z } from 'zod';

// ============================================
// Measures
// ============================================

/** Canonical measure names. Matching is exact and case-sensitive. */
export const MEASURES = [
  'Violent crime rate',
  'Unemployment',
  'Children in poverty',
  'Diabetic screening',
  'Mammography screening',
  'Preventable hospital stays',
  'Uninsured',
  'Sexually transmitted infections',
  'Physical inactivity',
  'Adult obesity',
  'Premature Death',
  'Daily fine particulate matter',
] as const;

export const MeasureNameSchema = z.enum(MEASURES);

export type MeasureName = z.infer<typeof MeasureNameSchema>;

// ============================================
// Requests
// ============================================

export const ZipCodeSchema = z.string().regex(/^\d{5}$/).brand<'ZipCode'>();

/** Five ASCII digits; only obtainable through ZipCodeSchema */
export type ZipCode = z.infer<typeof ZipCodeSchema>;

export interface ValidatedRequest {
  readonly zip: ZipCode;
  readonly measureName: MeasureName;
}

// ============================================
// Records
// ============================================

/** Columns are stored as text by the loader, but nothing here coerces them */
export type StoreValue = string | number | null;

export interface HealthRecord {
  state: StoreValue;
  county: StoreValue;
  state_code: StoreValue;
  county_code: StoreValue;
  year_span: StoreValue;
  measure_name: StoreValue;
  measure_id: StoreValue;
  numerator: StoreValue;
  denominator: StoreValue;
  raw_value: StoreValue;
  confidence_interval_lower_bound: StoreValue;
  confidence_interval_upper_bound: StoreValue;
  data_release_year: StoreValue;
  fipscode: StoreValue;
}

export const HEALTH_RECORD_COLUMNS = [
  'state',
  'county',
  'state_code',
  'county_code',
  'year_span',
  'measure_name',
  'measure_id',
  'numerator',
  'denominator',
  'raw_value',
  'confidence_interval_lower_bound',
  'confidence_interval_upper_bound',
  'data_release_year',
  'fipscode',
] as const satisfies ReadonlyArray<keyof HealthRecord>;

// ============================================
// Responses
// ============================================

export interface ErrorBody {
  error: string;
}

/** Transport-neutral result of handling one lookup request */
export interface CountyDataResponse {
  status: number;
  body: HealthRecord[] | ErrorBody;
}
