/**
 * County Health Store
 * Read-only lookups joining county_health_rankings to zip_county
 */

import { existsSync } from 'fs';
import { withDatabase } from './sqlite.js';
import { storeUnavailable } from '../lookup/errors.js';
import {
  HEALTH_RECORD_COLUMNS,
  type HealthRecord,
  type MeasureName,
  type ZipCode,
} from '../types/index.js';

// ============================================
// Types
// ============================================

/** Anything that can answer a (zip, measure) lookup */
export interface HealthRecordSource {
  lookup(zip: ZipCode, measureName: MeasureName): HealthRecord[];
}

interface LookupParams {
  zip: string;
  measure: string;
}

// ============================================
// Query
// ============================================

// A record joins a mapping row by FIPS code when it has one, or by
// county name + state abbreviation. Both keys live in one predicate so a
// record matching on both still comes back once after DISTINCT.
const LOOKUP_SQL = `
  SELECT DISTINCT
    ${HEALTH_RECORD_COLUMNS.map((column) => `chr.${column}`).join(',\n    ')}
  FROM county_health_rankings AS chr
  INNER JOIN zip_county AS zc
    ON zc.zip = :zip
   AND (
     (chr.fipscode IS NOT NULL AND chr.fipscode = zc.county_code)
     OR (chr.county = zc.county AND chr.state = zc.state_abbreviation)
   )
  WHERE chr.measure_name = :measure
  ORDER BY chr.data_release_year ASC, chr.year_span ASC, chr.state ASC, chr.county ASC
`;

// ============================================
// County Health Store
// ============================================

export class CountyHealthStore implements HealthRecordSource {
  constructor(private readonly databasePath: string) {}

  /**
   * Records for every county the ZIP maps to, oldest release first.
   * An empty array means the query ran and matched nothing.
   */
  lookup(zip: ZipCode, measureName: MeasureName): HealthRecord[] {
    if (!existsSync(this.databasePath)) {
      throw storeUnavailable('missing');
    }

    try {
      return withDatabase({ path: this.databasePath, readonly: true }, (db) =>
        db.prepare<LookupParams, HealthRecord>(LOOKUP_SQL).all({ zip, measure: measureName })
      );
    } catch (error) {
      throw storeUnavailable('unreadable', error);
    }
  }
}
