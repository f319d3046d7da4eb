/**
 * Tests for request handling independent of any HTTP front-end
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { CountyDataService, parseRequestBody } from '../src/lookup/dispatcher.js';
import { LookupError, storeUnavailable } from '../src/lookup/errors.js';
import type { HealthRecord, MeasureName, ZipCode } from '../src/types/index.js';
import { healthRecord } from './helpers/fixture-store.js';

const body = (value: unknown) => JSON.stringify(value);

describe('parseRequestBody', () => {
  it('returns a parsed object', () => {
    expect(parseRequestBody('{"zip":"02138"}')).toEqual({ zip: '02138' });
  });

  it.each([undefined, '', '   ', 'not json', '{"zip":', '[]', '[{"zip":"02138"}]', '"02138"', '42', 'null', 'true'])(
    'rejects %j as MalformedBody',
    (raw) => {
      try {
        parseRequestBody(raw);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(LookupError);
        expect(error instanceof LookupError && error.kind).toBe('MalformedBody');
      }
    }
  );
});

describe('CountyDataService', () => {
  const record = healthRecord();
  let lookup: Mock<(zip: ZipCode, measureName: MeasureName) => HealthRecord[]>;
  let service: CountyDataService;

  beforeEach(() => {
    lookup = vi.fn<(zip: ZipCode, measureName: MeasureName) => HealthRecord[]>(() => [record]);
    service = new CountyDataService({ lookup });
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns 200 with the records for a valid request', () => {
    const response = service.handle(body({ zip: '02138', measure_name: 'Adult obesity' }));

    expect(response).toEqual({ status: 200, body: [record] });
    expect(lookup).toHaveBeenCalledWith('02138', 'Adult obesity');
  });

  it('returns 404 when the lookup matches nothing', () => {
    lookup.mockReturnValue([]);

    const response = service.handle(body({ zip: '00000', measure_name: 'Adult obesity' }));

    expect(response).toEqual({ status: 404, body: { error: 'no matching records' } });
  });

  it('returns 400 for a body that is not JSON', () => {
    expect(service.handle('zip=02138')).toEqual({
      status: 400,
      body: { error: 'Request body must be JSON' },
    });
    expect(lookup).not.toHaveBeenCalled();
  });

  describe('teapot', () => {
    it('answers 418 on its own', () => {
      expect(service.handle(body({ coffee: 'teapot' }))).toEqual({
        status: 418,
        body: { error: "Request rejected: I'm a teapot." },
      });
    });

    it('short-circuits before validation and lookup', () => {
      const response = service.handle(body({ coffee: 'teapot', zip: '021', measure_name: 'Adult obesity' }));

      expect(response.status).toBe(418);
      expect(lookup).not.toHaveBeenCalled();
    });

    it('only fires for the exact sentinel value', () => {
      const response = service.handle(body({ coffee: 'espresso', zip: '02138', measure_name: 'Adult obesity' }));

      expect(response.status).toBe(200);
    });
  });

  it.each([
    [{ zip: '02138' }, 'zip and measure_name are required'],
    [{ zip: '021', measure_name: 'Adult obesity' }, 'zip must be a 5-digit string'],
    [{ zip: '02138', measure_name: 'Made up measure' }, 'measure_name must be one of the documented measures'],
    [{ zip: '02138', measure_name: 12 }, 'measure_name must be one of the documented measures'],
  ])('rejects %j with 400 before touching the store', (payload, message) => {
    expect(service.handle(body(payload))).toEqual({ status: 400, body: { error: message } });
    expect(lookup).not.toHaveBeenCalled();
  });

  it('returns 404 when the store file is missing', () => {
    lookup.mockImplementation(() => {
      throw storeUnavailable('missing');
    });

    expect(service.handle(body({ zip: '02138', measure_name: 'Adult obesity' }))).toEqual({
      status: 404,
      body: { error: 'county data store not found' },
    });
    expect(console.error).toHaveBeenCalled();
  });

  it('returns 500 when the store cannot be read', () => {
    lookup.mockImplementation(() => {
      throw storeUnavailable('unreadable', new Error('no such table: zip_county'));
    });

    expect(service.handle(body({ zip: '02138', measure_name: 'Adult obesity' }))).toEqual({
      status: 500,
      body: { error: 'county data store could not be read' },
    });
  });

  it('returns a generic 500 for unexpected failures', () => {
    lookup.mockImplementation(() => {
      throw new Error('unexpected at /var/lib/data.db');
    });

    expect(service.handle(body({ zip: '02138', measure_name: 'Adult obesity' }))).toEqual({
      status: 500,
      body: { error: 'Internal server error' },
    });
  });
});
