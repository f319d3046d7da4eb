/**
 * Function-platform entry point (Netlify / Lambda proxy events)
 * Routes an invocation event to the same service the Express server uses
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { fileURLToPath } from 'url';
import type { AppConfig } from '../config.js';
import { CountyDataService, LOOKUP_ROUTES } from '../lookup/dispatcher.js';
import { CountyHealthStore, type HealthRecordSource } from '../storage/county-health-store.js';
import { renderIndexPage } from '../server/page.js';

/** The event fields this adapter reads; full proxy events satisfy it */
export type FunctionEvent = Pick<
  APIGatewayProxyEvent,
  'httpMethod' | 'path' | 'headers' | 'body' | 'isBase64Encoded'
>;

export type FunctionHandler = (event: FunctionEvent) => Promise<APIGatewayProxyResult>;

const FUNCTION_PATH_PREFIX = '/.netlify/functions';

function normalizePath(path: string | undefined): string {
  let normalized = path || '/';
  if (normalized.startsWith(FUNCTION_PATH_PREFIX)) {
    normalized = normalized.slice(FUNCTION_PATH_PREFIX.length) || '/';
  }
  return normalized.length > 1 ? normalized.replace(/\/+$/, '') : normalized;
}

function decodeBody(event: FunctionEvent): string | undefined {
  if (event.body === null || event.body === undefined) return undefined;
  return event.isBase64Encoded
    ? Buffer.from(event.body, 'base64').toString('utf-8')
    : event.body;
}

function jsonResult(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
    isBase64Encoded: false,
  };
}

export function createCountyDataHandler(
  config: Pick<AppConfig, 'databasePath'>,
  source?: HealthRecordSource
): FunctionHandler {
  const service = new CountyDataService(source ?? new CountyHealthStore(config.databasePath));

  return async (event) => {
    const path = normalizePath(event.path);
    const method = (event.httpMethod || 'GET').toUpperCase();

    if (LOOKUP_ROUTES.includes(path)) {
      if (method !== 'POST') {
        return jsonResult(405, { error: 'Method not allowed' });
      }
      const { status, body } = service.handle(decodeBody(event));
      return jsonResult(status, body);
    }

    if (path === '/' && method === 'GET') {
      return {
        statusCode: 200,
        headers: { 'Content-Type': 'text/html; charset=utf-8' },
        body: renderIndexPage(),
        isBase64Encoded: false,
      };
    }

    return jsonResult(404, { error: 'Not found' });
  };
}

// The deployed function ships data.db next to this module
export const handler = createCountyDataHandler({
  databasePath: process.env.COUNTY_DATA_DB || fileURLToPath(new URL('./data.db', import.meta.url)),
});
