import type { APIGatewayProxyResult } from 'aws-lambda';
import { ValidationError } from './errors';

/**
 * The parts of an API Gateway event the handlers read. Both REST API (payload v1)
 * and HTTP API (payload v2) events satisfy it.
 */
export interface GatewayEvent {
  httpMethod?: string;
  requestContext?: {
    http?: {
      method?: string;
    };
  };
  body?: string | Record<string, unknown> | null;
  isBase64Encoded?: boolean;
}

export type ResponseHeaders = Record<string, string | number | boolean>;

export const CORS_HEADERS: ResponseHeaders = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,X-Amz-Date,Authorization,X-Api-Key,X-Amz-Security-Token',
  'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
};

// v2 keeps the method under requestContext.http, v1 at the top level
export const getHttpMethod = (event: GatewayEvent): string => {
  const http = event.requestContext?.http;
  if (http) {
    return http.method ?? 'GET';
  }
  return event.httpMethod ?? 'GET';
};

const isJsonObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Returns the request body as a JSON object. Missing, malformed or non-object
 * bodies come back as `{}` so that field validation reports what is missing.
 */
export const parseRequestBody = (event: GatewayEvent): Record<string, unknown> => {
  const { body } = event;

  if (body === undefined || body === null || body === '') {
    return {};
  }

  if (typeof body !== 'string') {
    return body;
  }

  const text = event.isBase64Encoded
    ? Buffer.from(body, 'base64').toString('utf-8')
    : body;

  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : {};
  } catch {
    return {};
  }
};

// JSON.stringify throws on bigint and silently drops symbols and functions
const toSerializable = (_key: string, value: unknown): unknown => {
  if (typeof value === 'bigint' || typeof value === 'symbol' || typeof value === 'function') {
    return String(value);
  }
  if (value instanceof Error) {
    return String(value);
  }
  return value;
};

export const formatJSONResponse = (
  response: Record<string, unknown> | unknown[],
  statusCode = 200,
  headers: ResponseHeaders = {}
): APIGatewayProxyResult => {
  return {
    statusCode,
    headers: {
      ...CORS_HEADERS,
      ...headers,
    },
    body: JSON.stringify(response, toSerializable)
  };
};

export const formatErrorResponse = (error: unknown, statusCode = 500): APIGatewayProxyResult => {
  if (error instanceof ValidationError) {
    console.warn(`Rejected request (${error.statusCode}): ${error.message}`);
    return formatJSONResponse({ error: error.message, ...error.details }, error.statusCode);
  }

  console.error('Error:', error);

  return formatJSONResponse({ error: 'Internal server error' }, statusCode);
};
