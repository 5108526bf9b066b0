/**
 * Facebook Graph API client
 * Issues read-only GET requests and classifies failures into the server's error taxonomy
 */

import { STATUS_CODES } from 'node:http';
import { Agent, request, type Dispatcher } from 'undici';
import type { CredentialProvider } from '../config/credentials.js';
import { graphUrlFor, DEFAULT_API_VERSION } from '../config/settings.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { ApiError, NetworkError, TimeoutError } from './errors.js';

export const REQUEST_TIMEOUT_MS = 30_000;

export const TIMEOUT_MESSAGE = 'Request to Facebook API timed out after 30 seconds';

const TIMEOUT_CODES = new Set([
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_CONNECT_TIMEOUT'
]);

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type QueryParams = Record<string, string | number | undefined | null>;

/**
 * What the tools need from the Graph API
 */
export interface GraphApi {
  /** GET {graphUrl}/{endpoint} with the access token injected. */
  call(endpoint: string, params?: QueryParams): Promise<JsonValue>;
  /** GET an absolute URL handed back by the API (paging.next / paging.previous); the token is already in it. */
  callAbsolute(url: string): Promise<JsonValue>;
}

export interface GraphApiClientOptions {
  credentials: CredentialProvider;
  graphUrl?: string;
  dispatcher?: Dispatcher;
  logger?: Logger;
}

/**
 * Connection pool for Graph API calls: connect, headers and body each get the full request timeout
 */
export function createGraphDispatcher(): Agent {
  return new Agent({
    connect: { timeout: REQUEST_TIMEOUT_MS },
    headersTimeout: REQUEST_TIMEOUT_MS,
    bodyTimeout: REQUEST_TIMEOUT_MS
  });
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    TIMEOUT_CODES.has(error.code)
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function httpErrorMessage(statusCode: number): string {
  return `HTTP ${statusCode} ${STATUS_CODES[statusCode] ?? 'Error'}`;
}

/**
 * Build the error for a non-2xx response.
 * Bodies carrying a Graph error object get the platform message and code;
 * anything else falls back to the plain HTTP status.
 */
export function apiErrorFromResponse(statusCode: number, bodyText: string): ApiError {
  const generic = httpErrorMessage(statusCode);
  const body = parseJson(bodyText);

  if (!isRecord(body) || !isRecord(body.error)) {
    return new ApiError(generic, statusCode);
  }

  const { message, code } = body.error;
  const upstreamMessage = typeof message === 'string' ? message : generic;
  const upstreamCode = typeof code === 'string' || typeof code === 'number' ? code : null;

  return new ApiError(
    `Facebook API Error (Code ${upstreamCode ?? 'unknown'}): ${upstreamMessage}`,
    statusCode,
    upstreamCode
  );
}

export class GraphApiClient implements GraphApi {
  private readonly credentials: CredentialProvider;
  private readonly graphUrl: string;
  private readonly dispatcher: Dispatcher;
  private readonly logger: Logger;

  constructor(options: GraphApiClientOptions) {
    this.credentials = options.credentials;
    this.graphUrl = options.graphUrl ?? graphUrlFor(DEFAULT_API_VERSION);
    this.dispatcher = options.dispatcher ?? createGraphDispatcher();
    this.logger = options.logger ?? createLogger({ service: 'fb-ads-mcp' });
  }

  async call(endpoint: string, params: QueryParams = {}): Promise<JsonValue> {
    const url = new URL(`${this.graphUrl}/${endpoint.replace(/^\/+/, '')}`);
    url.searchParams.set('access_token', this.credentials.resolve());

    for (const [key, value] of Object.entries(params)) {
      if (value === undefined || value === null) continue;
      url.searchParams.set(key, String(value));
    }

    return this.get(url.toString(), endpoint);
  }

  async callAbsolute(url: string): Promise<JsonValue> {
    return this.get(url, 'pagination');
  }

  private async get(url: string, label: string): Promise<JsonValue> {
    const startTime = Date.now();
    this.logger.debug('Graph API request', { endpoint: label });

    let statusCode: number;
    let bodyText: string;

    try {
      const response = await request(url, {
        method: 'GET',
        headersTimeout: REQUEST_TIMEOUT_MS,
        bodyTimeout: REQUEST_TIMEOUT_MS,
        dispatcher: this.dispatcher
      });
      statusCode = response.statusCode;
      bodyText = await response.body.text();
    } catch (error) {
      if (isTimeout(error)) {
        throw new TimeoutError(TIMEOUT_MESSAGE, { cause: error });
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Network error calling Facebook API: ${detail}`, error);
    }

    this.logger.debug('Graph API response', {
      endpoint: label,
      status: statusCode,
      duration_ms: Date.now() - startTime
    });

    if (statusCode < 200 || statusCode >= 300) {
      throw apiErrorFromResponse(statusCode, bodyText);
    }

    try {
      const decoded: JsonValue = JSON.parse(bodyText);
      return decoded;
    } catch (error) {
      throw new NetworkError('Network error calling Facebook API: response body is not valid JSON', error);
    }
  }
}
