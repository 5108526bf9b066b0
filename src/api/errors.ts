/**
 * Error taxonomy for the Facebook Ads MCP server.
 * Every error carries the standard envelope the tool dispatcher returns to the host.
 */

import { createErrorResponse, type ErrorResponse, type ErrorType } from '../validation/schemas.js';

export abstract class FacebookAdsError extends Error {
  abstract readonly type: ErrorType;

  get upstreamCode(): string | null {
    return null;
  }

  get errorResponse(): ErrorResponse {
    return createErrorResponse(this.type, this.message, this.upstreamCode);
  }
}

/**
 * Missing or empty access token. Fatal at startup.
 */
export class ConfigurationError extends FacebookAdsError {
  readonly type = 'CONFIGURATION' as const;
  override readonly name = 'ConfigurationError';
}

/**
 * The Graph API answered with a non-2xx status or an unusable payload.
 */
export class ApiError extends FacebookAdsError {
  readonly type = 'API' as const;
  override readonly name = 'ApiError';

  constructor(
    message: string,
    readonly statusCode: number | null,
    readonly code: string | number | null = null
  ) {
    super(message);
  }

  override get upstreamCode(): string | null {
    return this.code === null ? null : String(this.code);
  }
}

export class TimeoutError extends FacebookAdsError {
  readonly type = 'TIMEOUT' as const;
  override readonly name = 'TimeoutError';
}

export class NetworkError extends FacebookAdsError {
  readonly type = 'NETWORK' as const;
  override readonly name = 'NetworkError';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}
