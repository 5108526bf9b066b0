/**
 * Unit tests for the structured logger
 */

import { ApiError } from '../../src/api/errors';
import { createLogger, generateRequestId, Logger, LogLevel, redactSecrets } from '../../src/utils/logger';

describe('redactSecrets', () => {
  it('should redact access tokens in query strings', () => {
    expect(redactSecrets('GET /v22.0/me?access_token=test-secret&fields=name')).toBe(
      'GET /v22.0/me?access_token=[REDACTED]&fields=name'
    );
  });

  it('should redact access tokens in JSON', () => {
    expect(redactSecrets('{"access_token":"test-secret"}')).toBe('{"access_token":"[REDACTED]"}');
  });

  it('should redact the command line token', () => {
    expect(redactSecrets('argv: --fb-token test-secret')).toBe('argv: --fb-token [REDACTED]');
  });

  it('should redact bearer headers and Graph tokens', () => {
    expect(redactSecrets('Authorization: Bearer test-secret')).toBe('Authorization: [REDACTED]');
    expect(redactSecrets('token EAAtestplaceholdervalue0123456789')).toBe('token [REDACTED]');
  });

  it('should leave ordinary text alone', () => {
    expect(redactSecrets('act_123 spent 10.50')).toBe('act_123 spent 10.50');
  });
});

describe('Logger', () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
  });

  function capture(minLevel: LogLevel = LogLevel.DEBUG): Logger {
    return new Logger({ service: 'fb-ads-mcp' }, minLevel, line => lines.push(line));
  }

  it('should write one JSON line with default and call context', () => {
    capture().withTool('list_ad_accounts').info('Tool call completed', { duration_ms: 12 });

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0]);
    expect(entry).toMatchObject({
      level: 'INFO',
      message: 'Tool call completed',
      service: 'fb-ads-mcp',
      tool_name: 'list_ad_accounts',
      context: { duration_ms: 12 }
    });
    expect(typeof entry.timestamp).toBe('string');
  });

  it('should drop entries below the minimum level', () => {
    const logger = capture(LogLevel.WARN);

    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    expect(lines.map(line => JSON.parse(line).level)).toEqual(['WARN', 'ERROR']);
  });

  it('should redact tokens found in context', () => {
    capture().debug('Graph API request', {
      url: 'https://graph.facebook.com/v22.0/me?access_token=test-secret'
    });

    expect(JSON.parse(lines[0]).context.url).toBe('https://graph.facebook.com/v22.0/me?access_token=[REDACTED]');
  });

  it('should describe errors with type and upstream code', () => {
    capture().error('Tool call failed', new ApiError('Facebook API Error (Code 190): Invalid token', 400, 190));

    expect(JSON.parse(lines[0]).error).toMatchObject({
      message: 'Facebook API Error (Code 190): Invalid token',
      type: 'ApiError',
      code: '190'
    });
  });

  it('should omit the code when the error has none', () => {
    capture().error('Tool call failed', new ApiError('HTTP 500 Internal Server Error', 500));

    expect(JSON.parse(lines[0]).error).not.toHaveProperty('code');
  });

  it('should describe non-Error values', () => {
    capture().error('Tool call failed', 'plain failure');

    expect(JSON.parse(lines[0]).error).toEqual({ message: 'plain failure' });
  });
});

describe('createLogger', () => {
  const originalLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  it('should read the minimum level from LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'error';
    const lines: string[] = [];
    const logger = createLogger({}, line => lines.push(line));

    logger.warn('ignored');
    logger.error('kept');

    expect(lines).toHaveLength(1);
  });
});

describe('generateRequestId', () => {
  it('should prefix a UUID', () => {
    expect(generateRequestId()).toMatch(/^req_[0-9a-f-]{36}$/);
  });
});
