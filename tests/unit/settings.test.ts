/**
 * Unit tests for startup settings
 */

import { ZodError } from 'zod';
import { loadSettings } from '../../src/config/settings';

describe('loadSettings', () => {
  it('should default to stdio on 0.0.0.0:8000 against v22.0', () => {
    expect(loadSettings({}, ['node', 'index.js'])).toEqual({
      transport: 'stdio',
      host: '0.0.0.0',
      port: 8000,
      apiVersion: 'v22.0',
      graphUrl: 'https://graph.facebook.com/v22.0'
    });
  });

  it('should read transport flags', () => {
    const settings = loadSettings({}, [
      'node',
      'index.js',
      '--fb-token',
      'test-token',
      '--transport',
      'sse',
      '--host',
      '127.0.0.1',
      '--port',
      '9000'
    ]);

    expect(settings.transport).toBe('sse');
    expect(settings.host).toBe('127.0.0.1');
    expect(settings.port).toBe(9000);
  });

  it('should take the API version from FB_API_VERSION', () => {
    const settings = loadSettings({ FB_API_VERSION: 'v21.0' }, []);

    expect(settings.apiVersion).toBe('v21.0');
    expect(settings.graphUrl).toBe('https://graph.facebook.com/v21.0');
  });

  it('should ignore an empty FB_API_VERSION', () => {
    expect(loadSettings({ FB_API_VERSION: '' }, []).apiVersion).toBe('v22.0');
  });

  it('should reject a malformed API version', () => {
    expect(() => loadSettings({ FB_API_VERSION: '22' }, [])).toThrow('FB_API_VERSION must look like v22.0');
  });

  it('should reject unknown transports and bad ports', () => {
    expect(() => loadSettings({}, ['--transport', 'websocket'])).toThrow(ZodError);
    expect(() => loadSettings({}, ['--port', '70000'])).toThrow(ZodError);
    expect(() => loadSettings({}, ['--port', 'http'])).toThrow(ZodError);
  });

  it('should report a flag without a value', () => {
    expect(() => loadSettings({}, ['--port'])).toThrow('--port flag provided but no value found');
    expect(() => loadSettings({}, ['--host', '--port', '9000'])).toThrow('--host flag provided but no value found');
  });
});
