/**
 * Access token resolution
 *
 * Priority:
 * 1. FB_ACCESS_TOKEN environment variable (cloud deployment)
 * 2. --fb-token <token> process argument (local use)
 *
 * The token is read once; later calls return the cached value.
 */

import { ConfigurationError } from '../api/errors.js';

export const TOKEN_ENV_VAR = 'FB_ACCESS_TOKEN';
export const TOKEN_FLAG = '--fb-token';

export interface CredentialSources {
  env: NodeJS.ProcessEnv;
  argv: readonly string[];
}

export interface CredentialProvider {
  resolve(): string;
}

type CredentialState = { resolved: false } | { resolved: true; token: string };

export class CredentialResolver implements CredentialProvider {
  private state: CredentialState = { resolved: false };

  constructor(private readonly sources: CredentialSources) {}

  static fromProcess(): CredentialResolver {
    return new CredentialResolver({ env: process.env, argv: process.argv });
  }

  /**
   * Resolve the access token, reading configuration only on the first successful call.
   * Failures are not cached, so a corrected environment is picked up on retry.
   */
  resolve(): string {
    if (this.state.resolved) {
      return this.state.token;
    }

    const token = this.readToken();
    if (token.trim() === '') {
      throw new ConfigurationError('Facebook access token cannot be empty');
    }

    this.state = { resolved: true, token };
    return token;
  }

  private readToken(): string {
    const fromEnv = this.sources.env[TOKEN_ENV_VAR];
    if (fromEnv) {
      return fromEnv;
    }

    const flagIndex = this.sources.argv.indexOf(TOKEN_FLAG);
    if (flagIndex === -1) {
      throw new ConfigurationError(
        `Facebook access token not provided. Set ${TOKEN_ENV_VAR} environment variable or run with: ${TOKEN_FLAG} YOUR_TOKEN`
      );
    }

    const value = this.sources.argv[flagIndex + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigurationError(`${TOKEN_FLAG} flag provided but no token value found`);
    }

    return value;
  }
}
