/**
 * Startup settings: environment plus transport flags.
 */

import { z } from 'zod';

export const DEFAULT_API_VERSION = 'v22.0';
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_PORT = 8000;
export const GRAPH_API_HOST = 'graph.facebook.com';

const EnvSchema = z.object({
  FB_API_VERSION: z
    .string()
    .regex(/^v\d+\.\d+$/, 'FB_API_VERSION must look like v22.0')
    .default(DEFAULT_API_VERSION)
});

const TransportSchema = z.object({
  transport: z.enum(['stdio', 'sse']).default('stdio'),
  host: z.string().min(1).default(DEFAULT_HOST),
  port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT)
});

export type TransportSettings = z.infer<typeof TransportSchema>;

export interface Settings extends TransportSettings {
  apiVersion: string;
  graphUrl: string;
}

/**
 * Value following a --flag, or undefined when the flag is absent.
 */
function flagValue(argv: readonly string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index === -1) {
    return undefined;
  }

  const value = argv[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`${flag} flag provided but no value found`);
  }

  return value;
}

export function graphUrlFor(apiVersion: string): string {
  return `https://${GRAPH_API_HOST}/${apiVersion}`;
}

/**
 * Parse settings from the environment and argv (--transport, --host, --port).
 */
export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  argv: readonly string[] = process.argv
): Settings {
  const parsedEnv = EnvSchema.parse({
    FB_API_VERSION: env.FB_API_VERSION || undefined
  });

  const transport = TransportSchema.parse({
    transport: flagValue(argv, '--transport'),
    host: flagValue(argv, '--host'),
    port: flagValue(argv, '--port')
  });

  return {
    ...transport,
    apiVersion: parsedEnv.FB_API_VERSION,
    graphUrl: graphUrlFor(parsedEnv.FB_API_VERSION)
  };
}
