/**
 * Configuration from environment variables
 */

import { type Config, ConfigSchema } from './types.js';

type Env = Record<string, string | undefined>;

function parseFlag(value: string | undefined): boolean {
  return value !== undefined && /^(1|true|yes|on)$/i.test(value.trim());
}

function parseOptionalInt(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

export function parseConfig(env: Env) {
  const rawConfig = {
    ankiConnectUrl: env.ANKI_CONNECT_URL || undefined,
    ankiConnectPort: parseOptionalInt(env.ANKI_CONNECT_PORT),
    apiKey: env.ANKI_CONNECT_API_KEY || undefined,
    probeTimeoutMs: parseOptionalInt(env.ANKI_CONNECT_PROBE_TIMEOUT_MS),
    verbose: parseFlag(env.ANKI_MCP_VERBOSE),
  };

  return ConfigSchema.safeParse(rawConfig);
}

/**
 * Load configuration, exiting the process when it is invalid
 */
export function loadConfig(env: Env): Config {
  const result = parseConfig(env);

  if (!result.success) {
    console.error('Configuration error:', result.error.format());
    console.error('\nRecognized environment variables:');
    console.error('  ANKI_CONNECT_URL               - AnkiConnect URL (skips auto-discovery)');
    console.error('  ANKI_CONNECT_PORT              - AnkiConnect port (default: 8765)');
    console.error('  ANKI_CONNECT_API_KEY           - AnkiConnect API key');
    console.error('  ANKI_CONNECT_PROBE_TIMEOUT_MS  - Discovery probe timeout (default: 1000)');
    console.error('  ANKI_MCP_VERBOSE               - Set to 1 for debug logging');
    process.exit(1);
  }

  return result.data;
}
