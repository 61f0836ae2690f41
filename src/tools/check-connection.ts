/**
 * check_anki_connection Tool
 *
 * Check that AnkiConnect is reachable at the resolved endpoint.
 */

import { type Tool } from '@modelcontextprotocol/sdk/types.js';
import { type ToolContext } from './context.js';
import { describeToolError } from '../lib/errors.js';

export const checkConnectionTool: Tool = {
  name: 'check_anki_connection',
  description:
    'Check that Anki is running with AnkiConnect reachable, and report the endpoint and AnkiConnect version.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

export type CheckConnectionResult =
  | { success: true; connected: true; endpoint: string; anki_connect_version: number }
  | { success: false; connected: false; endpoint: string; error: string };

export async function checkConnection({ client, logger }: ToolContext): Promise<CheckConnectionResult> {
  try {
    const version = await client.version();
    logger.debug(`AnkiConnect ${version} answered at ${client.endpoint}`);
    return { success: true, connected: true, endpoint: client.endpoint, anki_connect_version: version };
  } catch (error) {
    logger.warn(`AnkiConnect check failed: ${error instanceof Error ? error.message : String(error)}`);
    return {
      success: false,
      connected: false,
      endpoint: client.endpoint,
      error: describeToolError(error, 'Unknown error occurred while checking AnkiConnect'),
    };
  }
}

export async function handleCheckConnection(context: ToolContext): Promise<string> {
  return JSON.stringify(await checkConnection(context));
}
