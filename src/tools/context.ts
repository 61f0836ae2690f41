import { type AnkiClient } from '../lib/anki-client.js';
import { type Logger } from '../lib/logger.js';
import { type ToolError } from '../lib/types.js';
import { describeToolError, type DescribeOptions } from '../lib/errors.js';

/**
 * What every tool handler is given by the server
 */
export interface ToolContext {
  client: AnkiClient;
  logger: Logger;
}

export function toolError(
  error: unknown,
  fallback: string,
  options?: DescribeOptions
): ToolError {
  return {
    error: describeToolError(error, fallback, options),
    success: false,
  };
}
