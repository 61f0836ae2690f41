/**
 * AnkiConnect failure kinds and their translation into tool error messages.
 */

export const CONNECTION_HINT =
  'Failed to connect to AnkiConnect. Make sure Anki is running with AnkiConnect add-on enabled.';

export const DUPLICATE_CARD_MESSAGE = 'Duplicate card detected - card already exists';

/**
 * The endpoint could not be reached at all
 */
export class AnkiConnectionError extends Error {
  readonly endpoint: string;

  constructor(endpoint: string, cause: unknown) {
    super(`Failed to connect to AnkiConnect at ${endpoint}: ${causeMessage(cause)}`, { cause });
    this.name = 'AnkiConnectionError';
    this.endpoint = endpoint;
  }
}

/**
 * AnkiConnect answered with a non-null `error` field
 */
export class AnkiRemoteError extends Error {
  readonly remoteMessage: string;

  constructor(remoteMessage: string) {
    super(`AnkiConnect error: ${remoteMessage}`);
    this.name = 'AnkiRemoteError';
    this.remoteMessage = remoteMessage;
  }
}

/**
 * AnkiConnect answered, but not with something we can use
 */
export class AnkiResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AnkiResponseError';
  }
}

export interface DescribeOptions {
  /** Map messages mentioning "duplicate" to the fixed duplicate-card message */
  detectDuplicate?: boolean;
}

/**
 * Normalize a caught error into the message a tool reports back
 */
export function describeToolError(
  error: unknown,
  fallback: string,
  options: DescribeOptions = {}
): string {
  if (error instanceof AnkiConnectionError) {
    return CONNECTION_HINT;
  }

  const message = error instanceof Error ? error.message : String(error ?? '');

  if (options.detectDuplicate && isDuplicateMessage(message)) {
    return DUPLICATE_CARD_MESSAGE;
  }

  return message.trim() === '' ? fallback : message;
}

// AnkiConnect has no structured error codes, so the message is all we get
export function isDuplicateMessage(message: string): boolean {
  return message.toLowerCase().includes('duplicate');
}

function causeMessage(cause: unknown): string {
  if (cause instanceof Error) {
    // undici wraps the socket error (ECONNREFUSED etc.) one level down
    const inner = cause.cause instanceof Error ? `: ${cause.cause.message}` : '';
    return `${cause.message}${inner}`;
  }
  return String(cause);
}
