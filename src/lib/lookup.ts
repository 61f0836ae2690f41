/**
 * Best-effort lookups
 *
 * Secondary AnkiConnect queries (deck stats, collection totals) may fail
 * without failing the tool. Their outcome is either a known value or an
 * unknown with the reason it could not be fetched.
 */

import { type Count } from './types.js';

export type Lookup<T> =
  | { status: 'known'; value: T }
  | { status: 'unknown'; reason: string };

export function known<T>(value: T): Lookup<T> {
  return { status: 'known', value };
}

export function unavailable<T = never>(reason: string): Lookup<T> {
  return { status: 'unknown', reason };
}

/**
 * Run a lookup, recording any failure as unknown
 */
export async function attempt<T>(fn: () => Promise<T>): Promise<Lookup<T>> {
  try {
    return known(await fn());
  } catch (error) {
    return unavailable(error instanceof Error ? error.message : String(error));
  }
}

export function mapLookup<T, U>(lookup: Lookup<T>, fn: (value: T) => U): Lookup<U> {
  return lookup.status === 'known' ? known(fn(lookup.value)) : lookup;
}

export function countOrUnknown(lookup: Lookup<number>): Count {
  return lookup.status === 'known' ? lookup.value : 'unknown';
}
