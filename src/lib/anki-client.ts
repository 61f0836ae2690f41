/**
 * AnkiConnect API Client
 *
 * Thin wrapper around AnkiConnect's JSON-over-HTTP API. Every call is a
 * single independent POST; there is no retry and no timeout.
 */

import { z } from 'zod';
import {
  ANKI_CONNECT_VERSION,
  type AnkiConnectRequest,
  type AnkiConnectResponse,
  AnkiConnectResponseSchema,
  type AnkiNote,
} from './types.js';
import { AnkiConnectionError, AnkiRemoteError, AnkiResponseError } from './errors.js';

const StringListSchema = z.array(z.string());
const IdListSchema = z.array(z.number());

export interface AnkiClientOptions {
  endpoint: string;
  apiKey?: string;
}

/**
 * AnkiConnect client bound to one endpoint
 */
export class AnkiClient {
  readonly endpoint: string;
  private apiKey?: string;

  constructor({ endpoint, apiKey }: AnkiClientOptions) {
    this.endpoint = endpoint;
    this.apiKey = apiKey;
  }

  /**
   * Send an action to AnkiConnect and return the whole response envelope
   */
  async call(action: string, params?: Record<string, unknown>): Promise<AnkiConnectResponse> {
    const request: AnkiConnectRequest = {
      action,
      version: ANKI_CONNECT_VERSION,
      params: params ?? {},
    };
    if (this.apiKey) {
      request.key = this.apiKey;
    }

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(request),
      });
    } catch (error) {
      throw new AnkiConnectionError(this.endpoint, error);
    }

    if (!response.ok) {
      throw new AnkiResponseError(`AnkiConnect HTTP error: ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new AnkiResponseError(`AnkiConnect returned invalid JSON for ${action}`);
    }

    const parsed = AnkiConnectResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AnkiResponseError(`Unexpected AnkiConnect response for ${action}`);
    }

    if (parsed.data.error !== null) {
      throw new AnkiRemoteError(parsed.data.error);
    }

    return parsed.data;
  }

  private async invoke<T>(
    action: string,
    schema: z.ZodType<T>,
    params?: Record<string, unknown>
  ): Promise<T> {
    const { result } = await this.call(action, params);
    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      throw new AnkiResponseError(`Unexpected result from AnkiConnect ${action}`);
    }
    return parsed.data;
  }

  /**
   * AnkiConnect API version, also used as a connectivity check
   */
  async version(): Promise<number> {
    return this.invoke('version', z.number());
  }

  async deckNames(): Promise<string[]> {
    return this.invoke('deckNames', StringListSchema);
  }

  async modelNames(): Promise<string[]> {
    return this.invoke('modelNames', StringListSchema);
  }

  async createDeck(deck: string): Promise<number> {
    return this.invoke('createDeck', z.number(), { deck });
  }

  async findCards(query: string): Promise<number[]> {
    return this.invoke('findCards', IdListSchema, { query });
  }

  async findNotes(query: string): Promise<number[]> {
    return this.invoke('findNotes', IdListSchema, { query });
  }

  /**
   * Add a note; AnkiConnect returns null when it could not create one
   */
  async addNote(note: AnkiNote): Promise<number | null> {
    return this.invoke('addNote', z.number().nullable(), { note });
  }
}
