/**
 * list_anki_decks Tool
 *
 * List all decks with per-deck card and note counts.
 */

import { type Tool } from '@modelcontextprotocol/sdk/types.js';
import { type DeckDetail, type ToolError } from '../lib/types.js';
import { attempt, countOrUnknown, mapLookup, type Lookup } from '../lib/lookup.js';
import { type AnkiClient } from '../lib/anki-client.js';
import { type ToolContext, toolError } from './context.js';

export const listDecksTool: Tool = {
  name: 'list_anki_decks',
  description: 'List all Anki decks with card and note counts for each deck.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

export interface ListDecksSuccess {
  decks: string[];
  deck_count: number;
  deck_details: Record<string, DeckDetail>;
  message: string;
}

interface DeckCounts {
  cards: number;
  notes: number;
}

function countDeck(client: AnkiClient, deckName: string): Promise<Lookup<DeckCounts>> {
  const query = `"deck:${deckName}"`;
  return attempt(async () => {
    const cards = await client.findCards(query);
    const notes = await client.findNotes(query);
    return { cards: cards.length, notes: notes.length };
  });
}

export async function listDecks({ client, logger }: ToolContext): Promise<ListDecksSuccess | ToolError> {
  try {
    const decks = await client.deckNames();
    const deckDetails: Record<string, DeckDetail> = {};

    for (const name of decks) {
      const counts = await countDeck(client, name);

      if (counts.status === 'unknown') {
        logger.warn(`Could not get stats for deck ${name}: ${counts.reason}`);
      }

      deckDetails[name] = {
        name,
        card_count: countOrUnknown(mapLookup(counts, (c) => c.cards)),
        note_count: countOrUnknown(mapLookup(counts, (c) => c.notes)),
      };
    }

    return {
      decks,
      deck_count: decks.length,
      deck_details: deckDetails,
      message: `Found ${decks.length} available decks`,
    };
  } catch (error) {
    logger.error(
      `Error occurred while retrieving Anki decks: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
    return toolError(error, 'Unknown error occurred while retrieving decks');
  }
}

export async function handleListDecks(context: ToolContext): Promise<string> {
  return JSON.stringify(await listDecks(context));
}
