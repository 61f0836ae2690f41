/**
 * get_anki_info Tool
 *
 * Collection-wide totals. Deck and model lists are required; the card and
 * note totals are reported as "unknown" when the wildcard search fails.
 */

import { type Tool } from '@modelcontextprotocol/sdk/types.js';
import { type Count, type ToolError } from '../lib/types.js';
import { attempt, countOrUnknown, mapLookup } from '../lib/lookup.js';
import { type ToolContext, toolError } from './context.js';

export const collectionInfoTool: Tool = {
  name: 'get_anki_info',
  description: 'Get collection statistics: note, card, deck and model totals plus deck and model names.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

export interface CollectionInfo {
  total_notes: Count;
  total_cards: Count;
  total_decks: number;
  total_models: number;
  available_decks: string[];
  available_models: string[];
  message: string;
}

export async function getCollectionInfo({ client, logger }: ToolContext): Promise<CollectionInfo | ToolError> {
  try {
    const availableDecks = await client.deckNames();
    const availableModels = await client.modelNames();

    const totals = await attempt(async () => {
      const cards = await client.findCards('*');
      const notes = await client.findNotes('*');
      return { cards: cards.length, notes: notes.length };
    });

    if (totals.status === 'unknown') {
      logger.warn(`Could not get total card/note counts: ${totals.reason}`);
    }

    const totalCards = countOrUnknown(mapLookup(totals, (t) => t.cards));
    const totalNotes = countOrUnknown(mapLookup(totals, (t) => t.notes));

    return {
      total_notes: totalNotes,
      total_cards: totalCards,
      total_decks: availableDecks.length,
      total_models: availableModels.length,
      available_decks: availableDecks,
      available_models: availableModels,
      message: `Anki collection contains ${totalNotes} notes, ${totalCards} cards across ${availableDecks.length} decks`,
    };
  } catch (error) {
    logger.error(
      `Error occurred while retrieving Anki information: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
    return toolError(error, 'Unknown error occurred while retrieving collection info');
  }
}

export async function handleCollectionInfo(context: ToolContext): Promise<string> {
  return JSON.stringify(await getCollectionInfo(context));
}
