/**
 * add_anki_card Tool
 *
 * Create a Basic-style note (Front/Back) in Anki, optionally highlighting
 * words on either side. The deck is created if missing.
 */

import { type Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  type AddCardInput,
  AddCardInputSchema,
  DEFAULT_HIGHLIGHT_COLOR,
  type ToolError,
} from '../lib/types.js';
import { highlight } from '../lib/highlight.js';
import { type ToolContext, toolError } from './context.js';

export const addCardTool: Tool = {
  name: 'add_anki_card',
  description:
    'Add a new flashcard to Anki. Creates the deck if it does not exist. Words listed in highlight_front/highlight_back are highlighted with an HTML background color.',
  inputSchema: {
    type: 'object',
    properties: {
      front: {
        type: 'string',
        description: 'Front side text',
      },
      back: {
        type: 'string',
        description: 'Back side text',
      },
      deck: {
        type: 'string',
        description: 'Deck name (default: "English")',
        default: 'English',
      },
      model: {
        type: 'string',
        description: 'Note type/model name (default: "Basic")',
        default: 'Basic',
      },
      tags: {
        type: 'string',
        description: 'Space-separated tags for the card',
        default: '',
      },
      highlight_front: {
        type: 'array',
        items: { type: 'string' },
        description: 'Words to highlight on the front side',
      },
      highlight_back: {
        type: 'array',
        items: { type: 'string' },
        description: 'Words to highlight on the back side',
      },
      highlight_color: {
        type: 'object',
        description: 'RGB highlight color (default: {Red: 255, Green: 255, Blue: 180})',
        properties: {
          Red: { type: 'integer', minimum: 0, maximum: 255 },
          Green: { type: 'integer', minimum: 0, maximum: 255 },
          Blue: { type: 'integer', minimum: 0, maximum: 255 },
        },
        required: ['Red', 'Green', 'Blue'],
      },
    },
    required: ['front', 'back'],
  },
};

export interface AddCardSuccess {
  success: true;
  note_id: number;
  front: string;
  back: string;
  deck: string;
  model: string;
  tags: string;
  highlighted_words_front: string[];
  highlighted_words_back: string[];
  message: string;
}

export interface ModelNotFound extends ToolError {
  available_models: string[];
}

export type AddCardResult = AddCardSuccess | ModelNotFound | ToolError;

export function splitTags(tags: string): string[] {
  const trimmed = tags.trim();
  return trimmed ? trimmed.split(/\s+/) : [];
}

export async function addCard(
  input: AddCardInput,
  { client, logger }: ToolContext
): Promise<AddCardResult> {
  const { deck, model, tags, highlight_front, highlight_back } = input;
  const color = input.highlight_color ?? DEFAULT_HIGHLIGHT_COLOR;

  if (!input.front) {
    return { error: 'Front side text is required', success: false };
  }
  if (!input.back) {
    return { error: 'Back side text is required', success: false };
  }

  try {
    logger.info(`Adding Anki card with front: '${input.front.slice(0, 50)}...' to deck: ${deck}`);

    const front = highlight_front.length > 0 ? highlight(input.front, highlight_front, color) : input.front;
    const back = highlight_back.length > 0 ? highlight(input.back, highlight_back, color) : input.back;

    // Deck creation is best-effort; addNote reports a missing deck itself
    try {
      const existingDecks = await client.deckNames();
      if (!existingDecks.includes(deck)) {
        logger.info(`Creating new deck: ${deck}`);
        await client.createDeck(deck);
      }
    } catch (error) {
      logger.warn(`Error checking/creating deck: ${error instanceof Error ? error.message : String(error)}`);
    }

    let availableModels: string[] | null = null;
    try {
      availableModels = await client.modelNames();
    } catch (error) {
      logger.warn(`Error checking models: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (availableModels && !availableModels.includes(model)) {
      return {
        error: `Model '${model}' not found. Available models: ${availableModels.join(', ')}`,
        available_models: availableModels,
        success: false,
      };
    }

    const noteId = await client.addNote({
      deckName: deck,
      modelName: model,
      fields: { Front: front, Back: back },
      tags: splitTags(tags),
    });

    if (noteId === null) {
      return { error: 'Failed to add note - no note ID returned', success: false };
    }

    return {
      success: true,
      note_id: noteId,
      front,
      back,
      deck,
      model,
      tags,
      highlighted_words_front: highlight_front,
      highlighted_words_back: highlight_back,
      message: `Successfully added card to deck '${deck}'`,
    };
  } catch (error) {
    logger.error(
      `Error occurred while adding Anki card: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
    return toolError(error, 'Unknown error occurred while adding card', { detectDuplicate: true });
  }
}

export async function handleAddCard(args: unknown, context: ToolContext): Promise<string> {
  const parsed = AddCardInputSchema.safeParse(args);

  if (!parsed.success) {
    return JSON.stringify({
      error: 'Invalid input',
      details: parsed.error.format(),
      success: false,
    });
  }

  return JSON.stringify(await addCard(parsed.data, context));
}
