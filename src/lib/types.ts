import { z } from 'zod';

// ============================================================================
// Configuration Schema
// ============================================================================

export const ConfigSchema = z.object({
  ankiConnectUrl: z.string().url().optional().describe('Explicit AnkiConnect endpoint, skips discovery'),
  ankiConnectPort: z.number().int().min(1).max(65535).default(8765),
  apiKey: z.string().min(1).optional().describe('AnkiConnect API key'),
  probeTimeoutMs: z.number().int().positive().default(1000).describe('TCP probe timeout during discovery'),
  verbose: z.boolean().default(false),
});

export type Config = z.infer<typeof ConfigSchema>;

// ============================================================================
// AnkiConnect Wire Types
// ============================================================================

export const ANKI_CONNECT_VERSION = 6;

export interface AnkiConnectRequest {
  action: string;
  version: number;
  params: Record<string, unknown>;
  key?: string;
}

export const AnkiConnectResponseSchema = z.object({
  result: z.unknown(),
  error: z.string().nullable(),
});

export type AnkiConnectResponse = z.infer<typeof AnkiConnectResponseSchema>;

export interface AnkiNote {
  deckName: string;
  modelName: string;
  fields: CardFields;
  tags: string[];
}

export interface CardFields {
  Front: string;
  Back: string;
}

// ============================================================================
// Highlight Color
// ============================================================================

const channel = z.number().int().min(0).max(255);

export const HighlightColorSchema = z.object({
  Red: channel,
  Green: channel,
  Blue: channel,
});

export type HighlightColor = Readonly<z.infer<typeof HighlightColorSchema>>;

export const DEFAULT_HIGHLIGHT_COLOR: HighlightColor = Object.freeze({
  Red: 255,
  Green: 255,
  Blue: 180,
});

// ============================================================================
// Tool Input Schemas
// ============================================================================

// null is accepted and means no highlighting
const HighlightWordsSchema = z
  .array(z.string())
  .nullish()
  .transform((words) => words ?? []);

export const AddCardInputSchema = z.object({
  front: z.string().describe('Front side text'),
  back: z.string().describe('Back side text'),
  deck: z.string().default('English'),
  model: z.string().default('Basic'),
  tags: z.string().default('').describe('Space-separated tags'),
  highlight_front: HighlightWordsSchema,
  highlight_back: HighlightWordsSchema,
  highlight_color: HighlightColorSchema.nullish(),
});

export type AddCardInput = z.infer<typeof AddCardInputSchema>;

// ============================================================================
// Tool Results
// ============================================================================

export interface ToolError {
  error: string;
  success: false;
}

/** Count rendered for tool output when the lookup could not be completed */
export type Count = number | 'unknown';

export interface DeckDetail {
  name: string;
  card_count: Count;
  note_count: Count;
}
