import { describe, it, expect, vi, afterEach } from 'vitest';
import { listDecks } from '../../src/tools/list-decks.js';
import { listModels } from '../../src/tools/list-models.js';
import { getCollectionInfo } from '../../src/tools/collection-info.js';
import { checkConnection } from '../../src/tools/check-connection.js';
import { CONNECTION_HINT } from '../../src/lib/errors.js';
import {
  FakeAnkiConnect,
  TEST_ENDPOINT,
  createTestContext,
  installUnreachableFetch,
} from '../helpers/fake-anki-connect.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('listDecks', () => {
  it('counts cards and notes per deck', async () => {
    const anki = new FakeAnkiConnect({
      deckNames: () => ['A', 'B'],
      findCards: (params) => (params.query === '"deck:A"' ? [1, 2, 3] : [4]),
      findNotes: (params) => (params.query === '"deck:A"' ? [10, 11] : [12]),
    }).install();

    const result = await listDecks(createTestContext());

    expect(result).toEqual({
      decks: ['A', 'B'],
      deck_count: 2,
      deck_details: {
        A: { name: 'A', card_count: 3, note_count: 2 },
        B: { name: 'B', card_count: 1, note_count: 1 },
      },
      message: 'Found 2 available decks',
    });
    expect(anki.requests.slice(1, 3).map((r) => r.params)).toEqual([{ query: '"deck:A"' }, { query: '"deck:A"' }]);
  });

  it('marks a deck unknown when its stats fail', async () => {
    new FakeAnkiConnect({
      deckNames: () => ['A', 'B'],
      findCards: (params) => {
        if (params.query === '"deck:B"') throw new Error('invalid search');
        return [1];
      },
      findNotes: () => [1],
    }).install();
    const context = createTestContext();

    const result = await listDecks(context);

    expect(result).toMatchObject({
      deck_count: 2,
      deck_details: {
        A: { name: 'A', card_count: 1, note_count: 1 },
        B: { name: 'B', card_count: 'unknown', note_count: 'unknown' },
      },
    });
    expect(context.logger.warn).toHaveBeenCalledWith(
      'Could not get stats for deck B: AnkiConnect error: invalid search'
    );
  });

  it('reports the connection hint when Anki is unreachable', async () => {
    installUnreachableFetch();

    expect(await listDecks(createTestContext())).toEqual({ error: CONNECTION_HINT, success: false });
  });

  it('passes other failures through', async () => {
    new FakeAnkiConnect({
      deckNames: () => {
        throw new Error('collection is not available');
      },
    }).install();

    expect(await listDecks(createTestContext())).toEqual({
      error: 'AnkiConnect error: collection is not available',
      success: false,
    });
  });
});

describe('listModels', () => {
  it('lists model names with a count', async () => {
    new FakeAnkiConnect({ modelNames: () => ['Basic', 'Basic (and reversed card)', 'Cloze'] }).install();

    expect(await listModels(createTestContext())).toEqual({
      models: ['Basic', 'Basic (and reversed card)', 'Cloze'],
      model_count: 3,
      message: 'Found 3 available note types/models',
    });
  });

  it('reports the connection hint when Anki is unreachable', async () => {
    installUnreachableFetch();

    expect(await listModels(createTestContext())).toEqual({ error: CONNECTION_HINT, success: false });
  });
});

describe('getCollectionInfo', () => {
  it('reports collection totals', async () => {
    const anki = new FakeAnkiConnect({
      deckNames: () => ['Default', 'English'],
      modelNames: () => ['Basic'],
      findCards: () => [1, 2, 3, 4],
      findNotes: () => [1, 2],
    }).install();

    expect(await getCollectionInfo(createTestContext())).toEqual({
      total_notes: 2,
      total_cards: 4,
      total_decks: 2,
      total_models: 1,
      available_decks: ['Default', 'English'],
      available_models: ['Basic'],
      message: 'Anki collection contains 2 notes, 4 cards across 2 decks',
    });
    expect(anki.requests[2].params).toEqual({ query: '*' });
  });

  it('leaves totals unknown when the wildcard search fails', async () => {
    new FakeAnkiConnect({
      deckNames: () => ['Default'],
      modelNames: () => ['Basic'],
      findCards: () => [1],
      findNotes: () => {
        throw new Error('search failed');
      },
    }).install();

    expect(await getCollectionInfo(createTestContext())).toMatchObject({
      total_notes: 'unknown',
      total_cards: 'unknown',
      total_decks: 1,
      message: 'Anki collection contains unknown notes, unknown cards across 1 decks',
    });
  });

  it('fails when the model list cannot be read', async () => {
    new FakeAnkiConnect({
      deckNames: () => ['Default'],
      modelNames: () => {
        throw new Error('collection is not available');
      },
    }).install();

    expect(await getCollectionInfo(createTestContext())).toEqual({
      error: 'AnkiConnect error: collection is not available',
      success: false,
    });
  });
});

describe('checkConnection', () => {
  it('reports the AnkiConnect version', async () => {
    new FakeAnkiConnect({ version: () => 6 }).install();

    expect(await checkConnection(createTestContext())).toEqual({
      success: true,
      connected: true,
      endpoint: TEST_ENDPOINT,
      anki_connect_version: 6,
    });
  });

  it('reports an unreachable endpoint', async () => {
    installUnreachableFetch();

    expect(await checkConnection(createTestContext())).toEqual({
      success: false,
      connected: false,
      endpoint: TEST_ENDPOINT,
      error: CONNECTION_HINT,
    });
  });
});
