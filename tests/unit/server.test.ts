import { describe, it, expect, vi, afterEach } from 'vitest';
import { callTool } from '../../src/server.js';
import { allTools } from '../../src/tools/index.js';
import { CONNECTION_HINT } from '../../src/lib/errors.js';
import { FakeAnkiConnect, createTestContext, installUnreachableFetch } from '../helpers/fake-anki-connect.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

function textOf(result: Awaited<ReturnType<typeof callTool>>): string {
  const [item] = result.content;
  return item.type === 'text' ? item.text : '';
}

describe('allTools', () => {
  it('registers every tool', () => {
    expect(allTools.map((tool) => tool.name)).toEqual([
      'add_anki_card',
      'list_anki_decks',
      'list_anki_models',
      'get_anki_info',
      'check_anki_connection',
    ]);
  });
});

describe('callTool', () => {
  it('returns the tool payload as text', async () => {
    new FakeAnkiConnect({ modelNames: () => ['Basic'] }).install();

    const result = await callTool('list_anki_models', {}, createTestContext());

    expect(result.isError).toBe(false);
    expect(JSON.parse(textOf(result))).toEqual({
      models: ['Basic'],
      model_count: 1,
      message: 'Found 1 available note types/models',
    });
  });

  it('flags error payloads', async () => {
    installUnreachableFetch();

    const result = await callTool('get_anki_info', undefined, createTestContext());

    expect(result.isError).toBe(true);
    expect(JSON.parse(textOf(result))).toEqual({ error: CONNECTION_HINT, success: false });
  });

  it('rejects unknown tools', async () => {
    const result = await callTool('delete_everything', {}, createTestContext());

    expect(result.isError).toBe(true);
    expect(JSON.parse(textOf(result))).toEqual({ error: 'Unknown tool', name: 'delete_everything' });
  });

  it('does not treat inherited properties as tools', async () => {
    const result = await callTool('toString', {}, createTestContext());

    expect(result.isError).toBe(true);
  });

  it('dispatches add_anki_card with its arguments', async () => {
    const anki = new FakeAnkiConnect({
      deckNames: () => ['English'],
      modelNames: () => ['Basic'],
      addNote: () => 42,
    }).install();

    const result = await callTool('add_anki_card', { front: 'hello', back: 'world' }, createTestContext());

    expect(result.isError).toBe(false);
    expect(JSON.parse(textOf(result))).toMatchObject({ success: true, note_id: 42 });
    expect(anki.actions()).toEqual(['deckNames', 'modelNames', 'addNote']);
  });
});
