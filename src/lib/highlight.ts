/**
 * HTML highlighting for card text
 */

import { DEFAULT_HIGHLIGHT_COLOR, type HighlightColor } from './types.js';

// Anything outside 7-bit ASCII (CJK, accented letters) is matched as a plain substring
const NON_ASCII = /[^\x00-\x7F]/;

// Word characters in any script, so "cat" does not match inside "猫catです"
const WORD_CHAR = '[\\p{L}\\p{M}\\p{N}_]';

export function toHexColor(color: HighlightColor): string {
  const hex = (n: number) => n.toString(16).padStart(2, '0');
  return `#${hex(color.Red)}${hex(color.Green)}${hex(color.Blue)}`;
}

/**
 * Wrap each occurrence of the given words in a background-colored span.
 *
 * Words are applied one after another to the already-highlighted text.
 * Matching is case-insensitive and keeps the original casing of the match.
 * ASCII words only match whole words, with letters of any script counting as
 * part of a word; words with non-ASCII characters match anywhere.
 */
export function highlight(
  text: string,
  words: readonly string[],
  color: HighlightColor = DEFAULT_HIGHLIGHT_COLOR
): string {
  if (words.length === 0) return text;

  const hexColor = toHexColor(color);
  let highlighted = text;

  for (const word of words) {
    if (word === '') continue;

    const escaped = escapeRegExp(word);
    const source = NON_ASCII.test(word) ? escaped : `(?<!${WORD_CHAR})${escaped}(?!${WORD_CHAR})`;
    const pattern = new RegExp(source, 'giu');

    highlighted = highlighted.replace(
      pattern,
      (match) => `<span style="background-color: ${hexColor}">${match}</span>`
    );
  }

  return highlighted;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
