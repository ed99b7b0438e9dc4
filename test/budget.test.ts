import { describe, expect, it, vi } from 'vitest';
import {
  chunkComments,
  countTokens,
  estimateWordCount,
  normalizeBody,
  type TokenCounter
} from '../src/lib/budget/index.js';
import type { CommentRecord } from '../src/lib/reddit/types.js';

const wordCounter: TokenCounter = (text) => text.split(/\s+/).filter(Boolean).length;

const words = (count: number, word = 'w'): string => Array.from({ length: count }, () => word).join(' ');

const createRecords = (...bodies: string[]): CommentRecord[] =>
  bodies.map((body, index) => ({ path: ['children', String(index)], body }));

describe('countTokens', () => {
  it('counts BPE tokens deterministically', () => {
    expect(countTokens('')).toBe(0);
    expect(countTokens('hello world')).toBe(2);
    expect(countTokens('hello world')).toBe(countTokens('hello world'));
  });

  it('never decreases when text is appended', () => {
    const base = 'The thread discussed the new release.';
    expect(countTokens(`${base} Most replies agreed.`)).toBeGreaterThanOrEqual(countTokens(base));
  });

  it('estimates word counts from token counts', () => {
    expect(estimateWordCount(100)).toBe(56);
    expect(estimateWordCount(0)).toBe(0);
  });
});

describe('chunkComments', () => {
  it('collapses repeated newlines inside a body', () => {
    expect(normalizeBody('a\n\n\nb\nc')).toBe('a\nb\nc');
    expect(chunkComments(createRecords('a\n\n\nb'), 10, wordCounter)).toEqual(['a\nb\n']);
  });

  it('packs consecutive bodies until the budget would be exceeded', () => {
    const chunks = chunkComments(createRecords(words(3, 'a'), words(3, 'b'), words(3, 'c')), 7, wordCounter);

    expect(chunks).toEqual(['a a a\nb b b\n', 'c c c\n']);
  });

  it('keeps a chunk that lands exactly on the budget', () => {
    expect(chunkComments(createRecords(words(3), words(3)), 6, wordCounter)).toEqual(['w w w\nw w w\n']);
  });

  it('isolates an oversized body in its own chunk without splitting it', () => {
    const small = words(10, 'a');
    const huge = words(2600, 'b');
    const tail = words(5, 'c');

    const chunks = chunkComments(createRecords(small, huge, tail), 2500, wordCounter);

    expect(chunks).toEqual([`${small}\n`, `${huge}\n`, `${tail}\n`]);
  });

  it('skips empty bodies without creating chunk boundaries', () => {
    const chunks = chunkComments(createRecords('one', '', 'two', ''), 10, wordCounter);

    expect(chunks).toEqual(['one\ntwo\n']);
  });

  it('returns no chunks when there are no bodies', () => {
    expect(chunkComments([], 10, wordCounter)).toEqual([]);
    expect(chunkComments(createRecords('', ''), 10, wordCounter)).toEqual([]);
  });

  it('neither drops nor duplicates bodies', () => {
    const bodies = Array.from({ length: 25 }, (_, index) => `${words((index % 7) + 1, `w${index}`)}\n\nend`);

    const chunks = chunkComments(createRecords(...bodies), 12, wordCounter);

    expect(chunks.join('')).toBe(bodies.map((body) => `${normalizeBody(body)}\n`).join(''));
    for (const chunk of chunks) {
      expect(wordCounter(chunk)).toBeLessThanOrEqual(12);
    }
  });

  it('counts each appended body once when it fits', () => {
    const counter = vi.fn(wordCounter);

    expect(chunkComments(createRecords('a', 'b', 'c'), 10, counter)).toEqual(['a\nb\nc\n']);
    expect(counter).toHaveBeenCalledTimes(3);
  });

  it('recounts only the new body after closing a chunk', () => {
    const counter = vi.fn(wordCounter);

    expect(chunkComments(createRecords('a', 'b', 'c'), 1, counter)).toEqual(['a\n', 'b\n', 'c\n']);
    expect(counter.mock.calls.map(([text]) => text)).toEqual(['a\n', 'a\nb\n', 'b\n', 'b\nc\n', 'c\n']);
  });

  it('uses the BPE counter by default', () => {
    expect(chunkComments(createRecords('hello world', 'hello world'), 100)).toEqual(['hello world\nhello world\n']);
  });

  it('rejects non-positive budgets', () => {
    expect(() => chunkComments(createRecords('a'), 0, wordCounter)).toThrowError(RangeError);
    expect(() => chunkComments(createRecords('a'), 2.5, wordCounter)).toThrowError(RangeError);
  });
});
