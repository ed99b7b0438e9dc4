import type { CommentRecord } from '../reddit/types.js';
import { countTokens, type TokenCounter } from './tokenEstimate.js';

export const normalizeBody = (body: string): string => body.replace(/\n+/g, '\n');

/**
 * Packs comment bodies, in order, into newline-joined chunks of at most
 * `maxChunkTokens` tokens. Bodies are never split: one that is over budget on
 * its own becomes a chunk by itself. Empty bodies are skipped.
 */
export const chunkComments = (
  records: Iterable<CommentRecord>,
  maxChunkTokens: number,
  counter: TokenCounter = countTokens
): string[] => {
  if (!Number.isInteger(maxChunkTokens) || maxChunkTokens <= 0) {
    throw new RangeError(`maxChunkTokens must be a positive integer, received ${maxChunkTokens}`);
  }

  const chunks: string[] = [];
  let current = '';

  const pushChunk = () => {
    if (!current) {
      return;
    }

    chunks.push(current);
    current = '';
  };

  for (const record of records) {
    if (!record.body) {
      continue;
    }

    const entry = `${normalizeBody(record.body)}\n`;
    let tokens = counter(current + entry);

    if (current && tokens > maxChunkTokens) {
      pushChunk();
      tokens = counter(entry);
    }

    current += entry;

    if (tokens > maxChunkTokens) {
      pushChunk();
    }
  }

  pushChunk();

  return chunks;
};
