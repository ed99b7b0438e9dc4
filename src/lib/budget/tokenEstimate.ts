import { countTokens as countBpeTokens } from 'gpt-tokenizer';

export type TokenCounter = (text: string) => number;

// Average number of words per BPE token for English text.
const WORDS_PER_TOKEN = 0.56;

export const countTokens: TokenCounter = (text) => {
  if (!text) {
    return 0;
  }

  return countBpeTokens(text);
};

export const estimateWordCount = (tokens: number): number => Math.round(tokens * WORDS_PER_TOKEN);
