import type { TokenCounter } from '../budget/tokenEstimate.js';
import type { CompletionProvider } from '../llm/provider.js';

export type SummaryPass = {
  index: number;
  chunk: string;
  prompt: string;
  promptTokens: number;
  maxCompletionTokens: number;
  completion: string;
  /** Rolling prefix handed to the following pass. */
  prefix: string;
};

export type SummaryRun = {
  transcript: string;
  passes: SummaryPass[];
};

export type SummarizeParams = {
  title: string;
  selftext: string;
  chunks: readonly string[];
  instruction: string;
  maxNumberOfPasses: number;
  maxTotalTokens: number;
  temperature: number;
  model: string;
  provider: CompletionProvider;
  counter?: TokenCounter;
  onPass?: (pass: SummaryPass) => void;
};

export type SummarySettings = {
  queryText: string;
  chunkTokenLength: number;
  numberOfSummaries: number;
  maxTokenLength: number;
  model: string;
};

export type ChunkGroup = {
  index: number;
  tokens: number;
  text: string;
};

export type SummaryResult = {
  title: string;
  selftext: string;
  commentCount: number;
  groups: ChunkGroup[];
  passes: SummaryPass[];
  output: string;
};
