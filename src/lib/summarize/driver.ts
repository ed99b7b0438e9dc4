import { PromptTooLargeError } from '../budget/errors.js';
import { countTokens } from '../budget/tokenEstimate.js';
import {
  buildInitialPrefix,
  buildNextPrefix,
  buildPassPrompt,
  formatPassBlock,
  formatTranscriptHeader
} from './prompts.js';
import type { SummarizeParams, SummaryPass, SummaryRun } from './types.js';

/**
 * Runs the rolling summarization loop. Each pass sends the current prefix, the
 * instruction and one chunk to the provider, then replaces the prefix with the
 * title plus that pass's completion.
 *
 * The first chunk is scheduled twice, ahead of the others, so the top-voted
 * comments weigh more in the final summary. The schedule is then cut to
 * `maxNumberOfPasses`, which means a single-pass run summarizes the first chunk
 * once and nothing else.
 */
export const summarizeChunks = async (params: SummarizeParams): Promise<SummaryRun> => {
  const { title, selftext, chunks, instruction, provider } = params;
  const counter = params.counter ?? countTokens;

  if (!Number.isInteger(params.maxNumberOfPasses) || params.maxNumberOfPasses < 1) {
    throw new RangeError(`maxNumberOfPasses must be a positive integer, received ${params.maxNumberOfPasses}`);
  }

  if (!chunks.length) {
    return { transcript: '', passes: [] };
  }

  const schedule = [chunks[0], ...chunks].slice(0, params.maxNumberOfPasses);
  const passes: SummaryPass[] = [];
  let prefix = buildInitialPrefix(title, selftext);
  let transcript = formatTranscriptHeader(instruction);

  for (const [index, chunk] of schedule.entries()) {
    const prompt = buildPassPrompt(prefix, instruction, chunk);
    const promptTokens = counter(prompt);
    const maxCompletionTokens = params.maxTotalTokens - promptTokens;

    if (maxCompletionTokens <= 0) {
      throw new PromptTooLargeError(params.maxTotalTokens, promptTokens);
    }

    const { text: completion } = await provider.complete({
      prompt,
      maxTokens: maxCompletionTokens,
      temperature: params.temperature,
      model: params.model
    });

    prefix = buildNextPrefix(title, completion);
    transcript += formatPassBlock(index, prompt, completion);

    const pass: SummaryPass = {
      index,
      chunk,
      prompt,
      promptTokens,
      maxCompletionTokens,
      completion,
      prefix
    };
    passes.push(pass);
    params.onPass?.(pass);
  }

  return { transcript, passes };
};
