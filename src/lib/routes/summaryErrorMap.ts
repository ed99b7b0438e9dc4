import { PromptTooLargeError } from '../budget/errors.js';
import { LLMConnectionError, LLMModelError, LLMResponseError } from '../llm/errors.js';
import { FetchError, FetchStatusError, MissingFieldError } from '../reddit/errors.js';

export type SummaryErrorResponse = {
  status: number;
  code: string;
  message: string;
};

export const mapSummaryErrorToResponse = (error: unknown): SummaryErrorResponse => {
  if (error instanceof FetchStatusError && error.status === 404) {
    return {
      status: 404,
      code: 'THREAD_NOT_FOUND',
      message: 'Reddit thread not found',
    };
  }

  if (error instanceof FetchError) {
    return {
      status: 502,
      code: 'THREAD_FETCH_FAILED',
      message: 'Unable to retrieve the thread JSON from Reddit',
    };
  }

  if (error instanceof MissingFieldError) {
    return {
      status: 422,
      code: error.code,
      message: `Thread JSON does not look like a Reddit thread (missing ${error.field})`,
    };
  }

  if (error instanceof PromptTooLargeError) {
    return {
      status: 400,
      code: error.code,
      message: `Prompt uses ${error.promptTokens} of ${error.maxTotalTokens} tokens; lower chunkTokenLength or raise maxTokenLength.`,
    };
  }

  if (error instanceof LLMConnectionError || error instanceof LLMModelError) {
    return {
      status: 503,
      code: error.code,
      message: 'LLM provider unavailable; ensure the provider service is running and configured.',
    };
  }

  if (error instanceof LLMResponseError) {
    return {
      status: 502,
      code: error.code,
      message: 'LLM provider returned an unexpected response; try again shortly.',
    };
  }

  return {
    status: 500,
    code: 'UNEXPECTED_ERROR',
    message: 'Unable to summarize the thread right now',
  };
};
