import { describe, expect, it } from 'vitest';
import { PromptTooLargeError } from '../src/lib/budget/errors.js';
import { LLMConnectionError, LLMModelError, LLMResponseError } from '../src/lib/llm/errors.js';
import {
  FetchConnectionError,
  FetchParseError,
  FetchStatusError,
  MissingFieldError,
} from '../src/lib/reddit/errors.js';
import { mapSummaryErrorToResponse } from '../src/lib/routes/summaryErrorMap.js';

const THREAD_URL = 'https://www.reddit.com/r/test/comments/abc123/hello.json';

describe('mapSummaryErrorToResponse', () => {
  it('maps a 404 from Reddit to THREAD_NOT_FOUND', () => {
    expect(mapSummaryErrorToResponse(new FetchStatusError(THREAD_URL, 404))).toEqual({
      status: 404,
      code: 'THREAD_NOT_FOUND',
      message: 'Reddit thread not found',
    });
  });

  it('maps other fetch failures to 502', () => {
    const expected = {
      status: 502,
      code: 'THREAD_FETCH_FAILED',
      message: 'Unable to retrieve the thread JSON from Reddit',
    };
    expect(mapSummaryErrorToResponse(new FetchStatusError(THREAD_URL, 500))).toEqual(expected);
    expect(mapSummaryErrorToResponse(new FetchConnectionError(THREAD_URL))).toEqual(expected);
    expect(mapSummaryErrorToResponse(new FetchParseError(THREAD_URL))).toEqual(expected);
  });

  it('maps MissingFieldError to 422 and names the field', () => {
    const error = new MissingFieldError('[0].data.children[0].data.title');
    expect(mapSummaryErrorToResponse(error)).toEqual({
      status: 422,
      code: 'THREAD_MISSING_FIELD',
      message: 'Thread JSON does not look like a Reddit thread (missing [0].data.children[0].data.title)',
    });
  });

  it('maps PromptTooLargeError to a 400 response with guidance', () => {
    const error = new PromptTooLargeError(4000, 4100);
    expect(mapSummaryErrorToResponse(error)).toEqual({
      status: 400,
      code: 'PROMPT_TOO_LARGE',
      message: 'Prompt uses 4100 of 4000 tokens; lower chunkTokenLength or raise maxTokenLength.',
    });
  });

  it('maps LLMConnectionError and LLMModelError to 503', () => {
    const connectionError = new LLMConnectionError('http://localhost:11434');
    const modelError = new LLMModelError(404, 'llama');
    const expected = {
      status: 503,
      message: 'LLM provider unavailable; ensure the provider service is running and configured.',
    };
    expect(mapSummaryErrorToResponse(connectionError)).toEqual({ ...expected, code: 'llm.connection_error' });
    expect(mapSummaryErrorToResponse(modelError)).toEqual({ ...expected, code: 'llm.model_error' });
  });

  it('maps LLMResponseError to 502', () => {
    expect(mapSummaryErrorToResponse(new LLMResponseError(500, 'error snippet'))).toEqual({
      status: 502,
      code: 'llm.response_error',
      message: 'LLM provider returned an unexpected response; try again shortly.',
    });
  });

  it('maps unknown errors to 500', () => {
    expect(mapSummaryErrorToResponse(new Error('unknown'))).toEqual({
      status: 500,
      code: 'UNEXPECTED_ERROR',
      message: 'Unable to summarize the thread right now',
    });
  });
});
