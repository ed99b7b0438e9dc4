export { chunkComments, normalizeBody } from './chunking.js';
export { PromptTooLargeError } from './errors.js';
export { countTokens, estimateWordCount, type TokenCounter } from './tokenEstimate.js';
