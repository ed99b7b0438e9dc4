const PROMPT_TOO_LARGE_CODE = 'PROMPT_TOO_LARGE';

export class PromptTooLargeError extends Error {
  public readonly code = PROMPT_TOO_LARGE_CODE;
  public readonly maxTotalTokens: number;
  public readonly promptTokens: number;

  constructor(maxTotalTokens: number, promptTokens: number) {
    super(
      `Prompt uses ${promptTokens} tokens, leaving no room for a completion within ${maxTotalTokens} tokens`
    );
    this.name = 'PromptTooLargeError';
    this.maxTotalTokens = maxTotalTokens;
    this.promptTokens = promptTokens;
    Object.setPrototypeOf(this, PromptTooLargeError.prototype);
  }
}
