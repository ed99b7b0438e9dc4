export interface CompletionInput {
  prompt: string;
  maxTokens: number;
  temperature: number;
  model: string;
}

export interface CompletionOutput {
  text: string;
}
