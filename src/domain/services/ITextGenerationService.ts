export interface TextGenerationRequest {
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxTokens: number;
}

export interface ITextGenerationService {
  /**
   * Provider name used in logs (e.g. 'groq', 'anthropic')
   */
  readonly provider: string;

  /**
   * Returns a single completion for the given instruction and prompt.
   * Rejects when the provider call fails.
   */
  complete(request: TextGenerationRequest): Promise<string>;
}
