import OpenAI from 'openai';
import { ITextGenerationService, TextGenerationRequest } from '../../domain/services/ITextGenerationService';
import { AppError } from '../../domain/errors/AppError';
import { logger, errorMessage } from '../logging/Logger';

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

export interface OpenAICompatibleOptions {
  provider: 'groq' | 'openai';
  apiKey: string;
  model: string;
  baseURL?: string;
}

/**
 * Chat-completions client for OpenAI and for OpenAI-compatible hosts such
 * as Groq.
 */
export class OpenAICompatibleTextService implements ITextGenerationService {
  readonly provider: string;
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAICompatibleOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
  }

  async complete(request: TextGenerationRequest): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.userPrompt }
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error('Empty completion');
      }

      logger.debug('Completion received', {
        provider: this.provider,
        model: this.model,
        totalTokens: response.usage?.total_tokens
      });
      return content;
    } catch (error) {
      logger.error('Chat completion failed', { provider: this.provider, error: errorMessage(error) });
      throw AppError.aiServiceError(this.provider, error);
    }
  }
}
