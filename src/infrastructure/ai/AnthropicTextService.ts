import Anthropic from '@anthropic-ai/sdk';
import { ITextGenerationService, TextGenerationRequest } from '../../domain/services/ITextGenerationService';
import { AppError } from '../../domain/errors/AppError';
import { logger, errorMessage } from '../logging/Logger';

export class AnthropicTextService implements ITextGenerationService {
  readonly provider = 'anthropic';
  private readonly client: Anthropic;

  constructor(apiKey: string, private readonly model: string) {
    this.client = new Anthropic({ apiKey });
  }

  async complete(request: TextGenerationRequest): Promise<string> {
    try {
      const message = await this.client.messages.create({
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: request.systemPrompt,
        messages: [{ role: 'user', content: request.userPrompt }]
      });

      const block = message.content[0];
      if (!block || block.type !== 'text') {
        throw new Error('Unexpected response format from Claude');
      }
      return block.text;
    } catch (error) {
      logger.error('Claude completion failed', { model: this.model, error: errorMessage(error) });
      throw AppError.aiServiceError(this.provider, error);
    }
  }
}
