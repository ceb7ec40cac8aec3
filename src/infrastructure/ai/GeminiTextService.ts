import { GoogleGenerativeAI } from '@google/generative-ai';
import { ITextGenerationService, TextGenerationRequest } from '../../domain/services/ITextGenerationService';
import { AppError } from '../../domain/errors/AppError';
import { logger, errorMessage } from '../logging/Logger';

export class GeminiTextService implements ITextGenerationService {
  readonly provider = 'gemini';
  private readonly genAI: GoogleGenerativeAI;

  constructor(apiKey: string, private readonly model: string) {
    this.genAI = new GoogleGenerativeAI(apiKey);
  }

  async complete(request: TextGenerationRequest): Promise<string> {
    try {
      const model = this.genAI.getGenerativeModel({ model: this.model });

      // System and user prompt travel together as one user turn
      const result = await model.generateContent({
        contents: [{ role: 'user', parts: [{ text: `${request.systemPrompt}\n\n${request.userPrompt}` }] }],
        generationConfig: {
          temperature: request.temperature,
          maxOutputTokens: request.maxTokens
        }
      });

      return result.response.text();
    } catch (error) {
      logger.error('Gemini completion failed', { model: this.model, error: errorMessage(error) });
      throw AppError.aiServiceError(this.provider, error);
    }
  }
}
