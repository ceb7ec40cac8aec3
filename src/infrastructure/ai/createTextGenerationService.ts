import { ITextGenerationService } from '../../domain/services/ITextGenerationService';
import { AppError } from '../../domain/errors/AppError';
import { logger } from '../logging/Logger';
import { AnthropicTextService } from './AnthropicTextService';
import { GeminiTextService } from './GeminiTextService';
import { MockTextGenerationService } from './MockTextGenerationService';
import { GROQ_BASE_URL, OpenAICompatibleTextService } from './OpenAICompatibleTextService';

export const LLM_PROVIDERS = ['groq', 'openai', 'anthropic', 'gemini', 'mock'] as const;
export type LLMProvider = (typeof LLM_PROVIDERS)[number];

const DEFAULT_MODELS: Record<Exclude<LLMProvider, 'mock'>, string> = {
  groq: 'llama-3.3-70b-versatile',
  openai: 'gpt-4o',
  anthropic: 'claude-3-5-sonnet-20240620',
  gemini: 'gemini-1.5-flash'
};

const API_KEY_VARS: Record<Exclude<LLMProvider, 'mock'>, string> = {
  groq: 'GROQ_API_KEY',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  gemini: 'GOOGLE_API_KEY'
};

function isProvider(value: string): value is LLMProvider {
  return LLM_PROVIDERS.some(provider => provider === value);
}

/**
 * Picks the provider from LLM_PROVIDER. A missing key, or one set to
 * 'mock', falls back to the offline mock.
 */
export function createTextGenerationService(env: NodeJS.ProcessEnv = process.env): ITextGenerationService {
  const requested = (env.LLM_PROVIDER || 'groq').toLowerCase();
  if (!isProvider(requested)) {
    throw AppError.configurationError(`Unknown LLM_PROVIDER: ${requested}`, { allowed: LLM_PROVIDERS });
  }
  if (requested === 'mock') {
    return new MockTextGenerationService();
  }

  const apiKey = env[API_KEY_VARS[requested]];
  if (!apiKey || apiKey === 'mock') {
    logger.warn(`${API_KEY_VARS[requested]} not set, using mock text generation`);
    return new MockTextGenerationService();
  }

  const model = env.LLM_MODEL || DEFAULT_MODELS[requested];
  logger.info('Text generation provider selected', { provider: requested, model });

  switch (requested) {
    case 'groq':
      return new OpenAICompatibleTextService({ provider: 'groq', apiKey, model, baseURL: GROQ_BASE_URL });
    case 'openai':
      return new OpenAICompatibleTextService({ provider: 'openai', apiKey, model });
    case 'anthropic':
      return new AnthropicTextService(apiKey, model);
    case 'gemini':
      return new GeminiTextService(apiKey, model);
  }
}
