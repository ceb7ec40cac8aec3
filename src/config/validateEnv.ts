import { logger, errorMessage } from '../infrastructure/logging/Logger';
import { LLM_PROVIDERS } from '../infrastructure/ai/createTextGenerationService';
import { loadEngagementConfig } from './engagementConfig';

interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

const ITERATION_STORES = ['file', 'memory'];

const PROVIDER_KEYS: Record<string, string> = {
  groq: 'GROQ_API_KEY',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  gemini: 'GOOGLE_API_KEY'
};

/**
 * Checks the environment before start-up. Errors block the start,
 * warnings only degrade features.
 */
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const provider = (env.LLM_PROVIDER || 'groq').toLowerCase();
  if (!LLM_PROVIDERS.some(known => known === provider)) {
    errors.push(`Unknown LLM_PROVIDER: ${provider}. Valid options: ${LLM_PROVIDERS.join(', ')}`);
  } else if (provider !== 'mock') {
    const keyVar = PROVIDER_KEYS[provider];
    const key = env[keyVar];
    if (!key || key === 'mock') {
      warnings.push(`${keyVar} is not set; agents will use mock completions`);
    }
  }

  if (!env.HUGGINGFACE_TOKEN) {
    warnings.push('HUGGINGFACE_TOKEN is not set; image generation is disabled');
  }

  if (env.USE_MONGODB === 'true' && !env.MONGODB_URI) {
    errors.push('MONGODB_URI is required when USE_MONGODB is true');
  }

  if (env.ITERATION_STORE && !ITERATION_STORES.includes(env.ITERATION_STORE)) {
    errors.push(`Invalid ITERATION_STORE: ${env.ITERATION_STORE}. Valid options: ${ITERATION_STORES.join(', ')}`);
  }

  if (env.PORT) {
    const port = parseInt(env.PORT, 10);
    if (isNaN(port) || port < 1 || port > 65535) {
      warnings.push(`Invalid PORT value: ${env.PORT}. Using default 3000.`);
    }
  }

  if (env.ENGAGEMENT_SEED && !/^-?\d+$/.test(env.ENGAGEMENT_SEED)) {
    errors.push(`ENGAGEMENT_SEED must be an integer, got ${env.ENGAGEMENT_SEED}`);
  }

  try {
    loadEngagementConfig(env);
  } catch (error) {
    errors.push(errorMessage(error));
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings
  };
}

/**
 * Logs validation results and exits on critical errors
 */
export function validateAndLogEnvironment(): ValidationResult {
  const result = validateEnvironment();

  result.warnings.forEach(warning => {
    logger.warn(`Environment warning: ${warning}`);
  });
  result.errors.forEach(error => {
    logger.error(`Environment error: ${error}`);
  });

  if (!result.isValid) {
    logger.error('Environment validation failed. Cannot start server.');
    process.exit(1);
  }

  logger.info('Environment validation passed.');
  logger.info('Current configuration:', {
    NODE_ENV: process.env.NODE_ENV || 'development',
    PORT: process.env.PORT || '3000',
    LLM_PROVIDER: provider(),
    USE_MONGODB: process.env.USE_MONGODB || 'false',
    ITERATION_STORE: process.env.ITERATION_STORE || 'file',
    OUTPUT_DIR: process.env.OUTPUT_DIR || 'outputs',
    IMAGE_GENERATION: !!process.env.HUGGINGFACE_TOKEN
  });

  return result;
}

function provider(): string {
  return (process.env.LLM_PROVIDER || 'groq').toLowerCase();
}
