import { validateEnvironment } from '../../config/validateEnv';

describe('validateEnvironment', () => {
  it('should pass a mock setup with only warnings', () => {
    const result = validateEnvironment({ LLM_PROVIDER: 'mock' });

    expect(result.isValid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual(['HUGGINGFACE_TOKEN is not set; image generation is disabled']);
  });

  it('should warn when the provider key is missing', () => {
    const result = validateEnvironment({ LLM_PROVIDER: 'anthropic', HUGGINGFACE_TOKEN: 'test-token' });

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual(['ANTHROPIC_API_KEY is not set; agents will use mock completions']);
  });

  it('should reject unknown providers', () => {
    const result = validateEnvironment({ LLM_PROVIDER: 'cohere' });

    expect(result.isValid).toBe(false);
    expect(result.errors).toContain(
      'Unknown LLM_PROVIDER: cohere. Valid options: groq, openai, anthropic, gemini, mock'
    );
  });

  it('should reject inconsistent storage and seed settings', () => {
    const result = validateEnvironment({
      LLM_PROVIDER: 'mock',
      USE_MONGODB: 'true',
      ITERATION_STORE: 'sqlite',
      ENGAGEMENT_SEED: 'abc'
    });

    expect(result.errors).toEqual([
      'MONGODB_URI is required when USE_MONGODB is true',
      'Invalid ITERATION_STORE: sqlite. Valid options: file, memory',
      'ENGAGEMENT_SEED must be an integer, got abc'
    ]);
  });

  it('should surface invalid engagement ranges', () => {
    const result = validateEnvironment({ LLM_PROVIDER: 'mock', ENGAGEMENT_LIKES_MIN: '9000' });

    expect(result.errors).toEqual(['Invalid engagement configuration']);
  });

  it('should warn about an invalid port', () => {
    const result = validateEnvironment({ LLM_PROVIDER: 'mock', HUGGINGFACE_TOKEN: 'test-token', PORT: 'abc' });

    expect(result.warnings).toEqual(['Invalid PORT value: abc. Using default 3000.']);
  });
});
