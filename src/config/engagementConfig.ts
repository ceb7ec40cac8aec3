import Joi from 'joi';
import { AppError } from '../domain/errors/AppError';

export interface NumericRange {
  min: number;
  max: number;
}

export interface EngagementConfig {
  likes: NumericRange;
  shares: NumericRange;
  comments: NumericRange;
  sentiment: NumericRange;
}

export const DEFAULT_ENGAGEMENT_CONFIG: EngagementConfig = {
  likes: { min: 2000, max: 8000 },
  shares: { min: 100, max: 500 },
  comments: { min: 50, max: 200 },
  sentiment: { min: 0.6, max: 0.9 }
};

const countRange = Joi.object({
  min: Joi.number().integer().min(0).required(),
  max: Joi.number().integer().min(Joi.ref('min')).required()
});

const sentimentRange = Joi.object({
  min: Joi.number().min(0).max(1).required(),
  max: Joi.number().min(Joi.ref('min')).max(1).required()
});

const engagementConfigSchema = Joi.object<EngagementConfig>({
  likes: countRange.required(),
  shares: countRange.required(),
  comments: countRange.required(),
  sentiment: sentimentRange.required()
});

export function validateEngagementConfig(candidate: unknown): EngagementConfig {
  const { error, value } = engagementConfigSchema.validate(candidate, { abortEarly: false, convert: true });
  if (error) {
    throw AppError.configurationError(
      'Invalid engagement configuration',
      error.details.map(detail => detail.message)
    );
  }
  return value;
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number | string {
  const raw = env[name];
  return raw === undefined || raw === '' ? fallback : raw;
}

/**
 * Reads ENGAGEMENT_<METRIC>_<MIN|MAX> overrides on top of the defaults
 */
export function loadEngagementConfig(env: NodeJS.ProcessEnv = process.env): EngagementConfig {
  const range = (metric: keyof EngagementConfig) => ({
    min: readNumber(env, `ENGAGEMENT_${metric.toUpperCase()}_MIN`, DEFAULT_ENGAGEMENT_CONFIG[metric].min),
    max: readNumber(env, `ENGAGEMENT_${metric.toUpperCase()}_MAX`, DEFAULT_ENGAGEMENT_CONFIG[metric].max)
  });

  return validateEngagementConfig({
    likes: range('likes'),
    shares: range('shares'),
    comments: range('comments'),
    sentiment: range('sentiment')
  });
}
