import { promises as fs } from 'fs';
import Joi from 'joi';
import { ITrendSource } from '../../domain/services/ITrendService';
import { IRandomSource, shuffle } from '../../domain/services/IRandomSource';
import { Trend } from '../../domain/valueObjects/Trend';
import { logger, errorMessage } from '../logging/Logger';

export const FALLBACK_TRENDS: readonly Trend[] = [
  { topic: 'AI Innovation', source: 'fallback', volume: 'high', relevance: 0.9 },
  { topic: 'Tech Startups', source: 'fallback', volume: 'medium', relevance: 0.8 },
  { topic: 'Digital Marketing', source: 'fallback', volume: 'high', relevance: 0.85 },
  { topic: 'Productivity Tools', source: 'fallback', volume: 'medium', relevance: 0.75 },
  { topic: 'Remote Work', source: 'fallback', volume: 'high', relevance: 0.8 }
];

const trendSchema = Joi.object<Trend>({
  topic: Joi.string().required(),
  source: Joi.string().required(),
  volume: Joi.string().valid('high', 'medium', 'low').required(),
  relevance: Joi.number().min(0).max(1).required(),
  url: Joi.string().uri()
});

const sampleFileSchema = Joi.object<{ sample_trends: Trend[] }>({
  sample_trends: Joi.array().items(trendSchema).required()
});

/**
 * Offline trends read from a JSON file, shuffled on every fetch
 */
export class SampleTrendSource implements ITrendSource {
  readonly name = 'samples';

  constructor(
    private readonly filePath: string,
    private readonly random: IRandomSource
  ) {}

  async fetch(limit: number): Promise<Trend[]> {
    let samples: Trend[];
    try {
      samples = await this.load();
    } catch (error) {
      logger.warn('Sample trends load failed, using built-in list', {
        filePath: this.filePath,
        error: errorMessage(error)
      });
      return FALLBACK_TRENDS.map(trend => ({ ...trend }));
    }

    return shuffle(this.random, samples).slice(0, limit);
  }

  private async load(): Promise<Trend[]> {
    const raw: unknown = JSON.parse(await fs.readFile(this.filePath, 'utf8'));
    const { error, value } = sampleFileSchema.validate(raw);
    if (error) {
      throw error;
    }
    return value.sample_trends;
  }
}
