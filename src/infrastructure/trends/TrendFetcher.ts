import { ITrendService, ITrendSource, TrendQuery } from '../../domain/services/ITrendService';
import { formatTrend, normalizeTopic, Trend } from '../../domain/valueObjects/Trend';
import { logger, errorMessage } from '../logging/Logger';

/** Posts taken from each live source per fetch. */
export const PER_SOURCE_LIMIT = 5;

export class TrendFetcher implements ITrendService {
  constructor(
    private readonly liveSources: readonly ITrendSource[],
    private readonly sampleSource: ITrendSource
  ) {}

  async fetchTrends(query: TrendQuery): Promise<Trend[]> {
    let trends: Trend[] = [];

    if (query.useApis) {
      for (const source of this.liveSources) {
        try {
          trends.push(...(await source.fetch(PER_SOURCE_LIMIT)));
        } catch (error) {
          logger.warn(`${source.name} trends fetch failed`, { error: errorMessage(error) });
        }
      }
    }

    if (trends.length === 0) {
      logger.info('Using sample trends (live sources unavailable or disabled)');
      trends = await this.sampleSource.fetch(query.limit);
    }

    return this.deduplicate(trends).slice(0, query.limit);
  }

  formatForContext(trends: readonly Trend[]): string[] {
    return trends.map(formatTrend);
  }

  private deduplicate(trends: Trend[]): Trend[] {
    const seen = new Set<string>();
    return trends.filter(trend => {
      const key = normalizeTopic(trend.topic);
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }
}
