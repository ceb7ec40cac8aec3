import { Trend } from '../valueObjects/Trend';

export interface TrendQuery {
  useApis: boolean;
  limit: number;
}

export interface ITrendService {
  /**
   * Returns at most `limit` trends, deduplicated by normalized topic
   */
  fetchTrends(query: TrendQuery): Promise<Trend[]>;

  /**
   * Formats trends as "topic (Source: source, Volume: volume)" lines
   */
  formatForContext(trends: readonly Trend[]): string[];
}

/**
 * A single upstream of trending topics (e.g. one social network)
 */
export interface ITrendSource {
  readonly name: string;
  fetch(limit: number): Promise<Trend[]>;
}
