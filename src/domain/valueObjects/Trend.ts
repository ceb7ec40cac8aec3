export type TrendVolume = 'high' | 'medium' | 'low';

export interface Trend {
  topic: string;
  source: string;
  volume: TrendVolume;
  relevance: number;
  url?: string;
}

export function formatTrend(trend: Trend): string {
  return `${trend.topic} (Source: ${trend.source}, Volume: ${trend.volume})`;
}

export function normalizeTopic(topic: string): string {
  return topic.toLowerCase().trim();
}
