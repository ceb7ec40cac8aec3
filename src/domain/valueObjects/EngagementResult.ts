import { Platform } from './PostContent';

export const MAX_ENGAGEMENT_SCORE = 10;

export interface EngagementResult {
  likes: number;
  shares: number;
  comments: number;
  sentiment: number;
  overallScore: number;
  platform: Platform;
}

/**
 * Weighted engagement score. Only the upper bound is capped; nothing
 * clamps the low end.
 */
export function computeOverallScore(
  likes: number,
  shares: number,
  comments: number,
  sentiment: number
): number {
  const score =
    (likes / 1000) * 0.4 +
    (shares / 100) * 0.3 +
    (comments / 50) * 0.2 +
    (sentiment * 10) * 0.1;

  return Math.min(MAX_ENGAGEMENT_SCORE, score);
}
