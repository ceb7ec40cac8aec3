import { inject, injectable } from 'inversify';
import { computeOverallScore, EngagementResult } from '../../../domain/valueObjects/EngagementResult';
import { PostContent } from '../../../domain/valueObjects/PostContent';
import { IRandomSource, randomFloat, randomInt } from '../../../domain/services/IRandomSource';
import { EngagementConfig } from '../../../config/engagementConfig';
import { logger } from '../../logging/Logger';

/**
 * Stands in for real post metrics until a platform integration exists.
 * Draws are independent of the decision; only the platform is carried over.
 */
@injectable()
export class EngagementSimulator {
  constructor(
    @inject('EngagementConfig') private readonly config: EngagementConfig,
    @inject('RandomSource') private readonly random: IRandomSource
  ) {}

  simulate(content: PostContent): EngagementResult {
    const { likes: likesRange, shares: sharesRange, comments: commentsRange, sentiment: sentimentRange } =
      this.config;

    const likes = randomInt(this.random, likesRange.min, likesRange.max);
    const shares = randomInt(this.random, sharesRange.min, sharesRange.max);
    const comments = randomInt(this.random, commentsRange.min, commentsRange.max);
    const sentiment = randomFloat(this.random, sentimentRange.min, sentimentRange.max);

    const result: EngagementResult = {
      likes,
      shares,
      comments,
      sentiment,
      overallScore: computeOverallScore(likes, shares, comments, sentiment),
      platform: content.platform
    };

    logger.debug('Engagement simulated', { ...result });
    return result;
  }
}
