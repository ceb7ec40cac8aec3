import axios, { AxiosInstance } from 'axios';
import Joi from 'joi';
import { ITrendSource } from '../../domain/services/ITrendService';
import { Trend, TrendVolume } from '../../domain/valueObjects/Trend';
import { AppError, ErrorCode } from '../../domain/errors/AppError';
import { logger, errorMessage } from '../logging/Logger';

export const DEFAULT_SUBREDDITS = ['technology', 'startups'];
export const DEFAULT_USER_AGENT = 'MarketingCouncil/1.0';

interface RedditPost {
  title: string;
  score: number;
  permalink: string;
}

interface RedditListing {
  data: { children: Array<{ data: RedditPost }> };
}

const listingSchema = Joi.object<RedditListing>({
  data: Joi.object({
    children: Joi.array()
      .items(
        Joi.object({
          data: Joi.object({
            title: Joi.string().required(),
            score: Joi.number().required(),
            permalink: Joi.string().required()
          }).unknown(true)
        }).unknown(true)
      )
      .required()
  }).unknown(true).required()
}).unknown(true);

export function volumeForScore(score: number): TrendVolume {
  if (score > 1000) return 'high';
  if (score > 100) return 'medium';
  return 'low';
}

export interface RedditTrendSourceOptions {
  subreddits?: string[];
  userAgent?: string;
  http?: AxiosInstance;
}

/**
 * Hot posts from a fixed set of subreddits via the public JSON listing.
 * The most relevant posts across all subreddits are returned.
 */
export class RedditTrendSource implements ITrendSource {
  readonly name = 'reddit';
  private readonly subreddits: string[];
  private readonly http: AxiosInstance;

  constructor(options: RedditTrendSourceOptions = {}) {
    this.subreddits = options.subreddits ?? DEFAULT_SUBREDDITS;
    this.http =
      options.http ??
      axios.create({
        baseURL: 'https://www.reddit.com',
        timeout: 10_000,
        headers: { 'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT }
      });
  }

  async fetch(limit: number): Promise<Trend[]> {
    const trends: Trend[] = [];

    for (const subreddit of this.subreddits) {
      trends.push(...(await this.fetchSubreddit(subreddit, limit)));
    }

    return trends.sort((a, b) => b.relevance - a.relevance).slice(0, limit);
  }

  private async fetchSubreddit(subreddit: string, limit: number): Promise<Trend[]> {
    let body: unknown;
    try {
      const response = await this.http.get<unknown>(`/r/${subreddit}/hot.json`, { params: { limit } });
      body = response.data;
    } catch (error) {
      throw new AppError(
        ErrorCode.TREND_SOURCE_ERROR,
        `Failed to fetch r/${subreddit}`,
        502,
        errorMessage(error)
      );
    }

    const { error, value } = listingSchema.validate(body);
    if (error) {
      throw new AppError(ErrorCode.TREND_SOURCE_ERROR, `Unexpected listing format from r/${subreddit}`, 502, error.message);
    }

    logger.debug('Reddit listing fetched', { subreddit, posts: value.data.children.length });

    return value.data.children.slice(0, limit).map(({ data: post }) => ({
      topic: post.title,
      source: `reddit_r/${subreddit}`,
      volume: volumeForScore(post.score),
      relevance: Math.min(post.score / 5000, 1.0),
      url: `https://reddit.com${post.permalink}`
    }));
  }
}
