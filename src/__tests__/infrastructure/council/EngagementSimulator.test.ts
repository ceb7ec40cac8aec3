import { EngagementSimulator } from '../../../infrastructure/council/engagement/EngagementSimulator';
import { DEFAULT_ENGAGEMENT_CONFIG } from '../../../config/engagementConfig';
import { PostContent } from '../../../domain/valueObjects/PostContent';
import { SequenceRandomSource } from '../../helpers/councilFixtures';

describe('EngagementSimulator', () => {
  const content: PostContent = {
    platform: 'linkedin',
    caption: 'Hello',
    hashtags: [],
    postingTime: '8:00 AM EST',
    charCount: 5,
    imagePath: null
  };

  it('should draw likes, shares, comments and sentiment in order', () => {
    const simulator = new EngagementSimulator(
      DEFAULT_ENGAGEMENT_CONFIG,
      new SequenceRandomSource([0, 0.999999, 0.5, 0.25])
    );

    const result = simulator.simulate(content);

    expect(result.likes).toBe(2000);
    expect(result.shares).toBe(500);
    expect(result.comments).toBe(125);
    expect(result.sentiment).toBeCloseTo(0.675, 10);
    expect(result.overallScore).toBeCloseTo(3.475, 10);
    expect(result.platform).toBe('linkedin');
  });

  it('should stay inside the configured ranges', () => {
    const simulator = new EngagementSimulator(
      {
        likes: { min: 10, max: 20 },
        shares: { min: 1, max: 2 },
        comments: { min: 0, max: 0 },
        sentiment: { min: 0.5, max: 0.5 }
      },
      new SequenceRandomSource([0.999999])
    );

    const result = simulator.simulate(content);

    expect(result.likes).toBe(20);
    expect(result.shares).toBe(2);
    expect(result.comments).toBe(0);
    expect(result.sentiment).toBe(0.5);
  });
});
