import { CouncilOrchestrator, TREND_LIMIT } from '../../../infrastructure/council/CouncilOrchestrator';
import { CouncilEventEmitter } from '../../../infrastructure/council/events/CouncilEventEmitter';
import { EngagementSimulator } from '../../../infrastructure/council/engagement/EngagementSimulator';
import { InMemoryIterationRepository } from '../../../infrastructure/repositories/InMemoryIterationRepository';
import { SeededRandomSource } from '../../../infrastructure/random/SeededRandomSource';
import { CouncilMembers } from '../../../infrastructure/council/agents/CouncilMembers';
import { DEFAULT_ENGAGEMENT_CONFIG, EngagementConfig } from '../../../config/engagementConfig';
import { Iteration } from '../../../domain/entities/Iteration';
import { CouncilEvent } from '../../../domain/events/CouncilEvent';
import { IIterationRepository } from '../../../domain/repositories/IIterationRepository';
import { ContentRequest, IContentService } from '../../../domain/services/IContentService';
import { ITrendService, TrendQuery } from '../../../domain/services/ITrendService';
import { IRandomSource } from '../../../domain/services/IRandomSource';
import { isComparisonError } from '../../../domain/valueObjects/IterationComparison';
import { PostContent } from '../../../domain/valueObjects/PostContent';
import { formatTrend, Trend } from '../../../domain/valueObjects/Trend';
import { buildMembers, decisionText, ScriptedTextService, SequenceRandomSource } from '../../helpers/councilFixtures';

class StubTrendService implements ITrendService {
  readonly queries: TrendQuery[] = [];

  async fetchTrends(query: TrendQuery): Promise<Trend[]> {
    this.queries.push(query);
    return [{ topic: 'AI Agents', source: 'sample', volume: 'high', relevance: 0.9 }];
  }

  formatForContext(trends: readonly Trend[]): string[] {
    return trends.map(formatTrend);
  }
}

class StubContentService implements IContentService {
  readonly requests: ContentRequest[] = [];
  failWith: Error | null = null;

  async generatePost(request: ContentRequest): Promise<PostContent> {
    this.requests.push(request);
    if (this.failWith) {
      throw this.failWith;
    }
    return {
      platform: request.platform,
      caption: 'Launch day #Acme',
      hashtags: ['#Acme'],
      postingTime: '9:00 AM EST',
      charCount: 16,
      imagePath: null
    };
  }
}

class FailingRepository implements IIterationRepository {
  async save(): Promise<string> {
    throw new Error('disk full');
  }
}

// likes 10000, shares 1000, comments 250, sentiment 1.0 -> score 9
const SCORE_NINE_CONFIG: EngagementConfig = {
  likes: { min: 10000, max: 10000 },
  shares: { min: 1000, max: 1000 },
  comments: { min: 250, max: 250 },
  sentiment: { min: 1, max: 1 }
};

describe('CouncilOrchestrator', () => {
  let textService: ScriptedTextService;
  let members: CouncilMembers;
  let trendService: StubTrendService;
  let contentService: StubContentService;
  let repository: InMemoryIterationRepository;
  let events: CouncilEventEmitter;
  let winner: string;

  const brief = { brandName: 'Acme', productInfo: 'Smart Scheduler' };

  function createOrchestrator(
    config: EngagementConfig = SCORE_NINE_CONFIG,
    random: IRandomSource = new SequenceRandomSource([0.5]),
    iterationRepository: IIterationRepository = repository
  ): CouncilOrchestrator {
    return new CouncilOrchestrator(
      members,
      trendService,
      contentService,
      new EngagementSimulator(config, random),
      iterationRepository,
      events
    );
  }

  function weightsOf(): Record<string, number> {
    const weights: Record<string, number> = {};
    for (const agent of members.agents) {
      weights[agent.id] = agent.votingWeight;
    }
    return weights;
  }

  beforeEach(() => {
    winner = 'bravo';
    textService = new ScriptedTextService(request =>
      request.userPrompt.includes('TASK: As the Arbitrator') ? decisionText(winner) : 'Some thoughts'
    );
    members = buildMembers(textService);
    trendService = new StubTrendService();
    contentService = new StubContentService();
    repository = new InMemoryIterationRepository();
    events = new CouncilEventEmitter();
  });

  describe('runCampaignIteration', () => {
    it('should run the full pipeline and update weights', async () => {
      const orchestrator = createOrchestrator();

      const iteration = await orchestrator.runCampaignIteration(brief);

      expect(iteration.number).toBe(1);
      expect(iteration.decision.winner).toBe('bravo');
      expect(iteration.content.platform).toBe('twitter');
      expect(iteration.engagement.overallScore).toBeCloseTo(9, 10);
      expect(Object.keys(iteration.proposals)).toEqual(['alpha', 'bravo', 'charlie']);
      expect(Object.keys(iteration.critiques)).toEqual(['alpha', 'bravo', 'charlie']);

      const weights = weightsOf();
      expect(weights.bravo).toBeCloseTo(1.1333333, 6);
      expect(weights.alpha).toBeCloseTo(0.99, 10);
      expect(weights.charlie).toBeCloseTo(0.99, 10);
      expect(repository.size).toBe(1);
    });

    it('should number iterations and accumulate weight history', async () => {
      const orchestrator = createOrchestrator();

      await orchestrator.runCampaignIteration(brief);
      const second = await orchestrator.runCampaignIteration(brief);

      expect(second.number).toBe(2);
      expect(orchestrator.getHistory()).toHaveLength(2);

      const weightHistory = orchestrator.getWeightHistory();
      const bravo = members.participants.require('bravo');
      const alpha = members.participants.require('alpha');
      expect(weightHistory[bravo]).toHaveLength(2);
      expect(weightHistory[bravo]?.[1]).toBeCloseTo(1.2666667, 6);
      expect(weightHistory[alpha]?.[1]).toBeCloseTo(0.98, 10);
    });

    it('should pass options through to trends and content', async () => {
      const orchestrator = createOrchestrator();

      await orchestrator.runCampaignIteration(brief, { useApiTrends: false, generateImage: false });

      expect(trendService.queries).toEqual([{ useApis: false, limit: TREND_LIMIT }]);
      expect(contentService.requests[0].generateImage).toBe(false);
      expect(contentService.requests[0].context.brandName).toBe('Acme');
    });

    it('should default to live trends and images', async () => {
      const orchestrator = createOrchestrator();

      await orchestrator.runCampaignIteration(brief);

      expect(trendService.queries[0].useApis).toBe(true);
      expect(contentService.requests[0].generateImage).toBe(true);
    });

    it('should treat every participant as a peer when the arbitrator names no winner', async () => {
      winner = 'None';
      const orchestrator = createOrchestrator();

      const iteration = await orchestrator.runCampaignIteration(brief);

      expect(iteration.decision.winner).toBe('none');
      for (const weight of Object.values(weightsOf())) {
        expect(weight).toBeCloseTo(0.99, 10);
      }
    });

    it('should publish pipeline events in order', async () => {
      const received: CouncilEvent[] = [];
      events.subscribe(event => received.push(event));
      const orchestrator = createOrchestrator();

      await orchestrator.runCampaignIteration(brief);

      expect(received.map(event => event.type)).toEqual([
        'iteration.started',
        'trends.fetched',
        'proposal.received',
        'proposal.received',
        'proposal.received',
        'critique.received',
        'critique.received',
        'critique.received',
        'decision.made',
        'content.generated',
        'engagement.simulated',
        'weights.updated',
        'iteration.completed'
      ]);
      expect(received.every(event => event.iterationNumber === 1)).toBe(true);
      const completed = received[received.length - 1];
      expect(completed.type === 'iteration.completed' && completed.recordKey).toBe('iteration_1');
    });

    it('should leave history and weights untouched when content generation fails', async () => {
      const received: CouncilEvent[] = [];
      events.subscribe(event => received.push(event));
      contentService.failWith = new Error('content down');
      const orchestrator = createOrchestrator();

      await expect(orchestrator.runCampaignIteration(brief)).rejects.toThrow('content down');

      expect(orchestrator.getHistory()).toHaveLength(0);
      expect(weightsOf()).toEqual({ alpha: 1, bravo: 1, charlie: 1 });
      expect(repository.size).toBe(0);
      expect(received[received.length - 1]).toMatchObject({ type: 'iteration.failed', error: 'content down' });
    });

    it('should leave history and weights untouched when persistence fails', async () => {
      const orchestrator = createOrchestrator(SCORE_NINE_CONFIG, new SequenceRandomSource([0.5]), new FailingRepository());

      await expect(orchestrator.runCampaignIteration(brief)).rejects.toThrow('disk full');

      expect(orchestrator.getHistory()).toHaveLength(0);
      expect(orchestrator.getWeightHistory()).toEqual({ alpha: [], bravo: [], charlie: [] });
      expect(weightsOf()).toEqual({ alpha: 1, bravo: 1, charlie: 1 });
    });
  });

  describe('queries', () => {
    let orchestrator: CouncilOrchestrator;
    let history: readonly Iteration[];

    beforeEach(async () => {
      orchestrator = createOrchestrator(DEFAULT_ENGAGEMENT_CONFIG, new SeededRandomSource(42));
      await orchestrator.runCampaignIteration(brief);
      winner = 'alpha';
      await orchestrator.runCampaignIteration(brief);
      history = orchestrator.getHistory();
    });

    it('should return iterations by zero-based index', () => {
      expect(orchestrator.getIteration(0)).toBe(history[0]);
      expect(orchestrator.getIteration(1)).toBe(history[1]);
      expect(orchestrator.getIteration(2)).toBeUndefined();
      expect(orchestrator.getIteration(-1)).toBeUndefined();
      expect(orchestrator.getIteration(0.5)).toBeUndefined();
    });

    it('should compare two iterations', () => {
      const outcome = orchestrator.compareIterations(0, 1);

      if (isComparisonError(outcome)) {
        throw new Error(outcome.message);
      }
      expect(outcome.first.winner).toBe('bravo');
      expect(outcome.second.winner).toBe('alpha');
      expect(outcome.changes.winnerChanged).toBe(true);
      expect(outcome.changes.engagementDiff).toBeCloseTo(
        history[1].engagement.overallScore - history[0].engagement.overallScore,
        10
      );
    });

    it('should be antisymmetric', () => {
      const forward = orchestrator.compareIterations(0, 1);
      const backward = orchestrator.compareIterations(1, 0);

      if (isComparisonError(forward) || isComparisonError(backward)) {
        throw new Error('unexpected comparison error');
      }
      expect(forward.changes.winnerChanged).toBe(backward.changes.winnerChanged);
      expect(forward.changes.engagementDiff).toBeCloseTo(-backward.changes.engagementDiff, 10);
    });

    it('should report out-of-range indices as a structured error', () => {
      expect(orchestrator.compareIterations(0, 5)).toEqual({
        error: 'ITERATION_OUT_OF_RANGE',
        message: 'Iteration indices must be integers between 0 and 1',
        historyLength: 2,
        requested: [0, 5]
      });
      expect(isComparisonError(orchestrator.compareIterations(-1, 0))).toBe(true);
      expect(isComparisonError(orchestrator.compareIterations(0.5, 0))).toBe(true);
    });

    it('should report agent stats in roster order', () => {
      const stats = orchestrator.getAgentStats();

      expect(stats.map(stat => stat.agentId)).toEqual(['alpha', 'bravo', 'charlie']);
      expect(stats.every(stat => stat.historyLength === 2)).toBe(true);
    });
  });
});
