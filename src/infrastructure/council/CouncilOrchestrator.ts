import { inject, injectable } from 'inversify';
import { AgentStats } from '../../domain/entities/AgentProfile';
import { Iteration, weightSnapshot } from '../../domain/entities/Iteration';
import { IIterationRepository } from '../../domain/repositories/IIterationRepository';
import { IContentService } from '../../domain/services/IContentService';
import { ICouncilService, IterationOptions } from '../../domain/services/ICouncilService';
import { ITrendService } from '../../domain/services/ITrendService';
import { AgentId, AgentKeyed } from '../../domain/valueObjects/AgentRoster';
import { CampaignBrief, createCampaignContext } from '../../domain/valueObjects/CampaignContext';
import { ComparisonOutcome, IterationSnapshot } from '../../domain/valueObjects/IterationComparison';
import { logger, errorMessage } from '../logging/Logger';
import { CouncilMembers } from './agents/CouncilMembers';
import { EngagementSimulator } from './engagement/EngagementSimulator';
import { CouncilEventEmitter } from './events/CouncilEventEmitter';
import { planWeightUpdates, toWeightUpdates } from './learning/WeightPolicy';
import { resolvePlatform } from './PlatformResolver';

export const TREND_LIMIT = 10;

/**
 * Runs council iterations one after another and owns the iteration history
 * and the participants' voting weights.
 */
@injectable()
export class CouncilOrchestrator implements ICouncilService {
  private readonly history: Iteration[] = [];

  constructor(
    @inject('CouncilMembers') private readonly members: CouncilMembers,
    @inject('TrendService') private readonly trendService: ITrendService,
    @inject('ContentService') private readonly contentService: IContentService,
    @inject('EngagementSimulator') private readonly engagementSimulator: EngagementSimulator,
    @inject('IterationRepository') private readonly iterationRepository: IIterationRepository,
    @inject('CouncilEventEmitter') private readonly events: CouncilEventEmitter
  ) {}

  async runCampaignIteration(brief: CampaignBrief, options: IterationOptions = {}): Promise<Iteration> {
    const { useApiTrends = true, generateImage = true } = options;
    const iterationNumber = this.history.length + 1;

    logger.info('Starting campaign iteration', {
      iterationNumber,
      brandName: brief.brandName,
      useApiTrends,
      generateImage
    });
    this.events.publish({
      type: 'iteration.started',
      brandName: brief.brandName ?? 'Unknown',
      ...this.stamp(iterationNumber)
    });

    try {
      return await this.executeIteration(iterationNumber, brief, useApiTrends, generateImage);
    } catch (error) {
      logger.error('Campaign iteration failed', { iterationNumber, error: errorMessage(error) });
      this.events.publish({
        type: 'iteration.failed',
        error: errorMessage(error),
        ...this.stamp(iterationNumber)
      });
      throw error;
    }
  }

  private async executeIteration(
    iterationNumber: number,
    brief: CampaignBrief,
    useApiTrends: boolean,
    generateImage: boolean
  ): Promise<Iteration> {
    const { agents, arbitrator } = this.members;

    // Step 1: trends and context
    const trends = await this.trendService.fetchTrends({ useApis: useApiTrends, limit: TREND_LIMIT });
    const context = createCampaignContext(brief, this.trendService.formatForContext(trends));
    logger.info(`Found ${trends.length} trends`, { iterationNumber });
    this.events.publish({
      type: 'trends.fetched',
      topics: trends.map(trend => trend.topic),
      ...this.stamp(iterationNumber)
    });

    // Step 2: proposals
    const proposals: AgentKeyed<string> = {};
    for (const agent of agents) {
      logger.info(`${agent.name} proposing`, { iterationNumber });
      proposals[agent.id] = await agent.propose(context);
      this.events.publish({
        type: 'proposal.received',
        agentId: agent.id,
        agentName: agent.name,
        ...this.stamp(iterationNumber)
      });
    }

    // Step 3: critiques
    const critiques: AgentKeyed<string> = {};
    for (const agent of agents) {
      logger.info(`${agent.name} critiquing`, { iterationNumber });
      critiques[agent.id] = await agent.critique(context, proposals);
      this.events.publish({
        type: 'critique.received',
        agentId: agent.id,
        agentName: agent.name,
        ...this.stamp(iterationNumber)
      });
    }

    // Step 4: decision
    const currentWeights = new Map<AgentId, number>();
    const agentWeights: AgentKeyed<number> = {};
    for (const agent of agents) {
      currentWeights.set(agent.id, agent.votingWeight);
      agentWeights[agent.id] = agent.votingWeight;
    }
    const decision = await arbitrator.decide(context, proposals, critiques, agentWeights);
    logger.info('Decision made', { iterationNumber, winner: decision.winner, confidence: decision.confidence });
    this.events.publish({
      type: 'decision.made',
      winner: decision.winner,
      confidence: decision.confidence,
      ...this.stamp(iterationNumber)
    });

    // Step 5: content
    const platform = resolvePlatform(decision.implementation);
    const content = await this.contentService.generatePost({ decision, context, platform, generateImage });
    logger.info(`Content generated for ${platform}`, { iterationNumber, charCount: content.charCount });
    this.events.publish({
      type: 'content.generated',
      platform,
      charCount: content.charCount,
      ...this.stamp(iterationNumber)
    });

    // Step 6: engagement
    const engagement = this.engagementSimulator.simulate(content);
    logger.info('Engagement simulated', {
      iterationNumber,
      likes: engagement.likes,
      shares: engagement.shares,
      overallScore: engagement.overallScore
    });
    this.events.publish({
      type: 'engagement.simulated',
      overallScore: engagement.overallScore,
      ...this.stamp(iterationNumber)
    });

    // Step 7: learning, computed but not yet applied
    const plan = planWeightUpdates(currentWeights, decision.winner, engagement.overallScore);

    const iteration: Iteration = {
      number: iterationNumber,
      timestamp: new Date().toISOString(),
      context,
      trends,
      proposals,
      critiques,
      decision,
      content,
      engagement,
      weightUpdates: toWeightUpdates(plan)
    };

    // Step 8: persist, then commit
    const recordKey = await this.iterationRepository.save(iteration);

    for (const agent of agents) {
      const planned = plan.get(agent.id);
      if (planned) {
        agent.updateWeight(planned.performanceScore, planned.learningRate);
      }
    }
    this.history.push(iteration);

    this.events.publish({
      type: 'weights.updated',
      weights: weightSnapshot(iteration, this.members.participants.list()),
      ...this.stamp(iterationNumber)
    });
    this.events.publish({ type: 'iteration.completed', recordKey, ...this.stamp(iterationNumber) });
    logger.info('Iteration complete', { iterationNumber, recordKey });

    return iteration;
  }

  getHistory(): readonly Iteration[] {
    return this.history;
  }

  getIteration(index: number): Iteration | undefined {
    return this.isValidIndex(index) ? this.history[index] : undefined;
  }

  getWeightHistory(): AgentKeyed<number[]> {
    const weightHistory: AgentKeyed<number[]> = {};

    for (const agentId of this.members.participants.list()) {
      const weights: number[] = [];
      for (const iteration of this.history) {
        const update = iteration.weightUpdates[agentId];
        if (update) {
          weights.push(update.newWeight);
        }
      }
      weightHistory[agentId] = weights;
    }

    return weightHistory;
  }

  compareIterations(first: number, second: number): ComparisonOutcome {
    if (!this.isValidIndex(first) || !this.isValidIndex(second)) {
      return {
        error: 'ITERATION_OUT_OF_RANGE',
        message: `Iteration indices must be integers between 0 and ${this.history.length - 1}`,
        historyLength: this.history.length,
        requested: [first, second]
      };
    }

    const a = this.snapshot(this.history[first]);
    const b = this.snapshot(this.history[second]);

    return {
      first: a,
      second: b,
      changes: {
        winnerChanged: a.winner !== b.winner,
        engagementDiff: b.engagement - a.engagement
      }
    };
  }

  getAgentStats(): AgentStats[] {
    return this.members.agents.map(agent => agent.profile.getStats());
  }

  private stamp(iterationNumber: number): { iterationNumber: number; timestamp: Date } {
    return { iterationNumber, timestamp: new Date() };
  }

  private snapshot(iteration: Iteration): IterationSnapshot {
    return {
      winner: iteration.decision.winner,
      engagement: iteration.engagement.overallScore,
      weights: weightSnapshot(iteration, this.members.participants.list())
    };
  }

  private isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.history.length;
  }
}
