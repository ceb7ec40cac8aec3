import { AgentProfile, PerformanceRecord } from '../../../domain/entities/AgentProfile';
import { AgentId, AgentKeyed } from '../../../domain/valueObjects/AgentRoster';
import { CampaignContext } from '../../../domain/valueObjects/CampaignContext';
import { ITextGenerationService } from '../../../domain/services/ITextGenerationService';
import { logger, errorMessage } from '../../logging/Logger';

export interface GenerationSettings {
  temperature: number;
  maxTokens: number;
}

export const PROPOSAL_SETTINGS: GenerationSettings = { temperature: 0.8, maxTokens: 800 };
export const CRITIQUE_SETTINGS: GenerationSettings = { temperature: 0.7, maxTokens: 800 };

/** Trends beyond this many are left out of proposal prompts. */
export const MAX_PROMPT_TRENDS = 5;

/**
 * Council member bound to a persona. Proposal and critique failures are
 * returned as marked error text so one agent cannot stall an iteration.
 */
export class CouncilAgent {
  constructor(
    public readonly profile: AgentProfile,
    protected readonly textService: ITextGenerationService
  ) {}

  get id(): AgentId {
    return this.profile.id;
  }

  get name(): string {
    return this.profile.name;
  }

  get votingWeight(): number {
    return this.profile.votingWeight;
  }

  async propose(context: CampaignContext): Promise<string> {
    const trends = context.trends
      .slice(0, MAX_PROMPT_TRENDS)
      .map(trend => `- ${trend}`)
      .join('\n');

    const userPrompt = `BRAND CONTEXT:
Brand: ${context.brandName}
Industry: ${context.industry}
Target Audience: ${context.targetAudience}

PRODUCT/CAMPAIGN:
${context.productInfo}

TRENDING TOPICS:
${trends}

TASK: Propose 2-3 specific social media post ideas for this campaign. For each idea:
1. Name the platform (Twitter, Instagram, or LinkedIn)
2. Describe the content approach
3. Explain how it serves your goals
4. Rate its potential from 1 to 10 from your perspective

Be specific and strategic.`;

    try {
      return await this.generate(userPrompt, PROPOSAL_SETTINGS);
    } catch (error) {
      logger.error(`${this.name} failed to generate proposal`, {
        agentId: this.id,
        error: errorMessage(error)
      });
      return `Error generating proposal: ${errorMessage(error)}`;
    }
  }

  /**
   * Critiques every proposal except this agent's own
   */
  async critique(context: CampaignContext, proposals: AgentKeyed<string>): Promise<string> {
    const othersText = Object.entries(proposals)
      .filter(([agentId]) => agentId !== this.id)
      .map(([agentId, proposal]) => `--- ${agentId.toUpperCase()} PROPOSAL ---\n${proposal ?? ''}`)
      .join('\n\n');

    const userPrompt = `BRAND CONTEXT:
Brand: ${context.brandName}
Product: ${context.productInfo}

OTHER AGENTS' PROPOSALS:
${othersText}

TASK: Critique these proposals from YOUR perspective (${this.name}).

For each proposal:
1. Identify what conflicts with your goals
2. Point out risks or missed opportunities
3. Suggest improvements where you can
4. Rate it from 1 to 10 from your perspective

Be direct and specific. This is a debate, not a collaboration.`;

    try {
      return await this.generate(userPrompt, CRITIQUE_SETTINGS);
    } catch (error) {
      logger.error(`${this.name} failed to generate critique`, {
        agentId: this.id,
        error: errorMessage(error)
      });
      return `Error generating critique: ${errorMessage(error)}`;
    }
  }

  updateWeight(performanceScore: number, learningRate?: number): PerformanceRecord {
    const record = this.profile.updateWeight(performanceScore, learningRate);
    logger.info(`Updated voting weight for ${this.name}`, {
      agentId: this.id,
      performanceScore,
      oldWeight: record.previousWeight,
      newWeight: record.newWeight
    });
    return record;
  }

  protected buildSystemPrompt(): string {
    const goals = this.profile.goals.map(goal => `- ${goal}`).join('\n');

    return `You are ${this.profile.name}, a member of an AI Marketing Council.

ROLE: ${this.profile.role}

PERSONALITY: ${this.profile.personality}

YOUR GOALS:
${goals}

INSTRUCTIONS:
- Advocate strongly for your perspective
- Give specific, actionable recommendations
- Challenge other agents' proposals when they conflict with your goals
- Be concise but thorough in your reasoning
- Always explain WHY you support or oppose an idea
- Stay in character at all times
`;
  }

  protected generate(userPrompt: string, settings: GenerationSettings): Promise<string> {
    logger.debug(`${this.name} requesting completion`, {
      agentId: this.id,
      provider: this.textService.provider,
      temperature: settings.temperature
    });

    return this.textService.complete({
      systemPrompt: this.buildSystemPrompt(),
      userPrompt,
      temperature: settings.temperature,
      maxTokens: settings.maxTokens
    });
  }
}
