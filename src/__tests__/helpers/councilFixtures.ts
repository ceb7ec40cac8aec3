import { AgentProfile } from '../../domain/entities/AgentProfile';
import { Iteration } from '../../domain/entities/Iteration';
import { ITextGenerationService, TextGenerationRequest } from '../../domain/services/ITextGenerationService';
import { IRandomSource } from '../../domain/services/IRandomSource';
import { AgentRoster, ARBITRATOR_ID } from '../../domain/valueObjects/AgentRoster';
import { createCampaignContext } from '../../domain/valueObjects/CampaignContext';
import { Arbitrator } from '../../infrastructure/council/agents/Arbitrator';
import { CouncilAgent } from '../../infrastructure/council/agents/CouncilAgent';
import { CouncilMembers } from '../../infrastructure/council/agents/CouncilMembers';

export class ScriptedTextService implements ITextGenerationService {
  readonly provider = 'scripted';
  readonly requests: TextGenerationRequest[] = [];

  constructor(private readonly reply: (request: TextGenerationRequest) => string) {}

  async complete(request: TextGenerationRequest): Promise<string> {
    this.requests.push(request);
    return this.reply(request);
  }
}

export class FailingTextService implements ITextGenerationService {
  readonly provider = 'failing';

  constructor(private readonly error: unknown = new Error('provider down')) {}

  async complete(): Promise<string> {
    throw this.error;
  }
}

/** Replays the given values in order, then repeats the last one. */
export class SequenceRandomSource implements IRandomSource {
  private index = 0;

  constructor(private readonly values: number[]) {}

  next(): number {
    const value = this.values[Math.min(this.index, this.values.length - 1)];
    this.index++;
    return value;
  }
}

export function decisionText(winner: string, platform = 'Twitter'): string {
  return [
    'DECISION: Launch thread with a customer quote',
    `WINNER: ${winner}`,
    'CONFIDENCE: 8',
    'REASONING: Strongest reach for the audience.',
    `IMPLEMENTATION: Platform: ${platform}`,
    'Tone: Bold'
  ].join('\n');
}

export function makeProfile(roster: AgentRoster, id: string, weight = 1.0): AgentProfile {
  return new AgentProfile(
    roster.require(id),
    id.charAt(0).toUpperCase() + id.slice(1),
    `${id} role`,
    `${id} personality`,
    [`${id} goal`],
    weight
  );
}

export function buildMembers(
  textService: ITextGenerationService,
  participantIds: string[] = ['alpha', 'bravo', 'charlie']
): CouncilMembers {
  const participants = new AgentRoster(participantIds);
  const everyone = new AgentRoster([...participantIds, ARBITRATOR_ID]);

  return {
    participants,
    agents: participantIds.map(id => new CouncilAgent(makeProfile(everyone, id), textService)),
    arbitrator: new Arbitrator(makeProfile(everyone, ARBITRATOR_ID), textService, participants)
  };
}

export const sampleContext = createCampaignContext(
  {
    brandName: 'Acme',
    industry: 'Software',
    targetAudience: 'Founders',
    productInfo: 'Smart Scheduler'
  },
  ['AI Agents (Source: sample, Volume: high)', 'Remote Work (Source: sample, Volume: medium)']
);

export function makeIteration(number = 1): Iteration {
  return {
    number,
    timestamp: '2024-01-02T03:04:05.006Z',
    context: sampleContext,
    trends: [{ topic: 'AI Agents', source: 'sample', volume: 'high', relevance: 0.9 }],
    proposals: {},
    critiques: {},
    decision: {
      decision: 'Post it',
      winner: 'none',
      declaredWinner: 'none',
      confidence: '5',
      reasoning: 'n/a',
      implementation: 'Platform: Twitter',
      fullResponse: ''
    },
    content: {
      platform: 'twitter',
      caption: 'Hello #World',
      hashtags: ['#World'],
      postingTime: '9:00 AM EST',
      charCount: 12,
      imagePath: null
    },
    engagement: {
      likes: 2000,
      shares: 100,
      comments: 50,
      sentiment: 0.6,
      overallScore: 1.9,
      platform: 'twitter'
    },
    weightUpdates: {}
  };
}
