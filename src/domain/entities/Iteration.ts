import { AgentId, AgentKeyed } from '../valueObjects/AgentRoster';
import { CampaignContext } from '../valueObjects/CampaignContext';
import { Decision } from '../valueObjects/Decision';
import { EngagementResult } from '../valueObjects/EngagementResult';
import { PostContent } from '../valueObjects/PostContent';
import { Trend } from '../valueObjects/Trend';

export interface WeightUpdate {
  previousWeight: number;
  newWeight: number;
  change: number;
  wasWinner: boolean;
}

export interface Iteration {
  /** 1-based position in the iteration history. */
  readonly number: number;
  readonly timestamp: string;
  readonly context: CampaignContext;
  readonly trends: readonly Trend[];
  readonly proposals: AgentKeyed<string>;
  readonly critiques: AgentKeyed<string>;
  readonly decision: Decision;
  readonly content: PostContent;
  readonly engagement: EngagementResult;
  readonly weightUpdates: AgentKeyed<WeightUpdate>;
}

export interface IterationSummary {
  number: number;
  timestamp: string;
  winner: string;
  overallScore: number;
  platform: string;
}

export function summarizeIteration(iteration: Iteration): IterationSummary {
  return {
    number: iteration.number,
    timestamp: iteration.timestamp,
    winner: iteration.decision.winner,
    overallScore: iteration.engagement.overallScore,
    platform: iteration.content.platform
  };
}

/** Post-update weights of an iteration, in roster order. */
export function weightSnapshot(iteration: Iteration, participants: readonly AgentId[]): AgentKeyed<number> {
  const snapshot: AgentKeyed<number> = {};
  for (const id of participants) {
    const update = iteration.weightUpdates[id];
    if (update) {
      snapshot[id] = update.newWeight;
    }
  }
  return snapshot;
}
