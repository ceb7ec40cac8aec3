import { AgentId } from '../valueObjects/AgentRoster';

export const MIN_VOTING_WEIGHT = 0.5;
export const MAX_VOTING_WEIGHT = 2.0;
export const DEFAULT_LEARNING_RATE = 0.2;

export interface PerformanceRecord {
  performanceScore: number;
  learningRate: number;
  previousWeight: number;
  newWeight: number;
  recordedAt: Date;
}

export interface AgentStats {
  agentId: AgentId;
  name: string;
  role: string;
  currentWeight: number;
  color: string;
  historyLength: number;
}

/**
 * Feedback rule applied to a voting weight for a 0-10 performance score.
 * Scores of 7 and above raise the weight, scores below 5 lower it and the
 * band in between leaves it unchanged. The result is clamped to
 * [MIN_VOTING_WEIGHT, MAX_VOTING_WEIGHT].
 */
export function adjustVotingWeight(
  weight: number,
  performanceScore: number,
  learningRate: number
): number {
  let adjusted = weight;

  if (performanceScore >= 7) {
    adjusted += learningRate * (performanceScore - 7) / 3;
  } else if (performanceScore < 5) {
    adjusted -= learningRate * (5 - performanceScore) / 5;
  }

  return Math.max(MIN_VOTING_WEIGHT, Math.min(MAX_VOTING_WEIGHT, adjusted));
}

export class AgentProfile {
  private weight: number;
  private readonly performanceHistory: PerformanceRecord[] = [];

  constructor(
    public readonly id: AgentId,
    public readonly name: string,
    public readonly role: string,
    public readonly personality: string,
    public readonly goals: readonly string[],
    votingWeight: number = 1.0,
    public readonly color: string = '#000000'
  ) {
    if (votingWeight < MIN_VOTING_WEIGHT || votingWeight > MAX_VOTING_WEIGHT) {
      throw new Error(
        `Voting weight for ${id} must be between ${MIN_VOTING_WEIGHT} and ${MAX_VOTING_WEIGHT}`
      );
    }
    this.weight = votingWeight;
  }

  get votingWeight(): number {
    return this.weight;
  }

  get history(): readonly PerformanceRecord[] {
    return this.performanceHistory;
  }

  updateWeight(performanceScore: number, learningRate: number = DEFAULT_LEARNING_RATE): PerformanceRecord {
    const previousWeight = this.weight;
    this.weight = adjustVotingWeight(previousWeight, performanceScore, learningRate);

    const record: PerformanceRecord = {
      performanceScore,
      learningRate,
      previousWeight,
      newWeight: this.weight,
      recordedAt: new Date()
    };
    this.performanceHistory.push(record);
    return record;
  }

  getStats(): AgentStats {
    return {
      agentId: this.id,
      name: this.name,
      role: this.role,
      currentWeight: this.weight,
      color: this.color,
      historyLength: this.performanceHistory.length
    };
  }
}
