import { adjustVotingWeight } from '../../../domain/entities/AgentProfile';
import { WeightUpdate } from '../../../domain/entities/Iteration';
import { AgentId, AgentKeyed } from '../../../domain/valueObjects/AgentRoster';
import { DecisionWinner } from '../../../domain/valueObjects/Decision';

export const WINNER_LEARNING_RATE = 0.2;
export const PEER_LEARNING_RATE = 0.1;
/** Non-winners are judged on this fraction of the engagement score. */
export const PEER_SCORE_FACTOR = 0.5;

export interface PlannedWeightUpdate extends WeightUpdate {
  performanceScore: number;
  learningRate: number;
}

/**
 * Computes the next weight of every participant without touching the
 * agents, so the result can be committed only once the iteration is stored.
 */
export function planWeightUpdates(
  currentWeights: ReadonlyMap<AgentId, number>,
  winner: DecisionWinner,
  overallScore: number
): Map<AgentId, PlannedWeightUpdate> {
  const plan = new Map<AgentId, PlannedWeightUpdate>();

  for (const [agentId, previousWeight] of currentWeights) {
    const wasWinner = agentId === winner;
    const performanceScore = wasWinner ? overallScore : overallScore * PEER_SCORE_FACTOR;
    const learningRate = wasWinner ? WINNER_LEARNING_RATE : PEER_LEARNING_RATE;
    const newWeight = adjustVotingWeight(previousWeight, performanceScore, learningRate);

    plan.set(agentId, {
      previousWeight,
      newWeight,
      change: newWeight - previousWeight,
      wasWinner,
      performanceScore,
      learningRate
    });
  }

  return plan;
}

export function toWeightUpdates(plan: ReadonlyMap<AgentId, PlannedWeightUpdate>): AgentKeyed<WeightUpdate> {
  const updates: AgentKeyed<WeightUpdate> = {};
  for (const [agentId, { previousWeight, newWeight, change, wasWinner }] of plan) {
    updates[agentId] = { previousWeight, newWeight, change, wasWinner };
  }
  return updates;
}
