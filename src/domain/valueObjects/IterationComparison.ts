import { AgentKeyed } from './AgentRoster';
import { DecisionWinner } from './Decision';

export interface IterationSnapshot {
  winner: DecisionWinner;
  engagement: number;
  weights: AgentKeyed<number>;
}

export interface IterationComparison {
  first: IterationSnapshot;
  second: IterationSnapshot;
  changes: {
    winnerChanged: boolean;
    /** second.engagement - first.engagement */
    engagementDiff: number;
  };
}

export interface ComparisonError {
  error: 'ITERATION_OUT_OF_RANGE';
  message: string;
  historyLength: number;
  requested: [number, number];
}

export type ComparisonOutcome = IterationComparison | ComparisonError;

export function isComparisonError(outcome: ComparisonOutcome): outcome is ComparisonError {
  return 'error' in outcome;
}
