import { AgentId } from './AgentRoster';

export const NO_WINNER = 'none';
export const UNKNOWN_WINNER = 'unknown';

export type DecisionWinner = AgentId | typeof NO_WINNER | typeof UNKNOWN_WINNER;

export interface Decision {
  /** Chosen action, one agent's proposal or a hybrid. */
  decision: string;
  winner: DecisionWinner;
  /** WINNER field exactly as the arbitrator wrote it. */
  declaredWinner: string;
  /** Expected to hold a number from 1 to 10, kept verbatim. */
  confidence: string;
  reasoning: string;
  implementation: string;
  fullResponse: string;
}

export function failedDecision(reason: string): Decision {
  return {
    decision: 'Unable to decide',
    winner: NO_WINNER,
    declaredWinner: NO_WINNER,
    confidence: '0',
    reasoning: reason,
    implementation: 'N/A',
    fullResponse: `Error: ${reason}`
  };
}
