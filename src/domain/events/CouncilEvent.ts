import { AgentId } from '../valueObjects/AgentRoster';
import { DecisionWinner } from '../valueObjects/Decision';
import { Platform } from '../valueObjects/PostContent';

interface BaseCouncilEvent {
  iterationNumber: number;
  timestamp: Date;
}

export interface IterationStartedEvent extends BaseCouncilEvent {
  type: 'iteration.started';
  brandName: string;
}

export interface TrendsFetchedEvent extends BaseCouncilEvent {
  type: 'trends.fetched';
  topics: string[];
}

export interface ProposalReceivedEvent extends BaseCouncilEvent {
  type: 'proposal.received';
  agentId: AgentId;
  agentName: string;
}

export interface CritiqueReceivedEvent extends BaseCouncilEvent {
  type: 'critique.received';
  agentId: AgentId;
  agentName: string;
}

export interface DecisionMadeEvent extends BaseCouncilEvent {
  type: 'decision.made';
  winner: DecisionWinner;
  confidence: string;
}

export interface ContentGeneratedEvent extends BaseCouncilEvent {
  type: 'content.generated';
  platform: Platform;
  charCount: number;
}

export interface EngagementSimulatedEvent extends BaseCouncilEvent {
  type: 'engagement.simulated';
  overallScore: number;
}

export interface WeightsUpdatedEvent extends BaseCouncilEvent {
  type: 'weights.updated';
  weights: Partial<Record<AgentId, number>>;
}

export interface IterationCompletedEvent extends BaseCouncilEvent {
  type: 'iteration.completed';
  recordKey: string;
}

export interface IterationFailedEvent extends BaseCouncilEvent {
  type: 'iteration.failed';
  error: string;
}

export type CouncilEvent =
  | IterationStartedEvent
  | TrendsFetchedEvent
  | ProposalReceivedEvent
  | CritiqueReceivedEvent
  | DecisionMadeEvent
  | ContentGeneratedEvent
  | EngagementSimulatedEvent
  | WeightsUpdatedEvent
  | IterationCompletedEvent
  | IterationFailedEvent;

export type CouncilEventType = CouncilEvent['type'];
