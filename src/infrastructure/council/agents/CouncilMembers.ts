import { AgentRoster } from '../../../domain/valueObjects/AgentRoster';
import { Arbitrator } from './Arbitrator';
import { CouncilAgent } from './CouncilAgent';

/**
 * The debating participants, in load order, plus the arbitrator that
 * judges them
 */
export interface CouncilMembers {
  participants: AgentRoster;
  agents: readonly CouncilAgent[];
  arbitrator: Arbitrator;
}
