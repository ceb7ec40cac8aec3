import { AgentStats } from '../entities/AgentProfile';
import { Iteration } from '../entities/Iteration';
import { AgentKeyed } from '../valueObjects/AgentRoster';
import { CampaignBrief } from '../valueObjects/CampaignContext';
import { ComparisonOutcome } from '../valueObjects/IterationComparison';

export interface IterationOptions {
  useApiTrends?: boolean;
  generateImage?: boolean;
}

export interface ICouncilService {
  /**
   * Runs one propose -> critique -> decide -> content -> engagement -> weight
   * update pipeline and appends the result to the history
   */
  runCampaignIteration(brief: CampaignBrief, options?: IterationOptions): Promise<Iteration>;

  /**
   * Completed iterations in execution order
   */
  getHistory(): readonly Iteration[];

  getIteration(index: number): Iteration | undefined;

  /**
   * Post-update weight of every participant for each iteration, in order
   */
  getWeightHistory(): AgentKeyed<number[]>;

  /**
   * Compares two iterations by zero-based index
   */
  compareIterations(first: number, second: number): ComparisonOutcome;

  getAgentStats(): AgentStats[];
}
