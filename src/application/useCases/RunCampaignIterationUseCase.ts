import { injectable, inject } from 'inversify';
import { Mutex } from 'async-mutex';
import { ICouncilService } from '../../domain/services/ICouncilService';
import { Iteration } from '../../domain/entities/Iteration';
import { logger } from '../../infrastructure/logging/Logger';

export interface RunCampaignIterationInput {
  brandName: string;
  industry?: string;
  targetAudience?: string;
  productInfo?: string;
  useApiTrends?: boolean;
  generateImage?: boolean;
}

export interface RunCampaignIterationOutput {
  iteration: Iteration;
  queuedMs: number;
  durationMs: number;
}

/**
 * Entry point for running iterations from outside the council. Runs are
 * queued behind a single mutex so weights and history see one writer.
 */
@injectable()
export class RunCampaignIterationUseCase {
  private readonly mutex = new Mutex();

  constructor(@inject('CouncilService') private councilService: ICouncilService) {}

  get isRunning(): boolean {
    return this.mutex.isLocked();
  }

  async execute(input: RunCampaignIterationInput): Promise<RunCampaignIterationOutput> {
    const requestedAt = Date.now();
    if (this.mutex.isLocked()) {
      logger.info('Iteration queued behind a running iteration', { brandName: input.brandName });
    }

    return await this.mutex.runExclusive(async () => {
      const startedAt = Date.now();
      const { useApiTrends, generateImage, ...brief } = input;

      const iteration = await this.councilService.runCampaignIteration(brief, { useApiTrends, generateImage });

      return {
        iteration,
        queuedMs: startedAt - requestedAt,
        durationMs: Date.now() - startedAt
      };
    });
  }
}
