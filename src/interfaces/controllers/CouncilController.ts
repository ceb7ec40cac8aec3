import { Request, Response } from 'express';
import { injectable, inject } from 'inversify';
import { ICouncilService } from '../../domain/services/ICouncilService';
import { summarizeIteration } from '../../domain/entities/Iteration';
import { isComparisonError } from '../../domain/valueObjects/IterationComparison';
import { AppError } from '../../domain/errors/AppError';
import { RunCampaignIterationUseCase } from '../../application/useCases/RunCampaignIterationUseCase';
import { CouncilEventEmitter } from '../../infrastructure/council/events/CouncilEventEmitter';
import { logger } from '../../infrastructure/logging/Logger';

const DEFAULT_REPLAY = 50;

@injectable()
export class CouncilController {
  constructor(
    @inject('CouncilService') private councilService: ICouncilService,
    @inject('RunCampaignIterationUseCase') private runIterationUseCase: RunCampaignIterationUseCase,
    @inject('CouncilEventEmitter') private eventEmitter: CouncilEventEmitter
  ) {}

  /**
   * POST /api/council/iterations
   */
  async runIteration(req: Request, res: Response): Promise<void> {
    const { brandName, industry, targetAudience, productInfo, useApiTrends, generateImage } = req.body;

    const result = await this.runIterationUseCase.execute({
      brandName,
      industry,
      targetAudience,
      productInfo,
      useApiTrends,
      generateImage
    });

    logger.info('Iteration completed via API', {
      number: result.iteration.number,
      winner: result.iteration.decision.winner,
      durationMs: result.durationMs
    });

    res.status(201).json({
      success: true,
      data: result.iteration,
      meta: { queuedMs: result.queuedMs, durationMs: result.durationMs }
    });
  }

  /**
   * GET /api/council/iterations
   */
  async listIterations(_req: Request, res: Response): Promise<void> {
    const summaries = this.councilService.getHistory().map(summarizeIteration);
    res.json({ success: true, data: summaries, count: summaries.length });
  }

  /**
   * GET /api/council/iterations/:index (zero-based)
   */
  async getIteration(req: Request, res: Response): Promise<void> {
    const index = Number(req.params.index);
    const iteration = this.councilService.getIteration(index);

    if (!iteration) {
      throw AppError.iterationOutOfRange(`No iteration at index ${req.params.index}`, {
        historyLength: this.councilService.getHistory().length
      });
    }

    res.json({ success: true, data: iteration });
  }

  /**
   * GET /api/council/compare?first=&second=
   */
  async compareIterations(req: Request, res: Response): Promise<void> {
    const outcome = this.councilService.compareIterations(Number(req.query.first), Number(req.query.second));

    if (isComparisonError(outcome)) {
      res.status(404).json({
        success: false,
        error: outcome.message,
        code: outcome.error,
        details: { historyLength: outcome.historyLength, requested: outcome.requested }
      });
      return;
    }

    res.json({ success: true, data: outcome });
  }

  /**
   * GET /api/council/agents
   */
  async getAgents(_req: Request, res: Response): Promise<void> {
    res.json({ success: true, data: this.councilService.getAgentStats() });
  }

  /**
   * GET /api/council/weights/history
   */
  async getWeightHistory(_req: Request, res: Response): Promise<void> {
    res.json({ success: true, data: this.councilService.getWeightHistory() });
  }

  /**
   * GET /api/council/events
   * Server-sent stream of council events, starting with a replay of the
   * most recent ones
   */
  async streamEvents(req: Request, res: Response): Promise<void> {
    const replay = req.query.replay === undefined ? DEFAULT_REPLAY : Number(req.query.replay);

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive'
    });

    res.write(`data: ${JSON.stringify({
      type: 'connection',
      message: 'Connected to council event stream',
      timestamp: new Date().toISOString()
    })}\n\n`);

    for (const event of this.eventEmitter.getRecentEvents(replay)) {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    }

    const unsubscribe = this.eventEmitter.subscribe(event => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    });

    logger.info('Event stream client connected', { replayed: replay });

    req.on('close', () => {
      unsubscribe();
      logger.info('Event stream client disconnected');
    });
  }
}
