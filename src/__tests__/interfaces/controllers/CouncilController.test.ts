import { Request, Response } from 'express';
import { CouncilController } from '../../../interfaces/controllers/CouncilController';
import { RunCampaignIterationUseCase } from '../../../application/useCases/RunCampaignIterationUseCase';
import { CouncilEventEmitter } from '../../../infrastructure/council/events/CouncilEventEmitter';
import { AgentStats } from '../../../domain/entities/AgentProfile';
import { Iteration } from '../../../domain/entities/Iteration';
import { ICouncilService, IterationOptions } from '../../../domain/services/ICouncilService';
import { AgentKeyed } from '../../../domain/valueObjects/AgentRoster';
import { CampaignBrief } from '../../../domain/valueObjects/CampaignContext';
import { ComparisonOutcome } from '../../../domain/valueObjects/IterationComparison';
import { AppError, ErrorCode } from '../../../domain/errors/AppError';
import { makeIteration } from '../../helpers/councilFixtures';

// Mock implementation
class MockCouncilService implements ICouncilService {
  history: Iteration[] = [];
  runs: Array<{ brief: CampaignBrief; options?: IterationOptions }> = [];

  async runCampaignIteration(brief: CampaignBrief, options?: IterationOptions): Promise<Iteration> {
    this.runs.push({ brief, options });
    const iteration = makeIteration(this.history.length + 1);
    this.history.push(iteration);
    return iteration;
  }

  getHistory(): readonly Iteration[] {
    return this.history;
  }

  getIteration(index: number): Iteration | undefined {
    return Number.isInteger(index) ? this.history[index] : undefined;
  }

  getWeightHistory(): AgentKeyed<number[]> {
    return {};
  }

  compareIterations(first: number, second: number): ComparisonOutcome {
    return {
      error: 'ITERATION_OUT_OF_RANGE',
      message: 'Iteration indices must be integers between 0 and 0',
      historyLength: this.history.length,
      requested: [first, second]
    };
  }

  getAgentStats(): AgentStats[] {
    return [];
  }
}

describe('CouncilController', () => {
  let controller: CouncilController;
  let councilService: MockCouncilService;
  let eventEmitter: CouncilEventEmitter;

  beforeEach(() => {
    councilService = new MockCouncilService();
    eventEmitter = new CouncilEventEmitter();
    controller = new CouncilController(
      councilService,
      new RunCampaignIterationUseCase(councilService),
      eventEmitter
    );
  });

  afterEach(() => {
    eventEmitter.removeAllListeners();
  });

  describe('runIteration', () => {
    it('should run an iteration and respond with 201', async () => {
      const mockReq = {
        body: { brandName: 'Acme', productInfo: 'Smart Scheduler', useApiTrends: false }
      } as Request;

      const mockRes = {
        json: jest.fn(),
        status: jest.fn().mockReturnThis()
      } as unknown as Response;

      await controller.runIteration(mockReq, mockRes);

      expect(councilService.runs).toEqual([
        {
          brief: { brandName: 'Acme', industry: undefined, targetAudience: undefined, productInfo: 'Smart Scheduler' },
          options: { useApiTrends: false, generateImage: undefined }
        }
      ]);
      expect(mockRes.status).toHaveBeenCalledWith(201);
      expect(mockRes.json).toHaveBeenCalledWith(
        expect.objectContaining({ success: true, data: councilService.history[0] })
      );
    });
  });

  describe('listIterations', () => {
    it('should return summaries', async () => {
      councilService.history.push(makeIteration(1));
      const mockRes = { json: jest.fn() } as unknown as Response;

      await controller.listIterations({} as Request, mockRes);

      expect(mockRes.json).toHaveBeenCalledWith({
        success: true,
        data: [
          {
            number: 1,
            timestamp: '2024-01-02T03:04:05.006Z',
            winner: 'none',
            overallScore: 1.9,
            platform: 'twitter'
          }
        ],
        count: 1
      });
    });
  });

  describe('getIteration', () => {
    it('should return the iteration at the index', async () => {
      councilService.history.push(makeIteration(1));
      const mockReq = { params: { index: '0' } } as unknown as Request;
      const mockRes = { json: jest.fn() } as unknown as Response;

      await controller.getIteration(mockReq, mockRes);

      expect(mockRes.json).toHaveBeenCalledWith({ success: true, data: councilService.history[0] });
    });

    it('should throw an out-of-range error for a missing index', async () => {
      const mockReq = { params: { index: '3' } } as unknown as Request;
      const mockRes = { json: jest.fn() } as unknown as Response;

      const promise = controller.getIteration(mockReq, mockRes);

      await expect(promise).rejects.toBeInstanceOf(AppError);
      await expect(promise).rejects.toMatchObject({
        code: ErrorCode.ITERATION_OUT_OF_RANGE,
        statusCode: 404,
        message: 'No iteration at index 3',
        details: { historyLength: 0 }
      });
    });
  });

  describe('compareIterations', () => {
    it('should answer a structured comparison error with 404', async () => {
      const mockReq = { query: { first: '0', second: '4' } } as unknown as Request;
      const mockRes = {
        json: jest.fn(),
        status: jest.fn().mockReturnThis()
      } as unknown as Response;

      await controller.compareIterations(mockReq, mockRes);

      expect(mockRes.status).toHaveBeenCalledWith(404);
      expect(mockRes.json).toHaveBeenCalledWith({
        success: false,
        error: 'Iteration indices must be integers between 0 and 0',
        code: 'ITERATION_OUT_OF_RANGE',
        details: { historyLength: 0, requested: [0, 4] }
      });
    });
  });

  describe('streamEvents', () => {
    it('should replay recent events and forward new ones until the client leaves', async () => {
      eventEmitter.publish({ type: 'iteration.started', brandName: 'Acme', iterationNumber: 1, timestamp: new Date(0) });

      const mockReq = {
        query: { replay: 5 },
        on: jest.fn()
      } as unknown as Request;

      const mockRes = {
        writeHead: jest.fn(),
        write: jest.fn()
      } as unknown as Response;

      await controller.streamEvents(mockReq, mockRes);

      expect(mockRes.writeHead).toHaveBeenCalledWith(200, expect.objectContaining({
        'Content-Type': 'text/event-stream'
      }));
      const writes = (mockRes.write as jest.Mock).mock.calls.map(call => String(call[0]));
      expect(writes).toHaveLength(2);
      expect(JSON.parse(writes[0].slice('data: '.length)).type).toBe('connection');
      expect(writes[1]).toBe(
        'data: {"type":"iteration.started","brandName":"Acme","iterationNumber":1,"timestamp":"1970-01-01T00:00:00.000Z"}\n\n'
      );

      eventEmitter.publish({ type: 'iteration.failed', error: 'boom', iterationNumber: 1, timestamp: new Date(0) });
      expect(mockRes.write).toHaveBeenCalledTimes(3);

      const [event, onClose] = (mockReq.on as jest.Mock).mock.calls[0];
      expect(event).toBe('close');
      onClose();

      eventEmitter.publish({ type: 'iteration.failed', error: 'again', iterationNumber: 2, timestamp: new Date(0) });
      expect(mockRes.write).toHaveBeenCalledTimes(3);
    });
  });
});
