import { Router } from 'express';
import { Container } from 'inversify';
import { CouncilController } from '../controllers/CouncilController';
import { apiRateLimiter, iterationRateLimiter } from '../middleware/rateLimitMiddleware';
import { asyncHandler } from '../middleware/errorMiddleware';
import { validate } from '../middleware/validationMiddleware';
import {
  runIterationSchema,
  iterationIndexSchema,
  compareIterationsSchema,
  recentEventsSchema
} from '../validation/schemas';

export function createCouncilRoutes(container: Container): Router {
  const router = Router();
  const getController = () => container.get<CouncilController>('CouncilController');

  /**
   * POST /api/council/iterations
   * Runs one campaign iteration; concurrent requests are queued
   */
  router.post(
    '/iterations',
    iterationRateLimiter,
    validate(runIterationSchema),
    asyncHandler((req, res) => getController().runIteration(req, res))
  );

  router.get(
    '/iterations',
    apiRateLimiter,
    asyncHandler((req, res) => getController().listIterations(req, res))
  );

  router.get(
    '/iterations/:index',
    apiRateLimiter,
    validate(iterationIndexSchema),
    asyncHandler((req, res) => getController().getIteration(req, res))
  );

  router.get(
    '/compare',
    apiRateLimiter,
    validate(compareIterationsSchema),
    asyncHandler((req, res) => getController().compareIterations(req, res))
  );

  router.get(
    '/agents',
    apiRateLimiter,
    asyncHandler((req, res) => getController().getAgents(req, res))
  );

  router.get(
    '/weights/history',
    apiRateLimiter,
    asyncHandler((req, res) => getController().getWeightHistory(req, res))
  );

  /**
   * GET /api/council/events
   * Not rate limited; EventSource reconnects on its own
   */
  router.get(
    '/events',
    validate(recentEventsSchema),
    asyncHandler((req, res) => getController().streamEvents(req, res))
  );

  return router;
}
