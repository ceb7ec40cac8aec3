import express, { Express } from 'express';
import helmet from 'helmet';
import cors, { CorsOptions } from 'cors';
import dotenv from 'dotenv';
import { Container } from 'inversify';
import { createCouncilRoutes } from './interfaces/routes/councilRoutes';
import { errorHandler, notFoundHandler } from './interfaces/middleware/errorMiddleware';
import { logger } from './infrastructure/logging/Logger';

dotenv.config();

const DEFAULT_DEV_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:5173',
  'http://127.0.0.1:5173'
];

export function createApp(container: Container): Express {
  const app = express();

  const trustProxyEnv = process.env.TRUST_PROXY;
  if (trustProxyEnv !== undefined) {
    const numeric = Number(trustProxyEnv);
    app.set('trust proxy', isNaN(numeric) ? trustProxyEnv === 'true' : numeric);
  }

  app.use(helmet());

  const envOrigins = (process.env.ALLOWED_ORIGINS || '')
    .split(',')
    .map(o => o.trim())
    .filter(o => o.length > 0);
  const allowedOrigins = envOrigins.length > 0 ? envOrigins : DEFAULT_DEV_ORIGINS;

  const corsOptions: CorsOptions = {
    origin: (origin, callback) => {
      // Same-origin and non-browser requests carry no Origin
      if (!origin || allowedOrigins.includes(origin.replace(/\/$/, ''))) {
        return callback(null, true);
      }
      logger.warn('CORS blocked origin', { origin });
      callback(new Error(`CORS: Origin not allowed: ${origin}`));
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    maxAge: 86400
  };
  app.use(cors(corsOptions));

  app.use(express.json({ limit: '1mb' }));

  app.use((req, _res, next) => {
    logger.info('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip
    });
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV || 'development'
    });
  });

  app.use('/api/council', createCouncilRoutes(container));

  app.use(notFoundHandler);

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
