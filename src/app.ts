import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { config } from './config';
import { errorHandler, globalLimiter, notFoundHandler } from './middlewares';
import healthRoutes from './routes/health';
import { accountRoutes } from './services/account';
import { statsRoutes } from './services/stats';
import { transferRoutes } from './services/transfer';
import {
  correlationMiddleware,
  logger,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
} from './observability';

export const createApp = (): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({ origin: config.api.corsOrigins }));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));
  app.use(express.urlencoded({ extended: true, limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);
  app.use(globalLimiter);

  // Routes
  app.use('/health', healthRoutes);
  app.use('/transfers', transferRoutes);
  app.use('/accounts', accountRoutes);
  app.use('/stats', statsRoutes);

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error({ err: error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'Credit Ledger API',
      version: '1.0.0',
      description: 'Credit distribution ledger for resellers and business owners',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
