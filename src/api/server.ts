// src/api/server.ts - Operator API around a running coordinator
import http from 'http';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { CallerAuthorizer } from '../coordinator/caller-authorizer';
import { CrossChainCoordinator } from '../coordinator/cross-chain-coordinator';
import { PushEventSource } from '../sources/push-event-source';
import { ChainId } from '../types';
import { logger } from '../utils/logger';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { deadLetterRoutes } from './routes/dead-letters';
import { eventRoutes } from './routes/events';
import { launchRoutes } from './routes/launches';

export interface ApiDeps {
  coordinator: CrossChainCoordinator;
  sources: Map<ChainId, PushEventSource>;
  authorizer: CallerAuthorizer;
}

// Token amounts exceed Number range; send them as decimal strings
function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function createApp(deps: ApiDeps): express.Application {
  const app = express();

  app.set('json replacer', bigintReplacer);
  app.use(helmet());
  app.use(cors({ origin: '*' }));
  app.use(compression());
  app.use(express.json());
  app.use(requestLogger);

  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      coordinator: deps.coordinator.getStats()
    });
  });

  app.use('/launches', launchRoutes(deps.coordinator));
  app.use('/events', eventRoutes(deps.sources, deps.authorizer));
  app.use('/dead-letters', deadLetterRoutes(deps.coordinator));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.path} not found`
    });
  });

  app.use(errorHandler);
  return app;
}

export function startApiServer(app: express.Application, port: number): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(app);
    server.once('error', reject);
    server.listen(port, () => {
      logger.info(`🌐 API listening on port ${port}`);
      resolve(server);
    });
  });
}
