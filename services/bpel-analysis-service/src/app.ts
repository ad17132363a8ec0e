import express, { Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import morgan from 'morgan';
import { config } from './config';
import { AnalysisRepository } from './services/repository';
import { createAnalysesRouter } from './routes/analyses';
import { listPrompts } from './prompts';
import { SizeLimits } from './middleware/validation';
import { createLogger, Logger } from '../../../shared/utils';
import { HealthStatus } from '../../../shared/types';

export interface AppDependencies {
  repository: AnalysisRepository;
  logger?: Logger;
  limits?: SizeLimits;
  /** morgan format, or false to disable access logs */
  accessLog?: string | false;
}

export function createApp({ repository, logger = createLogger(config.serviceName), limits = config.limits, accessLog = 'combined' }: AppDependencies) {
  const app = express();

  // JSON payload carries the BPEL plus every interface file
  const jsonLimit = limits.maxBpelBytes + limits.maxInterfaceBytes * limits.maxInterfaceFiles;

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: jsonLimit }));
  if (accessLog) app.use(morgan(accessLog));

  // ============================================================================
  // Health Check
  // ============================================================================

  app.get('/health', async (_req: Request, res: Response) => {
    const healthy = await repository.healthy();
    const status: HealthStatus = {
      status: healthy ? 'ok' : 'unhealthy',
      service: config.serviceName,
      storage: repository.kind,
      prompts: listPrompts().map(({ id, version }) => ({ id, version })),
      timestamp: new Date().toISOString(),
    };
    res.status(healthy ? 200 : 503).json(status);
  });

  app.use('/api/analyses', createAnalysesRouter({ repository, logger, limits }));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.path} not found`,
    });
  });

  // Error handler (body parser failures land here too)
  app.use((err: Error & { status?: number; type?: string }, _req: Request, res: Response, _next: NextFunction) => {
    if (err.type === 'entity.too.large') {
      return res.status(413).json({ error: 'Payload Too Large', message: err.message, code: 'PAYLOAD_TOO_LARGE' });
    }
    if (err.type === 'entity.parse.failed') {
      return res.status(400).json({ error: 'Bad Request', message: 'Malformed JSON body', code: 'VALIDATION_ERROR' });
    }
    logger.error('Unhandled error', err);
    res.status(500).json({ error: 'Internal Server Error', message: 'Unexpected error' });
  });

  return app;
}
