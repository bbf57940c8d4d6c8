import { Router } from 'express';
import { APP_VERSION, type HealthResponseBody } from '@mdocx/shared';
import type { Converter } from '../renderers/pandoc-converter';
import { logger } from '../shared/logger';

export function createHealthRouter(converter: Converter): Router {
  const healthRouter = Router();

  healthRouter.get('/', async (_req, res) => {
    try {
      const converterVersion = await converter.version();
      res.json({
        status: 'ok',
        version: APP_VERSION,
        converter: converterVersion,
        timestamp: new Date().toISOString(),
      } satisfies HealthResponseBody);
    } catch (err) {
      logger.warn({ err }, 'Converter health check failed');
      res.status(503).json({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
      } satisfies HealthResponseBody);
    }
  });

  return healthRouter;
}
