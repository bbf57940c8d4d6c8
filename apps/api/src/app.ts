import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { pinoHttp } from 'pino-http';
import { APP_VERSION } from '@mdocx/shared';
import type { AppConfig } from './shared/config';
import { logger } from './shared/logger';
import type { Converter } from './renderers/pandoc-converter';
import { ConversionService } from './services/conversion.service';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { createHealthRouter } from './modules/health';
import { createConvertRouter } from './modules/convert/routes';
import { metricsRouter } from './modules/metrics/conversion-metrics';

export interface AppDependencies {
  config: AppConfig;
  converter: Converter;
  /** Scratch token source, overridable in tests. */
  generateToken?: () => string;
}

/**
 * Builds the Express application. Config and converter are injected so the
 * same app runs against a fake converter and a throwaway scratch directory.
 */
export function createApp({ config, converter, generateToken }: AppDependencies): Express {
  const app = express();

  const conversionService = new ConversionService(converter, {
    scratchDir: config.scratchDir,
    timeoutMs: config.conversionTimeoutMs,
    generateToken,
  });

  // --- Global Middleware ---
  app.use(helmet({
    // Downloads are fetched from any origin.
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  }));
  app.use(cors());
  app.use(pinoHttp({ logger }));
  app.use(express.json({
    limit: config.maxBodySize,
    // Same media types the convert route accepts.
    type: ['application/json', 'application/*+json'],
  }));

  app.use('/api', (_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('X-API-Version', APP_VERSION);
    next();
  });

  // --- Routes ---
  app.use('/api/health', createHealthRouter(converter));
  app.use('/api/convert', createConvertRouter(conversionService));
  app.use('/metrics', metricsRouter);

  // --- Error Handling ---
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
