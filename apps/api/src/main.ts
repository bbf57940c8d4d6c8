import { mkdir } from 'fs/promises';
import { APP_NAME, APP_VERSION } from '@mdocx/shared';
import { createApp } from './app';
import { loadConfig } from './shared/config';
import { logger } from './shared/logger';
import { PandocConverter } from './renderers/pandoc-converter';

async function main() {
  const config = loadConfig(process.env);
  logger.level = config.logLevel;

  await mkdir(config.scratchDir, { recursive: true });

  const converter = new PandocConverter(config.converterPath);
  const app = createApp({ config, converter });

  const server = app.listen(config.port, config.host, () => {
    logger.info(
      {
        host: config.host,
        port: config.port,
        scratchDir: config.scratchDir,
        converter: config.converterPath,
        timeoutMs: config.conversionTimeoutMs,
      },
      `${APP_NAME} API v${APP_VERSION} listening on ${config.host}:${config.port}`,
    );
  });

  // ── Graceful shutdown ──────────────────────────────────────────────

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down API...');
    // In-flight conversions finish (bounded by the converter timeout) before close resolves.
    server.close((err) => {
      if (err) {
        logger.error({ err }, 'Error while closing HTTP server');
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  logger.fatal({ err }, 'API failed to start');
  process.exit(1);
});
