import pino from 'pino';

export const logger = pino({
  name: 'mdocx-api',
  // Raised or lowered from config in main.ts.
  level: 'info',
  serializers: { err: pino.stdSerializers.err },
});
