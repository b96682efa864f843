import pino from 'pino';

function buildTransport(): pino.TransportSingleOptions | undefined {
  if (process.env.NODE_ENV !== 'development') return undefined;
  return { target: 'pino-pretty', options: { colorize: true } };
}

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'job-listing-crawler' },
  transport: buildTransport(),
});

export type Logger = typeof logger;
