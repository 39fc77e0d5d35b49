import pino from 'pino';

// stdout carries generated prompts, so log lines go to stderr
const destination =
  process.stderr.isTTY || process.env.NODE_ENV === 'development'
    ? pino.transport({
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      })
    : pino.destination(2);

export const logger = pino(
  { level: process.env.LOG_LEVEL || 'info' },
  destination,
);

process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
});
