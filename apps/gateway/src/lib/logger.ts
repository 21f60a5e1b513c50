import { type Logger, pino } from 'pino';
import { config } from './config.js';

export const logger: Logger = pino({
  name: 'stats-counter-gateway',
  level: config.logLevel,
});

export const childLogger = (module: string): Logger => logger.child({ module });
