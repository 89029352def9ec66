import { pino } from 'pino';
import { config } from '../config.js';

export type { Logger } from 'pino';

export const logger = pino({
  level: config.LOG_LEVEL,
  ...(config.NODE_ENV === 'development'
    ? { transport: { target: 'pino-pretty', options: { colorize: true } } }
    : {}),
});
