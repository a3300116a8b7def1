import { pino } from 'pino';
import { config } from '../config/index.js';

const transport = config.logging.pretty
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,service',
      },
    }
  : undefined;

export const logger = pino({
  name: 'termbridge',
  level: config.logging.level,
  base: { service: 'termbridge' },
  transport,
});
