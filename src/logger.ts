import pino from 'pino';
import { config } from './config.js';

export const logger = pino({
  level: config.log.level,
  name: 'namebase-exchange',
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createChildLogger(module: string) {
  return logger.child({ module });
}
