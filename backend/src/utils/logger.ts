import { pino, type Logger } from 'pino';
import { config, isDevelopment } from '../config/app.js';

export const logger: Logger = pino({
  name: config.PROJECT_NAME,
  level: config.LOG_LEVEL,
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname'
        }
      }
    : undefined
});

export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}
