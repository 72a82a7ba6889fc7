import { pino, type Logger } from 'pino';

export type { Logger };

export const rootLogger: Logger = pino({
  name: 'healbox',
  level: process.env.LOG_LEVEL || 'info',
});

export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}
