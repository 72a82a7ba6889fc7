import Fastify from 'fastify';
import { sessionRoutes } from './routes/sessions.js';
import type { HealingService } from '../heal/service.js';
import type { SessionStore } from '../store/session-store.js';

export interface ServerOptions {
  service: HealingService;
  store: SessionStore;
  defaultMaxAttempts: number;
  skipDispatch?: boolean;
  logLevel?: string;
}

export async function buildServer(opts: ServerOptions) {
  const app = Fastify({
    logger: opts.logLevel && opts.logLevel !== 'silent' ? { level: opts.logLevel } : false,
    bodyLimit: 16 * 1024 * 1024,
  });

  app.get('/health', async () => ({ status: 'ok' }));

  await app.register(sessionRoutes, {
    service: opts.service,
    store: opts.store,
    defaultMaxAttempts: opts.defaultMaxAttempts,
    skipDispatch: opts.skipDispatch ?? false,
  });

  return app;
}
