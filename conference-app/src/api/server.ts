import Fastify, { type FastifyServerOptions } from 'fastify';
import type { ConferenceRepository } from '../repositories/conference-repository.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerConferenceRoutes } from './routes/conferences.js';

export interface ServerOptions {
  /** Passed to Fastify: `true`, `false` or pino options such as `{ level: 'debug' }`. */
  logger?: FastifyServerOptions['logger'];
}

export function buildServer(repository: ConferenceRepository, options: ServerOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true });

  registerErrorHandler(app);

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerConferenceRoutes(instance, repository);
  }, { prefix });

  return app;
}
