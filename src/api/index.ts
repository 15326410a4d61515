import fastify from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { config } from '../config/env';
import { RATE_LIMIT_ALLOWLIST } from '../config/system/constants';
import { loggerOptions } from '../utils/logger';
import { defaultDependencies, ServerDependencies } from './dependencies';
import { registerHealthRoutes } from './routes/health';
import { registerLookupRoutes } from './routes/lookup';
import { registerDownloadRoutes } from './routes/download';

export async function buildServer(overrides: Partial<ServerDependencies> = {}) {
  const deps: ServerDependencies = { ...defaultDependencies(), ...overrides };

  const app = fastify({ logger: loggerOptions() });

  await app.register(helmet, { contentSecurityPolicy: false });

  await app.register(cors, {
    origin: config.corsOrigins.length > 0 ? config.corsOrigins : true
  });

  await app.register(rateLimit, {
    max: config.RATE_LIMIT_MAX,
    timeWindow: config.RATE_LIMIT_WINDOW,
    allowList: RATE_LIMIT_ALLOWLIST
  });

  await registerHealthRoutes(app);
  await registerLookupRoutes(app, deps);
  await registerDownloadRoutes(app, deps);

  return app;
}

if (process.env.NODE_ENV !== 'test') {
  buildServer()
    .then((app) =>
      app.listen({ port: config.PORT, host: '0.0.0.0' }).then(() => {
        app.log.info(`paper lookup API running on ${config.PORT}`);
      })
    )
    .catch((err) => {
      // eslint-disable-next-line no-console
      console.error('Failed to start server', err);
      process.exit(1);
    });
}
