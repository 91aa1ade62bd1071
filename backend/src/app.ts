import Fastify from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { config as defaultConfig, type AppConfig } from './config/app.js';
import { createOriginPolicy } from './config/cors.js';
import { sanitizeInput } from './middleware/sanitize.js';
import { registerRoutes, type AppServices } from './routes/index.js';
import { TURN_ROUTE } from './routes/chatStream.js';

export async function buildApp(services: AppServices, appConfig: AppConfig = defaultConfig) {
  const isDevelopment = appConfig.NODE_ENV === 'development';
  const app = Fastify({
    logger: {
      name: appConfig.PROJECT_NAME,
      level: appConfig.LOG_LEVEL,
      transport: isDevelopment
        ? {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname'
            }
          }
        : undefined
    }
  });

  const originPolicy = createOriginPolicy(appConfig.CORS_ORIGIN, isDevelopment);

  await app.register(cors, {
    origin: (origin, cb) => {
      if (originPolicy.isAllowed(origin)) {
        cb(null, true);
        return;
      }
      app.log.warn({ origin, allowedOrigins: originPolicy.allowedOrigins }, 'CORS origin rejected');
      cb(new Error('Not allowed by CORS'), false);
    },
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS']
  });

  await app.register(rateLimit, {
    max: appConfig.RATE_LIMIT_MAX_REQUESTS,
    timeWindow: appConfig.RATE_LIMIT_WINDOW_MS,
    errorResponseBuilder: () => ({
      error: 'Too many requests',
      message: 'Please try again later.'
    })
  });

  app.addHook('preHandler', sanitizeInput);

  app.addHook('onRequest', async (request, reply) => {
    // Turn streams stay open until the turn ends.
    if (request.method === 'POST' && request.routeOptions.url === TURN_ROUTE) {
      return;
    }

    const timer = setTimeout(() => {
      if (!reply.sent) {
        reply.code(408).send({ error: 'Request timeout' });
      }
    }, appConfig.REQUEST_TIMEOUT_MS);

    reply.raw.on('close', () => clearTimeout(timer));
    reply.raw.on('finish', () => clearTimeout(timer));
  });

  await registerRoutes(app, services);
  return app;
}
