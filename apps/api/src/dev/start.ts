import { buildApp } from '../app';
import { env } from '../config/env';
import { createAppServices } from '../lib/services';

const { services, redis, logger } = createAppServices(env);
await services.governor.start();

const app = await buildApp({ services, logLevel: env.LOG_LEVEL });

const shutdown = async (signal: string) => {
  logger.info({ signal }, 'shutting down');
  await app.close();
  await redis?.quit();
  process.exit(0);
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, (received) => {
    shutdown(received).catch((error: unknown) => {
      logger.error({ err: error }, 'shutdown failed');
      process.exit(1);
    });
  });
}

await app.listen({ host: env.HOST, port: env.PORT });
logger.info(
  { url: `http://${env.HOST}:${env.PORT}`, platforms: services.platforms.available },
  'tracklift API listening',
);
