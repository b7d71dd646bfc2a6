import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './observability/logger';

async function main(): Promise<void> {
  const { app } = await buildApp();

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');
    await app.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Start server
  try {
    await app.listen({ port: env.port, host: env.host });
    logger.info({
      host: env.host,
      port: env.port,
      env: env.nodeEnv,
      model: env.openai.apiKey ? env.openai.model : undefined,
    }, 'Bio classifier started');
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((err) => {
  logger.fatal({ err }, 'Failed to initialize');
  process.exit(1);
});
