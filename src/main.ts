import { loadConfig } from './config.js';
import { createService } from './app.js';
import { createServiceLogger } from './logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createServiceLogger();

  logger.info('ReplyGuard starting...');

  const { server } = await createService(config, { logger });

  try {
    await server.listen({ port: config.server.port, host: config.server.host });
    logger.info(`ReplyGuard listening on ${config.server.host}:${config.server.port}`);
  } catch (err) {
    logger.error({ err }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch(err => {
  console.error('Fatal startup error:', err);
  process.exit(1);
});
