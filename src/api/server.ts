import 'dotenv/config';
import { loadAppConfig } from '../config/app.js';
import { loadSessionConfig } from '../config/session.js';
import { preloadPrompts } from '../core/prompts.js';
import { createServices } from '../services.js';
import { createLogger } from '../util/logging.js';
import { enableDefaultMetrics } from '../util/metrics.js';
import { createApp } from './app.js';

const log = createLogger();

async function main(): Promise<void> {
  const config = loadAppConfig();
  const sessionConfig = loadSessionConfig();
  await preloadPrompts();
  enableDefaultMetrics();

  const services = createServices({ app: config, session: sessionConfig, log });
  log.info({ ttlSec: sessionConfig.ttlSec, maxMessages: sessionConfig.maxMessages }, 'Session store initialized');

  const server = createApp(services, log).listen(config.port, () => log.info({ port: config.port }, 'HTTP server started'));

  const shutdown = (signal: string) => {
    log.info({ signal }, 'shutting down');
    server.close(() => {
      services.close();
      process.exit(0);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'server failed to start');
  process.exit(1);
});
