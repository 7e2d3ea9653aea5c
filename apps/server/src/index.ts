import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { config as loadEnv } from 'dotenv';
import { ConfigError, createLogger, errorMessage } from '@agent-studio/core';
import { createStudio } from './app.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Load .env from project root
loadEnv({ path: resolve(__dirname, '..', '..', '..', '.env') });

async function main() {
  const studio = createStudio(process.env);
  const log = createLogger('main');
  log.info('Starting agent studio');

  await studio.start();

  const shutdown = async (signal: string) => {
    log.info({ signal }, 'Shutting down');
    try {
      await studio.stop();
      log.info('Shutdown complete');
      process.exit(0);
    } catch (err) {
      log.error({ err: errorMessage(err) }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err) => {
  const log = createLogger('main');
  if (err instanceof ConfigError) {
    log.fatal({ issues: err.issues }, 'Invalid configuration');
  } else {
    log.fatal({ err: errorMessage(err) }, 'Fatal error');
  }
  process.exit(1);
});
