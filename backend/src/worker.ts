import dotenv from 'dotenv';
import { loadConfig } from './config/loader.js';
import { createRuntime } from './runtime.js';
import { CONFIG_ERRORS } from './utils/error-messages.js';
import { Logger, logSettings } from './utils/logger.js';

dotenv.config();

// Dispatcher plus job worker, run beside one or more HTTP processes
async function startWorker() {
  try {
    logSettings();
    const config = loadConfig();
    if (!config.databaseUrl) {
      throw new Error('DATABASE_URL is required to run a standalone worker');
    }

    const runtime = await createRuntime(config);
    await runtime.startWorker();
    Logger.info('Forum worker running');

    let shuttingDown = false;
    const shutdown = async (signal: string) => {
      if (shuttingDown) return;
      shuttingDown = true;
      Logger.info(`${signal} received, stopping worker...`);
      try {
        await runtime.shutdown();
        process.exit(0);
      } catch (error) {
        Logger.error('Shutdown failed:', error);
        process.exit(1);
      }
    };
    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  } catch (error) {
    Logger.error(CONFIG_ERRORS.STARTUP_FAILED, error);
    process.exit(1);
  }
}

void startWorker();
