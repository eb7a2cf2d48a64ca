import { createServer } from 'http';
import dotenv from 'dotenv';
import { createApp } from './app.js';
import { loadConfig } from './config/loader.js';
import { createRuntime } from './runtime.js';
import { systemClock } from './utils/clock.js';
import { CONFIG_ERRORS } from './utils/error-messages.js';
import { Logger, logSettings } from './utils/logger.js';

dotenv.config();

async function startServer() {
  try {
    logSettings();
    const config = loadConfig();
    if (config.usingDefaultJwtSecret) {
      Logger.warn(CONFIG_ERRORS.DEFAULT_JWT_SECRET);
    }

    const runtime = await createRuntime(config);
    Logger.info('Database initialized');

    const app = createApp({
      store: runtime.store,
      queue: runtime.queue,
      clock: systemClock,
      random: Math.random,
      jwtSecret: config.jwtSecret,
      frontendUrl: config.frontendUrl
    });
    const server = createServer(app);

    // The in-memory queue can only be served from this process
    if (config.jobs.runWorker || runtime.inProcess) {
      await runtime.startWorker();
      Logger.info('Agent dispatcher and job worker running in-process');
    }

    server.listen(config.port, config.host, () => {
      Logger.info(`HTTP Server running on ${config.host}:${config.port}`);
      Logger.info(`API endpoint: http://${config.host}:${config.port}/api`);
    });

    let shuttingDown = false;
    const shutdown = async (signal: string) => {
      if (shuttingDown) return;
      shuttingDown = true;
      Logger.info(`${signal} received, shutting down gracefully...`);
      server.close();
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

void startServer();
