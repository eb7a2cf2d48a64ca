import { Dispatcher } from './agents/dispatcher.js';
import { AppConfig } from './config/types.js';
import { InMemoryForumStore } from './database/memory-store.js';
import { migrate } from './database/migrate.js';
import { createPool, PgDriver, PgForumStore, poolDriver } from './database/postgres.js';
import { loadPersonaSeeds, seedPersonas } from './database/seed.js';
import { ForumStore } from './database/types.js';
import { InProcessJobQueue } from './jobs/in-process-queue.js';
import { PgJobQueue, PgJobWorker } from './jobs/postgres-queue.js';
import { createJobHandlers } from './jobs/registry.js';
import { JobHandlers, JobQueue } from './jobs/types.js';
import { AnthropicTextGenerator } from './services/anthropic.js';
import { MockTextGenerator } from './services/mock-service.js';
import { TextGenerator } from './services/text-generator.js';
import { systemClock } from './utils/clock.js';
import { API_KEY_ERRORS, CONFIG_ERRORS } from './utils/error-messages.js';
import { Logger } from './utils/logger.js';

export interface Runtime {
  store: ForumStore;
  queue: JobQueue;
  /** Starts the dispatcher timer and whatever executes queued jobs. */
  startWorker(): Promise<void>;
  /** Whether jobs can only run inside this process. */
  inProcess: boolean;
  shutdown(): Promise<void>;
}

function createTextGenerator(config: AppConfig): TextGenerator {
  if (config.llm.demoMode) {
    Logger.info('[Runtime] DEMO_MODE: persona replies use canned text');
    return new MockTextGenerator();
  }
  if (!config.llm.apiKey) {
    Logger.warn(API_KEY_ERRORS.ANTHROPIC_MISSING);
  }
  return new AnthropicTextGenerator(config.llm);
}

/**
 * Wires the store, queue and agent jobs for the configured backend:
 * PostgreSQL with a durable queue, or an in-memory store with timer-driven jobs.
 */
export async function createRuntime(config: AppConfig): Promise<Runtime> {
  const clock = systemClock;
  const random = Math.random;
  const generator = createTextGenerator(config);

  if (config.databaseUrl) {
    const driver: PgDriver = poolDriver(createPool(config.databaseUrl));
    await migrate(driver, { schemaPath: config.paths.schema, personasPath: config.paths.personas });

    const store = new PgForumStore(driver);
    const queue = new PgJobQueue(driver);
    const handlers: JobHandlers = createJobHandlers({ store, clock, random, generator });
    const dispatcher = new Dispatcher({ store, queue, clock, random }, config.scheduler);
    const worker = new PgJobWorker(driver, handlers, {
      concurrency: config.jobs.concurrency,
      pollIntervalMs: config.jobs.pollIntervalMs,
      staleAfterMinutes: config.scheduler.stallTimeoutMinutes
    });
    let started = false;

    return {
      store,
      queue,
      inProcess: false,
      async startWorker() {
        started = true;
        dispatcher.start(config.scheduler.dispatchIntervalSeconds);
        await worker.start();
      },
      async shutdown() {
        if (started) {
          await dispatcher.stop();
          await worker.stop();
        }
        await store.close();
      }
    };
  }

  Logger.warn(CONFIG_ERRORS.NO_DATABASE);
  const store = new InMemoryForumStore();
  await seedPersonas(store, await loadPersonaSeeds(config.paths.personas), clock.now());

  const queue = new InProcessJobQueue(createJobHandlers({ store, clock, random, generator }), {
    concurrency: config.jobs.concurrency
  });
  const dispatcher = new Dispatcher({ store, queue, clock, random }, config.scheduler);

  return {
    store,
    queue,
    inProcess: true,
    async startWorker() {
      dispatcher.start(config.scheduler.dispatchIntervalSeconds);
    },
    async shutdown() {
      await dispatcher.stop();
      await queue.close();
      await store.close();
    }
  };
}
