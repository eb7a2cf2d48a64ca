import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { errorMessage } from '../agents/results.js';
import { PgDriver, toDate } from '../database/postgres.js';
import { Logger } from '../utils/logger.js';
import { runJob } from './registry.js';
import {
  EnqueueOptions,
  JobHandle,
  JobHandlers,
  JobName,
  JobPayloads,
  JobPayloadSchemas,
  JobQueue
} from './types.js';

/**
 * Durable queue over the forum_jobs table. Producers insert rows; any number
 * of PgJobWorker processes claim them with FOR UPDATE SKIP LOCKED.
 */
export class PgJobQueue implements JobQueue {
  constructor(private readonly driver: PgDriver) {}

  async enqueue<K extends JobName>(name: K, payload: JobPayloads[K], options?: EnqueueOptions): Promise<JobHandle> {
    const schema: z.ZodType<unknown> = JobPayloadSchemas[name];
    schema.parse(payload);

    const id = uuidv4();
    const runAt = new Date(Date.now() + Math.max(0, options?.delayMs ?? 0));
    const result = await this.driver.query(
      `INSERT INTO forum_jobs (id, name, payload, run_at) VALUES ($1, $2, $3, $4) RETURNING run_at`,
      [id, name, JSON.stringify(payload), runAt]
    );

    Logger.jobs(`[PgJobQueue] Enqueued ${name}`, { jobId: id, runAt: runAt.toISOString() });
    return { id, name, runAt: result.rows[0] ? toDate(result.rows[0].run_at) : runAt };
  }
}

export interface PgJobWorkerOptions {
  concurrency: number;
  pollIntervalMs: number;
  // Running jobs not finished within this window are handed out again
  staleAfterMinutes: number;
}

interface ClaimedJob {
  id: string;
  name: string;
  payload: unknown;
  attempts: number;
}

export class PgJobWorker {
  private loops: Promise<void>[] = [];
  private stopped = true;

  constructor(
    private readonly driver: PgDriver,
    private readonly handlers: JobHandlers,
    private readonly options: PgJobWorkerOptions
  ) {}

  async start(): Promise<void> {
    if (!this.stopped) return;
    this.stopped = false;
    await this.requeueStale();
    this.loops = Array.from({ length: this.options.concurrency }, (_, index) => this.loop(index));
    Logger.jobs(`[PgJobWorker] Started ${this.options.concurrency} loops`);
  }

  async stop(): Promise<void> {
    this.stopped = true;
    await Promise.all(this.loops);
    this.loops = [];
    Logger.jobs('[PgJobWorker] Stopped');
  }

  /** Claims and runs at most one ready job. Returns false when none was ready. */
  async runNext(): Promise<boolean> {
    const job = await this.claimNext();
    if (!job) return false;
    await this.execute(job);
    return true;
  }

  private async loop(index: number): Promise<void> {
    while (!this.stopped) {
      try {
        if (await this.runNext()) continue;
      } catch (error) {
        Logger.error(`[PgJobWorker] Loop ${index} error:`, errorMessage(error));
      }
      await this.sleep(this.options.pollIntervalMs);
    }
  }

  private async requeueStale(): Promise<void> {
    const result = await this.driver.query(
      `UPDATE forum_jobs SET status = 'queued', updated_at = NOW()
       WHERE status = 'running' AND updated_at < NOW() - make_interval(mins => $1)`,
      [this.options.staleAfterMinutes]
    );
    if ((result.rowCount ?? 0) > 0) {
      Logger.warn(`[PgJobWorker] Requeued ${result.rowCount} stale jobs`);
    }
  }

  private async claimNext(): Promise<ClaimedJob | null> {
    const result = await this.driver.query(
      `UPDATE forum_jobs
       SET status = 'running', attempts = attempts + 1, updated_at = NOW()
       WHERE id = (
         SELECT id FROM forum_jobs
         WHERE status = 'queued' AND run_at <= NOW()
         ORDER BY run_at ASC, created_at ASC
         FOR UPDATE SKIP LOCKED
         LIMIT 1
       )
       RETURNING id, name, payload, attempts`
    );
    const row = result.rows[0];
    if (!row) return null;
    return {
      id: String(row.id),
      name: String(row.name),
      payload: row.payload,
      attempts: Number(row.attempts)
    };
  }

  private async execute(job: ClaimedJob): Promise<void> {
    const context = { jobId: job.id, attempts: job.attempts };
    let status: 'completed' | 'failed';
    let lastError: string | null = null;

    try {
      const result = await runJob(this.handlers, job.name, job.payload);
      status = 'completed';
      if (!result.success) lastError = result.error;
      Logger.jobs(`[PgJobWorker] ${job.name} ${result.success ? 'succeeded' : `returned failure: ${result.error}`}`, context);
    } catch (error) {
      status = 'failed';
      lastError = errorMessage(error);
      Logger.error(`[PgJobWorker] ${job.name} crashed:`, { ...context, error: lastError });
    }

    await this.driver.query(
      'UPDATE forum_jobs SET status = $2, last_error = $3, updated_at = NOW() WHERE id = $1',
      [job.id, status, lastError]
    );
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
