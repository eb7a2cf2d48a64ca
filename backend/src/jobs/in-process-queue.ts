import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { errorMessage } from '../agents/results.js';
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

interface QueuedJob {
  id: string;
  name: JobName;
  payload: unknown;
}

export class QueueClosedError extends Error {
  constructor() {
    super('Job queue is closed');
    this.name = 'QueueClosedError';
  }
}

export interface InProcessQueueOptions {
  concurrency: number;
}

/**
 * Timer-backed queue for single-process deployments and tests. Delayed jobs
 * wait on setTimeout; at most `concurrency` handlers run at once. Jobs are
 * lost on restart.
 */
export class InProcessJobQueue implements JobQueue {
  private ready: QueuedJob[] = [];
  private timers = new Set<NodeJS.Timeout>();
  private active = 0;
  private idleWaiters: Array<() => void> = [];
  private closed = false;

  constructor(
    private readonly handlers: JobHandlers,
    private readonly options: InProcessQueueOptions = { concurrency: 4 }
  ) {}

  async enqueue<K extends JobName>(name: K, payload: JobPayloads[K], options?: EnqueueOptions): Promise<JobHandle> {
    if (this.closed) throw new QueueClosedError();

    const schema: z.ZodType<unknown> = JobPayloadSchemas[name];
    schema.parse(payload);

    const delayMs = Math.max(0, options?.delayMs ?? 0);
    const job: QueuedJob = { id: uuidv4(), name, payload };
    const runAt = new Date(Date.now() + delayMs);

    if (delayMs > 0) {
      const timer = setTimeout(() => {
        this.timers.delete(timer);
        this.push(job);
      }, delayMs);
      this.timers.add(timer);
    } else {
      this.push(job);
    }

    Logger.jobs(`[JobQueue] Enqueued ${name}`, { jobId: job.id, delayMs });
    return { id: job.id, name, runAt };
  }

  /** Number of jobs waiting on a timer or for a free slot, plus those running. */
  size(): number {
    return this.timers.size + this.ready.length + this.active;
  }

  /** Resolves once no job is waiting or running. */
  onIdle(): Promise<void> {
    if (this.size() === 0) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  /** Drops delayed jobs that have not fired yet and waits for running ones. */
  async close(): Promise<void> {
    this.closed = true;
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
    if (this.size() === 0) this.notifyIdle();
    await this.onIdle();
  }

  private push(job: QueuedJob): void {
    this.ready.push(job);
    this.drain();
  }

  private drain(): void {
    while (this.active < this.options.concurrency) {
      const job = this.ready.shift();
      if (!job) break;
      this.active++;
      void this.execute(job).finally(() => {
        this.active--;
        this.drain();
        if (this.size() === 0) this.notifyIdle();
      });
    }
  }

  private async execute(job: QueuedJob): Promise<void> {
    const startTime = Date.now();
    try {
      const result = await runJob(this.handlers, job.name, job.payload);
      if (result.success) {
        Logger.jobs(`[JobQueue] ${job.name} completed in ${Date.now() - startTime}ms`, { jobId: job.id });
      } else {
        Logger.jobs(`[JobQueue] ${job.name} finished without success: ${result.error}`, { jobId: job.id });
      }
    } catch (error) {
      Logger.error(`[JobQueue] ${job.name} crashed:`, { jobId: job.id, error: errorMessage(error) });
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
