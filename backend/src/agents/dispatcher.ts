import { v4 as uuidv4 } from 'uuid';
import { addMinutes } from '../utils/clock.js';
import { Logger } from '../utils/logger.js';
import { DispatchOutcome, errorMessage, failure, JobResult } from './results.js';
import { QueueingAgentDeps } from './types.js';

export interface DispatcherOptions {
  // Claims older than this are assumed lost and released
  stallTimeoutMinutes: number;
}

/**
 * Periodic scan for due schedules. Each due schedule is claimed with a
 * conditional update and handed to a generation job; no LLM work happens here.
 */
export class Dispatcher {
  private running: Promise<JobResult<DispatchOutcome>> | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly deps: QueueingAgentDeps,
    private readonly options: DispatcherOptions
  ) {}

  /** Runs one tick. A tick requested while another runs joins the running one. */
  tick(): Promise<JobResult<DispatchOutcome>> {
    if (!this.running) {
      this.running = this.dispatch().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  start(intervalSeconds: number): void {
    if (this.timer) return;
    Logger.scheduler(`[Dispatcher] Started, interval ${intervalSeconds}s`);
    this.timer = setInterval(() => {
      void this.tick();
    }, intervalSeconds * 1000);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      Logger.scheduler('[Dispatcher] Stopped');
    }
    if (this.running) {
      await this.running;
    }
  }

  private async dispatch(): Promise<JobResult<DispatchOutcome>> {
    try {
      const now = this.deps.clock.now();
      const recovered = await this.recoverStalledClaims(now);
      const { queued, skipped } = await this.dispatchDue(now);

      if (queued > 0 || skipped > 0 || recovered > 0) {
        Logger.scheduler(`[Dispatcher] Tick queued=${queued} skipped=${skipped} recovered=${recovered}`);
      } else {
        Logger.debug('[Dispatcher] Tick with nothing due');
      }
      return { success: true, queued, skipped, recovered };
    } catch (error) {
      Logger.error('[Dispatcher] Tick failed:', error);
      return failure(errorMessage(error));
    }
  }

  private async recoverStalledClaims(now: Date): Promise<number> {
    const { store } = this.deps;
    const stalled = await store.listStalledSchedules(addMinutes(now, -this.options.stallTimeoutMinutes));
    let recovered = 0;

    for (const schedule of stalled) {
      const released = schedule.claimToken
        ? await store.releaseClaim(schedule.id, schedule.claimToken, now)
        : (await store.updateSchedule(schedule.id, { nextFireAt: now, claimedAt: null })) !== null;
      if (released) {
        recovered++;
        Logger.warn('[Dispatcher] Released stalled claim', {
          scheduleId: schedule.id,
          threadId: schedule.threadId,
          personaId: schedule.personaId,
          claimedAt: schedule.claimedAt?.toISOString() ?? null
        });
      }
    }
    return recovered;
  }

  private async dispatchDue(now: Date): Promise<{ queued: number; skipped: number }> {
    const { store, queue } = this.deps;
    const due = await store.listDueSchedules(now);
    let queued = 0;
    let skipped = 0;

    for (const schedule of due) {
      const context = {
        scheduleId: schedule.id,
        threadId: schedule.threadId,
        personaId: schedule.personaId
      };
      const expected = schedule.nextFireAt;
      if (!expected) {
        skipped++;
        continue;
      }

      const claimToken = uuidv4();
      const claimed = await store.claimSchedule(schedule.id, expected, { claimToken, claimedAt: now });
      if (!claimed) {
        Logger.debug('[Dispatcher] Lost claim race', context);
        skipped++;
        continue;
      }

      try {
        await queue.enqueue('forum.generate_reply', { ...context, claimToken });
        queued++;
        Logger.scheduler('[Dispatcher] Queued reply', context);
      } catch (error) {
        Logger.error('[Dispatcher] Enqueue failed, releasing claim', { ...context, error: errorMessage(error) });
        await store.releaseClaim(schedule.id, claimToken, expected);
        skipped++;
      }
    }

    return { queued, skipped };
  }
}
