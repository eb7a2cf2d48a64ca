import { JobPayloads } from '../jobs/types.js';
import { addMinutes, addSeconds } from '../utils/clock.js';
import { Logger } from '../utils/logger.js';
import { BumpOutcome, JobResult, runAtBoundary } from './results.js';
import { AgentDeps } from './types.js';

// Schedules already due within this window are left alone
export const BUMP_THRESHOLD_MINUTES = 2;
export const BUMP_BASE_SECONDS = 60;
export const BUMP_STAGGER_SECONDS = 20;
export const BUMP_JITTER_SECONDS = 10;

/**
 * Pulls a thread's persona schedules forward after a human posts, staggered
 * about 20s apart. A schedule is only ever moved earlier.
 */
export class ReactiveBumper {
  constructor(private readonly deps: AgentDeps) {}

  run({ threadId }: JobPayloads['forum.bump_schedules']): Promise<JobResult<BumpOutcome>> {
    return runAtBoundary('ReactiveBumper', { threadId }, () => this.bump(threadId));
  }

  private async bump(threadId: string): Promise<JobResult<BumpOutcome>> {
    const { store, clock, random } = this.deps;
    const schedules = await store.listActiveSchedulesForThread(threadId);
    if (schedules.length === 0) {
      Logger.scheduler('[ReactiveBumper] No active schedules', { threadId });
      return { success: true, bumped: 0 };
    }

    const now = clock.now();
    const threshold = addMinutes(now, BUMP_THRESHOLD_MINUTES);
    let bumped = 0;

    for (const [index, schedule] of schedules.entries()) {
      const current = schedule.nextFireAt;
      if (current !== null && current.getTime() <= threshold.getTime()) continue;

      const delaySeconds =
        BUMP_BASE_SECONDS + index * BUMP_STAGGER_SECONDS + Math.floor(random() * BUMP_JITTER_SECONDS);
      const candidate = addSeconds(now, delaySeconds);
      if (current !== null && candidate.getTime() >= current.getTime()) continue;

      if (await store.bumpSchedule(schedule.id, candidate, threshold)) {
        bumped++;
        Logger.scheduler(`[ReactiveBumper] Bumped schedule to ${candidate.toISOString()} (${delaySeconds}s)`, {
          threadId,
          scheduleId: schedule.id,
          personaId: schedule.personaId
        });
      }
    }

    Logger.scheduler(`[ReactiveBumper] Bumped ${bumped} schedules`, { threadId });
    return { success: true, bumped };
  }
}
