import { DuplicateScheduleError, NewSchedule } from '../database/types.js';
import { JobPayloads } from '../jobs/types.js';
import { addMinutes, randomInt } from '../utils/clock.js';
import { AGENT_ERRORS } from '../utils/error-messages.js';
import { Logger } from '../utils/logger.js';
import { PersonaCatalog, sampleWithoutReplacement } from './persona-catalog.js';
import { failure, InitializeSchedulesOutcome, JobResult, runAtBoundary } from './results.js';
import { AgentDeps } from './types.js';

export const MIN_PARTICIPANTS = 3;
export const MAX_PARTICIPANTS = 5;

/**
 * Picks the personas that will take part in a new thread and gives each a
 * staggered first fire time: persona i fires at now + (2 + i + jitter) minutes.
 */
export class ScheduleInitializer {
  private catalog: PersonaCatalog;

  constructor(private readonly deps: AgentDeps) {
    this.catalog = new PersonaCatalog(deps.store);
  }

  run({ threadId }: JobPayloads['forum.initialize_schedules']): Promise<JobResult<InitializeSchedulesOutcome>> {
    return runAtBoundary('ScheduleInitializer', { threadId }, () => this.initialize(threadId));
  }

  private async initialize(threadId: string): Promise<JobResult<InitializeSchedulesOutcome>> {
    const { store, clock, random } = this.deps;

    const thread = await store.getThread(threadId);
    if (!thread) {
      Logger.error(`[ScheduleInitializer] Thread not found`, { threadId });
      return failure(AGENT_ERRORS.THREAD_NOT_FOUND);
    }

    // Redelivered job: the first delivery already created the schedules
    const existing = await store.countSchedulesForThread(threadId);
    if (existing > 0) {
      Logger.scheduler(`[ScheduleInitializer] Thread already has ${existing} schedules`, { threadId });
      return { success: true, threadId, participants: existing, alreadyInitialized: true };
    }

    const personas = await this.catalog.listActive();
    if (personas.length === 0) {
      Logger.warn(`[ScheduleInitializer] No active personas`, { threadId });
      return failure(AGENT_ERRORS.NO_ACTIVE_PERSONAS);
    }

    const participants = Math.min(randomInt(random, MIN_PARTICIPANTS, MAX_PARTICIPANTS), personas.length);
    const selected = sampleWithoutReplacement(personas, participants, random);

    const now = clock.now();
    const entries: NewSchedule[] = selected.map((persona, i) => ({
      personaId: persona.id,
      nextFireAt: addMinutes(now, 2 + i + random())
    }));

    try {
      await store.createSchedules(threadId, entries, now);
    } catch (error) {
      if (error instanceof DuplicateScheduleError) {
        Logger.error(`[ScheduleInitializer] Duplicate schedule, batch rolled back`, {
          threadId,
          personaId: error.personaId
        });
        return failure(AGENT_ERRORS.DUPLICATE_SCHEDULE);
      }
      throw error;
    }

    selected.forEach((persona, i) => {
      Logger.scheduler(`[ScheduleInitializer] Scheduled ${persona.name}`, {
        threadId,
        personaId: persona.id,
        nextFireAt: entries[i]?.nextFireAt.toISOString()
      });
    });

    return { success: true, threadId, participants };
  }
}
