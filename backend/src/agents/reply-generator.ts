import type { AgentSchedule, Persona, Reply, Thread } from '@chromedome/shared';
import { ForumTransaction } from '../database/types.js';
import { JobPayloads } from '../jobs/types.js';
import { addMinutes } from '../utils/clock.js';
import { AGENT_ERRORS } from '../utils/error-messages.js';
import { Logger } from '../utils/logger.js';
import { nextDelayMinutes } from './backoff.js';
import { buildPersonaPrompt, loadRecentContext, SCHEDULED_REPLY_MESSAGE } from './reply-context.js';
import { errorMessage, failure, GenerateReplyOutcome, JobResult, runAtBoundary } from './results.js';
import { GeneratingAgentDeps } from './types.js';

type GenerateReplyPayload = JobPayloads['forum.generate_reply'];

export type ScheduleState =
  | { status: 'ok'; schedule: AgentSchedule }
  | { status: 'not_found' }
  | { status: 'inactive' }
  | { status: 'stale_claim'; schedule: AgentSchedule };

/** Classifies a locked schedule against the claim the job carries. */
export function classifySchedule(schedule: AgentSchedule | null, claimToken: string): ScheduleState {
  if (!schedule) return { status: 'not_found' };
  if (!schedule.isActive) return { status: 'inactive' };
  if (schedule.claimToken !== claimToken) return { status: 'stale_claim', schedule };
  return { status: 'ok', schedule };
}

type Preparation =
  | { status: 'ready'; schedule: AgentSchedule; persona: Persona; thread: Thread; reply: Reply }
  | { status: 'aborted'; error: string; skipped: boolean };

/**
 * Generates one scheduled persona reply: lock and check the schedule, post a
 * pending placeholder, call the model, then complete the reply and advance
 * the schedule by the backoff table.
 */
export class ReplyGenerator {
  constructor(private readonly deps: GeneratingAgentDeps) {}

  run(payload: GenerateReplyPayload): Promise<JobResult<GenerateReplyOutcome>> {
    const { scheduleId, threadId, personaId } = payload;
    return runAtBoundary('ReplyGenerator', { scheduleId, threadId, personaId }, () => this.generate(payload));
  }

  private async generate(payload: GenerateReplyPayload): Promise<JobResult<GenerateReplyOutcome>> {
    const { store } = this.deps;
    const context = { scheduleId: payload.scheduleId, threadId: payload.threadId, personaId: payload.personaId };

    const prepared = await store.transaction(tx => this.prepare(tx, payload));
    if (prepared.status === 'aborted') {
      return failure(prepared.error, prepared.skipped);
    }

    const { schedule, persona, thread, reply } = prepared;
    let nextFireAt: Date | null;
    try {
      await store.updateReply(reply.id, { status: 'processing' });
      Logger.jobs(`[ReplyGenerator] Generating ${persona.name} reply`, { ...context, replyId: reply.id });

      const recent = await loadRecentContext(store, thread.id, reply.id);
      const systemPrompt = buildPersonaPrompt(persona, thread, recent);
      Logger.inference('[ReplyGenerator] System prompt:', systemPrompt);
      const content = await this.deps.generator.generate(systemPrompt, SCHEDULED_REPLY_MESSAGE);

      nextFireAt = await this.complete(reply.id, schedule, thread.id, content, payload.claimToken);
    } catch (error) {
      const rescheduledAt = await this.recordFailure(reply.id, schedule, payload.claimToken);
      Logger.error('[ReplyGenerator] Generation failed:', { ...context, replyId: reply.id, error: errorMessage(error) });
      Logger.scheduler('[ReplyGenerator] Rescheduled after failure', {
        ...context,
        nextFireAt: rescheduledAt?.toISOString() ?? null
      });
      return failure(errorMessage(error));
    }

    Logger.jobs(`[ReplyGenerator] ${persona.name} reply completed`, {
      ...context,
      replyId: reply.id,
      nextFireAt: nextFireAt?.toISOString() ?? null
    });

    return { success: true, replyId: reply.id, personaName: persona.name, nextFireAt };
  }

  private async prepare(tx: ForumTransaction, payload: GenerateReplyPayload): Promise<Preparation> {
    const context = { scheduleId: payload.scheduleId, threadId: payload.threadId, personaId: payload.personaId };
    const state = classifySchedule(await tx.lockSchedule(payload.scheduleId), payload.claimToken);

    switch (state.status) {
      case 'not_found':
        Logger.info('[ReplyGenerator] Schedule not found', context);
        return { status: 'aborted', error: AGENT_ERRORS.SCHEDULE_NOT_FOUND, skipped: true };
      case 'inactive':
        Logger.info('[ReplyGenerator] Schedule inactive', context);
        return { status: 'aborted', error: AGENT_ERRORS.SCHEDULE_INACTIVE, skipped: true };
      case 'stale_claim':
        Logger.info('[ReplyGenerator] Claim superseded', { ...context, claimToken: payload.claimToken });
        return { status: 'aborted', error: AGENT_ERRORS.STALE_CLAIM, skipped: true };
      case 'ok':
        break;
    }

    const { schedule } = state;
    const [persona, thread] = await Promise.all([
      tx.getPersona(schedule.personaId),
      tx.getThread(schedule.threadId)
    ]);

    if (!persona || !thread) {
      Logger.error(`[ReplyGenerator] ${persona ? 'Thread' : 'Persona'} not found, deactivating schedule`, context);
      await tx.updateSchedule(schedule.id, { isActive: false, claimToken: null, claimedAt: null });
      return {
        status: 'aborted',
        error: persona ? AGENT_ERRORS.THREAD_NOT_FOUND : AGENT_ERRORS.PERSONA_NOT_FOUND,
        skipped: false
      };
    }

    if (!persona.isActive) {
      Logger.info('[ReplyGenerator] Persona inactive, releasing claim', context);
      await tx.releaseClaim(schedule.id, payload.claimToken, this.deps.clock.now());
      return { status: 'aborted', error: AGENT_ERRORS.PERSONA_INACTIVE, skipped: true };
    }

    const reply = await tx.createReply({
      threadId: thread.id,
      author: { kind: 'persona', personaId: persona.id },
      parentId: null,
      content: null,
      status: 'pending',
      createdAt: this.deps.clock.now()
    });

    return { status: 'ready', schedule, persona, thread, reply };
  }

  private complete(
    replyId: string,
    schedule: AgentSchedule,
    threadId: string,
    content: string,
    claimToken: string
  ): Promise<Date | null> {
    return this.deps.store.transaction(async tx => {
      const now = this.deps.clock.now();
      await tx.updateReply(replyId, { status: 'completed', content });

      const current = await tx.lockSchedule(schedule.id);
      let next: Date | null = null;
      if (current) {
        const replyCount = current.replyCount + 1;
        const ownsClaim = current.claimToken === claimToken;
        next = ownsClaim
          ? earliest(addMinutes(now, nextDelayMinutes(replyCount)), current.nextFireAt)
          : current.nextFireAt;
        await tx.updateSchedule(schedule.id, {
          replyCount,
          lastReplyAt: now,
          ...(ownsClaim ? { nextFireAt: next, claimToken: null, claimedAt: null } : {})
        });
      }

      await tx.touchThread(threadId, now);
      return next;
    });
  }

  private recordFailure(replyId: string, schedule: AgentSchedule, claimToken: string): Promise<Date | null> {
    return this.deps.store.transaction(async tx => {
      await tx.updateReply(replyId, { status: 'failed', content: AGENT_ERRORS.GENERATION_FALLBACK });

      const current = await tx.lockSchedule(schedule.id);
      if (!current || current.claimToken !== claimToken) {
        return current?.nextFireAt ?? null;
      }
      const nextFireAt = earliest(
        addMinutes(this.deps.clock.now(), nextDelayMinutes(current.replyCount)),
        current.nextFireAt
      );
      await tx.updateSchedule(schedule.id, { nextFireAt, claimToken: null, claimedAt: null });
      return nextFireAt;
    });
  }
}

// A bump recorded while the claim was held wins over a later backoff time
function earliest(backoff: Date, pendingBump: Date | null): Date {
  return pendingBump && pendingBump.getTime() < backoff.getTime() ? pendingBump : backoff;
}
