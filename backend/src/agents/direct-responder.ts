import { isAgentReply } from '@chromedome/shared';
import type { Reply } from '@chromedome/shared';
import { JobHandle, JobPayloads, JobQueue } from '../jobs/types.js';
import { RandomSource } from '../utils/clock.js';
import { AGENT_ERRORS } from '../utils/error-messages.js';
import { Logger } from '../utils/logger.js';
import { PersonaCatalog } from './persona-catalog.js';
import { buildDirectReplyMessage, buildPersonaPrompt, loadRecentContext } from './reply-context.js';
import { DirectReplyOutcome, errorMessage, failure, JobResult, runAtBoundary } from './results.js';
import { GeneratingAgentDeps } from './types.js';

export const DIRECT_REPLY_MIN_DELAY_MS = 60_000;
export const DIRECT_REPLY_JITTER_MS = 30_000;

/**
 * Chooses what a human reply triggers. A reply nested under a persona's reply
 * earns a one-off direct answer after 60-90s; anything else bumps the
 * thread's schedules.
 */
export function routeUserReply(
  queue: JobQueue,
  random: RandomSource,
  userReply: Pick<Reply, 'id' | 'threadId' | 'content'>,
  parent: Pick<Reply, 'author'> | null
): Promise<JobHandle> {
  if (parent && isAgentReply(parent) && userReply.content) {
    return queue.enqueue(
      'forum.generate_direct_reply',
      {
        threadId: userReply.threadId,
        parentReplyId: userReply.id,
        userReplyContent: userReply.content
      },
      { delayMs: DIRECT_REPLY_MIN_DELAY_MS + random() * DIRECT_REPLY_JITTER_MS }
    );
  }
  return queue.enqueue('forum.bump_schedules', { threadId: userReply.threadId });
}

/**
 * One-off persona answer nested under a human reply. Independent of the
 * backoff schedules: it never reads or writes an AgentSchedule.
 */
export class DirectResponder {
  private catalog: PersonaCatalog;

  constructor(private readonly deps: GeneratingAgentDeps) {
    this.catalog = new PersonaCatalog(deps.store);
  }

  run(payload: JobPayloads['forum.generate_direct_reply']): Promise<JobResult<DirectReplyOutcome>> {
    const { threadId, parentReplyId } = payload;
    return runAtBoundary('DirectResponder', { threadId, parentReplyId }, () => this.respond(payload));
  }

  private async respond({
    threadId,
    parentReplyId,
    userReplyContent
  }: JobPayloads['forum.generate_direct_reply']): Promise<JobResult<DirectReplyOutcome>> {
    const { store, clock, random, generator } = this.deps;
    const context = { threadId, parentReplyId };

    const persona = await this.catalog.pickRandomActive(random);
    if (!persona) {
      Logger.error('[DirectResponder] No active personas', context);
      return failure(AGENT_ERRORS.NO_ACTIVE_PERSONAS);
    }

    const thread = await store.getThread(threadId);
    if (!thread) {
      Logger.error('[DirectResponder] Thread not found', context);
      return failure(AGENT_ERRORS.THREAD_NOT_FOUND);
    }

    const parent = await store.getReply(parentReplyId);
    if (!parent) {
      Logger.error('[DirectResponder] Parent reply not found', context);
      return failure(AGENT_ERRORS.PARENT_REPLY_NOT_FOUND);
    }

    const reply = await store.createReply({
      threadId,
      author: { kind: 'persona', personaId: persona.id },
      parentId: parentReplyId,
      content: null,
      status: 'pending',
      createdAt: clock.now()
    });

    try {
      await store.updateReply(reply.id, { status: 'processing' });
      Logger.jobs(`[DirectResponder] Generating ${persona.name} direct reply`, {
        ...context,
        personaId: persona.id,
        replyId: reply.id
      });

      const recent = await loadRecentContext(store, threadId, reply.id);
      const systemPrompt = buildPersonaPrompt(persona, thread, recent);
      const content = await generator.generate(systemPrompt, buildDirectReplyMessage(userReplyContent));

      await store.transaction(async tx => {
        await tx.updateReply(reply.id, { status: 'completed', content });
        await tx.touchThread(threadId, clock.now());
      });
    } catch (error) {
      Logger.error('[DirectResponder] Generation failed:', {
        ...context,
        personaId: persona.id,
        replyId: reply.id,
        error: errorMessage(error)
      });
      await store.updateReply(reply.id, { status: 'failed', content: AGENT_ERRORS.GENERATION_FALLBACK });
      return failure(errorMessage(error));
    }

    Logger.jobs(`[DirectResponder] ${persona.name} direct reply completed`, { ...context, replyId: reply.id });
    return { success: true, replyId: reply.id, personaName: persona.name };
  }
}
