import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { AgentSchedule, Persona, Thread } from '@chromedome/shared';
import { InMemoryForumStore } from '../database/memory-store.js';
import { AGENT_ERRORS } from '../utils/error-messages.js';
import {
  ALICE,
  createThread,
  makePersona,
  ManualClock,
  seededStore,
  stubGenerator,
  T0
} from '../test-support/fixtures.js';
import { classifySchedule, ReplyGenerator } from './reply-generator.js';
import { SCHEDULED_REPLY_MESSAGE } from './reply-context.js';

const at = (minutes: number) => new Date(T0.getTime() + minutes * 60_000);
const TOKEN = '9a1b2c3d-0000-4000-8000-000000000001';

describe('ReplyGenerator', () => {
  let store: InMemoryForumStore;
  let personas: Persona[];
  let thread: Thread;
  let clock: ManualClock;

  beforeEach(async () => {
    ({ store, personas } = await seededStore(2));
    thread = await createThread(store);
    clock = new ManualClock(at(3));
  });

  async function claimedSchedule(persona: Persona = personas[0], replyCount = 0): Promise<AgentSchedule> {
    const [schedule] = await store.createSchedules(thread.id, [{ personaId: persona.id, nextFireAt: at(2) }], T0);
    if (replyCount > 0) await store.updateSchedule(schedule.id, { replyCount });
    await store.claimSchedule(schedule.id, at(2), { claimToken: TOKEN, claimedAt: at(2) });
    return schedule;
  }

  function payload(schedule: AgentSchedule, claimToken = TOKEN) {
    return { scheduleId: schedule.id, threadId: schedule.threadId, personaId: schedule.personaId, claimToken };
  }

  it('posts the reply and schedules the next one from the backoff table', async () => {
    const schedule = await claimedSchedule();
    const { generator, generate } = stubGenerator('Shave it. You will feel free.');

    const result = await new ReplyGenerator({ store, clock, random: Math.random, generator }).run(payload(schedule));

    expect(result).toEqual({
      success: true,
      replyId: expect.any(String),
      personaName: 'Persona 1',
      nextFireAt: at(8)
    });
    expect(generate).toHaveBeenCalledWith(expect.stringContaining('You are persona 1.'), SCHEDULED_REPLY_MESSAGE);

    const [reply] = await store.listReplies(thread.id);
    expect(reply).toMatchObject({
      author: { kind: 'persona', personaId: personas[0].id },
      parentId: null,
      content: 'Shave it. You will feel free.',
      status: 'completed',
      createdAt: at(3)
    });

    expect(await store.getSchedule(schedule.id)).toMatchObject({
      replyCount: 1,
      lastReplyAt: at(3),
      nextFireAt: at(8),
      claimToken: null,
      claimedAt: null
    });
    expect((await store.getThread(thread.id))?.lastActivityAt).toEqual(at(3));
  });

  it('switches to the daily cadence once the table is exhausted', async () => {
    const schedule = await claimedSchedule(personas[0], 8);
    const { generator } = stubGenerator();

    const result = await new ReplyGenerator({ store, clock, random: Math.random, generator }).run(payload(schedule));

    expect(result.success && result.nextFireAt).toEqual(at(3 + 1440));
    expect((await store.getSchedule(schedule.id))?.replyCount).toBe(9);
  });

  it('feeds the recent discussion into the prompt', async () => {
    await store.createReply({
      threadId: thread.id, author: { kind: 'user', userId: ALICE.id }, parentId: null,
      content: 'I went with a number two guard.', status: 'completed', createdAt: at(1)
    });
    const schedule = await claimedSchedule();
    const { generator, generate } = stubGenerator();

    await new ReplyGenerator({ store, clock, random: Math.random, generator }).run(payload(schedule));

    const [systemPrompt] = generate.mock.calls[0] ?? [];
    expect(systemPrompt).toContain('RECENT DISCUSSION:\n\nAlice: I went with a number two guard.\n');
  });

  it('does nothing for a superseded claim', async () => {
    const schedule = await claimedSchedule();
    const { generator, generate } = stubGenerator();

    const result = await new ReplyGenerator({ store, clock, random: Math.random, generator })
      .run(payload(schedule, 'stale-token'));

    expect(result).toEqual({ success: false, error: AGENT_ERRORS.STALE_CLAIM, skipped: true });
    expect(generate).not.toHaveBeenCalled();
    expect(await store.listReplies(thread.id)).toEqual([]);
    expect((await store.getSchedule(schedule.id))?.claimToken).toBe(TOKEN);
  });

  it('skips deleted and inactive schedules', async () => {
    const schedule = await claimedSchedule();
    const { generator } = stubGenerator();
    const agent = new ReplyGenerator({ store, clock, random: Math.random, generator });

    await store.updateSchedule(schedule.id, { isActive: false });
    expect(await agent.run(payload(schedule))).toEqual({
      success: false, error: AGENT_ERRORS.SCHEDULE_INACTIVE, skipped: true
    });

    await store.deleteThread(thread.id);
    expect(await agent.run(payload(schedule))).toEqual({
      success: false, error: AGENT_ERRORS.SCHEDULE_NOT_FOUND, skipped: true
    });
  });

  it('marks the reply failed and reschedules at the current backoff step', async () => {
    const schedule = await claimedSchedule(personas[0], 2);
    const { generator } = stubGenerator(new Error('rate limited'));

    const result = await new ReplyGenerator({ store, clock, random: Math.random, generator }).run(payload(schedule));

    expect(result).toEqual({ success: false, error: 'rate limited' });
    const [reply] = await store.listReplies(thread.id);
    expect(reply.status).toBe('failed');
    expect(reply.content).toBe(AGENT_ERRORS.GENERATION_FALLBACK);
    expect(await store.getSchedule(schedule.id)).toMatchObject({
      replyCount: 2,
      nextFireAt: at(3 + 15),
      claimToken: null
    });
  });

  it('marks the reply failed when saving the completed reply throws', async () => {
    const schedule = await claimedSchedule();
    const { generator } = stubGenerator('Never posted.');
    const transaction = store.transaction.bind(store);
    vi.spyOn(store, 'transaction')
      .mockImplementationOnce(transaction)
      .mockImplementationOnce(async () => {
        throw new Error('db down');
      });

    const result = await new ReplyGenerator({ store, clock, random: Math.random, generator }).run(payload(schedule));

    expect(result).toEqual({ success: false, error: 'db down' });
    const [reply] = await store.listReplies(thread.id);
    expect(reply.status).toBe('failed');
    expect(reply.content).toBe(AGENT_ERRORS.GENERATION_FALLBACK);
    // count 0 -> 2 minutes
    expect(await store.getSchedule(schedule.id)).toMatchObject({ replyCount: 0, nextFireAt: at(5), claimToken: null });
  });

  it('marks the reply failed when the processing update throws', async () => {
    const schedule = await claimedSchedule();
    const { generator, generate } = stubGenerator();
    vi.spyOn(store, 'updateReply').mockRejectedValueOnce(new Error('connection reset'));

    const result = await new ReplyGenerator({ store, clock, random: Math.random, generator }).run(payload(schedule));

    expect(result).toEqual({ success: false, error: 'connection reset' });
    expect(generate).not.toHaveBeenCalled();
    const [reply] = await store.listReplies(thread.id);
    expect(reply.status).toBe('failed');
  });

  it('reschedules to a bump recorded while the claim was held when it is earlier', async () => {
    const schedule = await claimedSchedule(personas[0], 3);
    await store.bumpSchedule(schedule.id, at(4), at(2));
    const { generator } = stubGenerator();

    const result = await new ReplyGenerator({ store, clock, random: Math.random, generator }).run(payload(schedule));

    // backoff for count 4 would be at(3 + 60)
    expect(result).toMatchObject({ success: true, nextFireAt: at(4) });
    expect(await store.getSchedule(schedule.id)).toMatchObject({ replyCount: 4, nextFireAt: at(4), claimToken: null });
  });

  it('deactivates the schedule when its persona is gone', async () => {
    const ghost = makePersona(9);
    const [schedule] = await store.createSchedules(thread.id, [{ personaId: ghost.id, nextFireAt: at(2) }], T0);
    await store.claimSchedule(schedule.id, at(2), { claimToken: TOKEN, claimedAt: at(2) });
    const { generator } = stubGenerator();

    const result = await new ReplyGenerator({ store, clock, random: Math.random, generator }).run(payload(schedule));

    expect(result).toEqual({ success: false, error: AGENT_ERRORS.PERSONA_NOT_FOUND });
    expect(await store.getSchedule(schedule.id)).toMatchObject({ isActive: false, claimToken: null });
  });

  it('hands the schedule back when its persona was switched off', async () => {
    const muted = makePersona(7, { isActive: false });
    await store.savePersona(muted);
    const schedule = await claimedSchedule(muted);
    const { generator, generate } = stubGenerator();

    const result = await new ReplyGenerator({ store, clock, random: Math.random, generator }).run(payload(schedule));

    expect(result).toEqual({ success: false, error: AGENT_ERRORS.PERSONA_INACTIVE, skipped: true });
    expect(generate).not.toHaveBeenCalled();
    expect(await store.getSchedule(schedule.id)).toMatchObject({
      isActive: true,
      nextFireAt: at(3),
      claimToken: null
    });
  });

  it('keeps a newer claim when the job finishes after being superseded', async () => {
    const schedule = await claimedSchedule();
    const generator = {
      async generate() {
        // Stall recovery and a new dispatch happen while the model is busy
        await store.releaseClaim(schedule.id, TOKEN, at(3));
        await store.claimSchedule(schedule.id, at(3), { claimToken: 'newer-claim', claimedAt: at(3) });
        return 'Late but posted.';
      }
    };

    const result = await new ReplyGenerator({ store, clock, random: Math.random, generator }).run(payload(schedule));

    expect(result.success).toBe(true);
    expect(await store.getSchedule(schedule.id)).toMatchObject({
      replyCount: 1,
      nextFireAt: null,
      claimToken: 'newer-claim'
    });
  });
});

describe('classifySchedule', () => {
  const schedule: AgentSchedule = {
    id: '8e4a6b20-4444-4d9e-8f10-000000000001',
    threadId: '7c2e4f10-3333-4c8d-9e0f-000000000001',
    personaId: '5d3f9e20-2222-4b7c-9d0e-000000000001',
    nextFireAt: null,
    claimToken: TOKEN,
    claimedAt: T0,
    replyCount: 0,
    lastReplyAt: null,
    isActive: true,
    createdAt: T0
  };

  it('checks existence, then activity, then the claim token', () => {
    expect(classifySchedule(null, TOKEN)).toEqual({ status: 'not_found' });
    expect(classifySchedule({ ...schedule, isActive: false }, 'other')).toEqual({ status: 'inactive' });
    expect(classifySchedule(schedule, 'other')).toEqual({ status: 'stale_claim', schedule });
    expect(classifySchedule(schedule, TOKEN)).toEqual({ status: 'ok', schedule });
  });
});
