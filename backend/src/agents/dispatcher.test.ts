import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Persona, Thread } from '@chromedome/shared';
import { InMemoryForumStore } from '../database/memory-store.js';
import { createThread, ManualClock, RecordingQueue, seededStore, T0 } from '../test-support/fixtures.js';
import { Dispatcher } from './dispatcher.js';

const at = (minutes: number) => new Date(T0.getTime() + minutes * 60_000);

describe('Dispatcher', () => {
  let store: InMemoryForumStore;
  let personas: Persona[];
  let thread: Thread;
  let clock: ManualClock;
  let queue: RecordingQueue;
  let dispatcher: Dispatcher;

  beforeEach(async () => {
    ({ store, personas } = await seededStore(3));
    thread = await createThread(store);
    clock = new ManualClock(at(10));
    queue = new RecordingQueue();
    dispatcher = new Dispatcher({ store, queue, clock, random: Math.random }, { stallTimeoutMinutes: 30 });
  });

  it('claims each due schedule and queues one generation job for it', async () => {
    const [due, future] = await store.createSchedules(thread.id, [
      { personaId: personas[0].id, nextFireAt: at(5) },
      { personaId: personas[1].id, nextFireAt: at(15) }
    ], T0);

    const result = await dispatcher.tick();

    expect(result).toEqual({ success: true, queued: 1, skipped: 0, recovered: 0 });
    const claimed = await store.getSchedule(due.id);
    expect(claimed?.nextFireAt).toBeNull();
    expect(claimed?.claimedAt).toEqual(at(10));
    expect(queue.jobs).toEqual([{
      name: 'forum.generate_reply',
      payload: {
        scheduleId: due.id,
        threadId: thread.id,
        personaId: personas[0].id,
        claimToken: claimed?.claimToken
      },
      options: undefined
    }]);
    expect((await store.getSchedule(future.id))?.nextFireAt).toEqual(at(15));
  });

  it('does not queue a schedule twice across ticks', async () => {
    await store.createSchedules(thread.id, [{ personaId: personas[0].id, nextFireAt: at(5) }], T0);

    await dispatcher.tick();
    const second = await dispatcher.tick();

    expect(second).toEqual({ success: true, queued: 0, skipped: 0, recovered: 0 });
    expect(queue.jobs).toHaveLength(1);
  });

  it('skips a schedule another dispatcher claimed first', async () => {
    const [schedule] = await store.createSchedules(thread.id, [{ personaId: personas[0].id, nextFireAt: at(5) }], T0);
    const listDue = store.listDueSchedules.bind(store);
    vi.spyOn(store, 'listDueSchedules').mockImplementation(async now => {
      const due = await listDue(now);
      await store.claimSchedule(schedule.id, at(5), { claimToken: 'other-dispatcher', claimedAt: now });
      return due;
    });

    const result = await dispatcher.tick();

    expect(result).toEqual({ success: true, queued: 0, skipped: 1, recovered: 0 });
    expect(queue.jobs).toEqual([]);
    expect((await store.getSchedule(schedule.id))?.claimToken).toBe('other-dispatcher');
  });

  it('releases the claim when the job cannot be queued', async () => {
    const [schedule] = await store.createSchedules(thread.id, [{ personaId: personas[0].id, nextFireAt: at(5) }], T0);
    queue.failWith = new Error('queue unavailable');

    const result = await dispatcher.tick();

    expect(result).toEqual({ success: true, queued: 0, skipped: 1, recovered: 0 });
    const released = await store.getSchedule(schedule.id);
    expect(released?.nextFireAt).toEqual(at(5));
    expect(released?.claimToken).toBeNull();
  });

  it('releases claims held longer than the stall timeout', async () => {
    const [stalled, fresh] = await store.createSchedules(thread.id, [
      { personaId: personas[0].id, nextFireAt: at(5) },
      { personaId: personas[1].id, nextFireAt: at(5) }
    ], T0);
    await store.claimSchedule(stalled.id, at(5), { claimToken: 'lost-job', claimedAt: at(5) });
    await store.claimSchedule(fresh.id, at(5), { claimToken: 'running-job', claimedAt: at(39) });
    clock.set(at(40));

    const result = await dispatcher.tick();

    // The recovered schedule is due again at once and goes out in the same tick
    expect(result).toEqual({ success: true, queued: 1, skipped: 0, recovered: 1 });
    expect(queue.jobs.map(job => job.payload)).toEqual([
      expect.objectContaining({ scheduleId: stalled.id })
    ]);
    expect((await store.getSchedule(fresh.id))?.claimToken).toBe('running-job');
  });

  it('joins an in-flight tick instead of starting another', async () => {
    await store.createSchedules(thread.id, [{ personaId: personas[0].id, nextFireAt: at(5) }], T0);
    const listDue = vi.spyOn(store, 'listDueSchedules');

    const [first, second] = await Promise.all([dispatcher.tick(), dispatcher.tick()]);

    expect(first).toBe(second);
    expect(listDue).toHaveBeenCalledTimes(1);
    expect(queue.jobs).toHaveLength(1);
  });

  it('reports a failed tick without throwing', async () => {
    vi.spyOn(store, 'listStalledSchedules').mockRejectedValue(new Error('database down'));

    expect(await dispatcher.tick()).toEqual({ success: false, error: 'database down' });
  });

  it('ticks on its interval until stopped', async () => {
    vi.useFakeTimers();
    try {
      const tick = vi.spyOn(dispatcher, 'tick');
      dispatcher.start(60);
      dispatcher.start(60);

      await vi.advanceTimersByTimeAsync(120_000);
      expect(tick).toHaveBeenCalledTimes(2);

      await dispatcher.stop();
      await vi.advanceTimersByTimeAsync(120_000);
      expect(tick).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });
});
