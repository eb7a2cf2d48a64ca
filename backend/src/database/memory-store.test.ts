import { describe, it, expect, beforeEach } from 'vitest';
import type { Persona } from '@chromedome/shared';
import { InMemoryForumStore } from './memory-store.js';
import { DuplicateScheduleError } from './types.js';
import { ALICE, BOB, createThread, seededStore, T0 } from '../test-support/fixtures.js';

const minutes = (n: number) => new Date(T0.getTime() + n * 60_000);

describe('InMemoryForumStore', () => {
  let store: InMemoryForumStore;
  let personas: Persona[];

  beforeEach(async () => {
    ({ store, personas } = await seededStore());
  });

  describe('threads', () => {
    it('lists pinned threads first, then by latest activity', async () => {
      const older = await createThread(store, minutes(0));
      const newer = await createThread(store, minutes(1));
      const pinned = await store.createThread({
        userId: BOB.id,
        title: 'Forum rules',
        content: 'Be kind.',
        isPinned: true,
        createdAt: minutes(-60)
      });

      await store.touchThread(older.id, minutes(5));

      const listed = await store.listThreads({ offset: 0, limit: 10 });
      expect(listed.map(thread => thread.id)).toEqual([pinned.id, older.id, newer.id]);
    });

    it('breaks activity ties by creation order, newest first', async () => {
      const first = await createThread(store, T0);
      const second = await createThread(store, T0);

      const listed = await store.listThreads({ offset: 0, limit: 10 });
      expect(listed.map(thread => thread.id)).toEqual([second.id, first.id]);
    });

    it('pages and counts replies of every status', async () => {
      const a = await createThread(store, minutes(0));
      const b = await createThread(store, minutes(1));
      await store.createReply({
        threadId: a.id, author: { kind: 'user', userId: ALICE.id }, parentId: null,
        content: 'hi', status: 'completed', createdAt: minutes(2)
      });
      await store.createReply({
        threadId: a.id, author: { kind: 'persona', personaId: personas[0].id }, parentId: null,
        content: null, status: 'pending', createdAt: minutes(3)
      });

      const page1 = await store.listThreads({ offset: 0, limit: 1 });
      const page2 = await store.listThreads({ offset: 1, limit: 1 });

      expect(page1.map(thread => thread.id)).toEqual([b.id]);
      expect(page1[0].replyCount).toBe(0);
      expect(page2.map(thread => thread.id)).toEqual([a.id]);
      expect(page2[0].replyCount).toBe(2);
      expect(await store.countThreads()).toBe(2);
    });

    it('never moves lastActivityAt backwards', async () => {
      const thread = await createThread(store, minutes(10));
      await store.touchThread(thread.id, minutes(5));
      expect((await store.getThread(thread.id))?.lastActivityAt).toEqual(minutes(10));
    });

    it('cascades thread deletion to replies and schedules', async () => {
      const thread = await createThread(store);
      const reply = await store.createReply({
        threadId: thread.id, author: { kind: 'user', userId: ALICE.id }, parentId: null,
        content: 'hi', status: 'completed', createdAt: T0
      });
      const [schedule] = await store.createSchedules(
        thread.id, [{ personaId: personas[0].id, nextFireAt: minutes(1) }], T0
      );

      expect(await store.deleteThread(thread.id)).toBe(true);
      expect(await store.getReply(reply.id)).toBeNull();
      expect(await store.getSchedule(schedule.id)).toBeNull();
      expect(await store.deleteThread(thread.id)).toBe(false);
    });
  });

  describe('replies', () => {
    it('resolves the author kind from the stored row', async () => {
      const thread = await createThread(store);
      const human = await store.createReply({
        threadId: thread.id, author: { kind: 'user', userId: ALICE.id }, parentId: null,
        content: 'hi', status: 'completed', createdAt: T0
      });
      const agent = await store.createReply({
        threadId: thread.id, author: { kind: 'persona', personaId: personas[1].id }, parentId: human.id,
        content: null, status: 'pending', createdAt: T0
      });

      expect(human.author).toEqual({ kind: 'user', userId: ALICE.id });
      expect(agent.author).toEqual({ kind: 'persona', personaId: personas[1].id });
      expect(agent.parentId).toBe(human.id);
    });

    it('deletes nested replies with their parent', async () => {
      const thread = await createThread(store);
      const root = await store.createReply({
        threadId: thread.id, author: { kind: 'user', userId: ALICE.id }, parentId: null,
        content: 'root', status: 'completed', createdAt: minutes(1)
      });
      const child = await store.createReply({
        threadId: thread.id, author: { kind: 'user', userId: BOB.id }, parentId: root.id,
        content: 'child', status: 'completed', createdAt: minutes(2)
      });
      const grandchild = await store.createReply({
        threadId: thread.id, author: { kind: 'user', userId: ALICE.id }, parentId: child.id,
        content: 'grandchild', status: 'completed', createdAt: minutes(3)
      });
      const sibling = await store.createReply({
        threadId: thread.id, author: { kind: 'user', userId: BOB.id }, parentId: null,
        content: 'sibling', status: 'completed', createdAt: minutes(4)
      });

      await store.deleteReply(root.id);

      expect(await store.getReply(grandchild.id)).toBeNull();
      expect((await store.listReplies(thread.id)).map(reply => reply.id)).toEqual([sibling.id]);
    });

    it('returns the most recent completed replies oldest first', async () => {
      const thread = await createThread(store);
      const ids: string[] = [];
      for (let i = 0; i < 5; i++) {
        const reply = await store.createReply({
          threadId: thread.id, author: { kind: 'user', userId: ALICE.id }, parentId: null,
          content: `reply ${i}`, status: i === 3 ? 'failed' : 'completed', createdAt: minutes(i)
        });
        ids.push(reply.id);
      }

      const recent = await store.listRecentCompletedReplies(thread.id, { limit: 2, excludeReplyId: ids[4] });
      expect(recent.map(reply => reply.content)).toEqual(['reply 1', 'reply 2']);
    });

    it('updates status and content', async () => {
      const thread = await createThread(store);
      const reply = await store.createReply({
        threadId: thread.id, author: { kind: 'persona', personaId: personas[0].id }, parentId: null,
        content: null, status: 'pending', createdAt: T0
      });

      await store.updateReply(reply.id, { status: 'processing' });
      const done = await store.updateReply(reply.id, { status: 'completed', content: 'Done.' });

      expect(done?.status).toBe('completed');
      expect(done?.content).toBe('Done.');
      expect(await store.updateReply('missing', { status: 'failed' })).toBeNull();
    });
  });

  describe('personas', () => {
    it('keeps the first saved copy of a persona', async () => {
      await store.savePersona({ ...personas[0], name: 'Renamed' });
      expect((await store.getPersona(personas[0].id))?.name).toBe('Persona 1');
    });

    it('lists only active personas by name', async () => {
      const store2 = new InMemoryForumStore();
      await store2.savePersona({ ...personas[0], name: 'Zed' });
      await store2.savePersona({ ...personas[1], name: 'Amy' });
      await store2.savePersona({ ...personas[2], name: 'Off', isActive: false });

      expect((await store2.listActivePersonas()).map(persona => persona.name)).toEqual(['Amy', 'Zed']);
    });
  });

  describe('schedules', () => {
    it('rejects a second schedule for the same thread and persona', async () => {
      const thread = await createThread(store);
      await store.createSchedules(thread.id, [{ personaId: personas[0].id, nextFireAt: minutes(1) }], T0);

      await expect(
        store.createSchedules(thread.id, [
          { personaId: personas[1].id, nextFireAt: minutes(1) },
          { personaId: personas[0].id, nextFireAt: minutes(2) }
        ], T0)
      ).rejects.toBeInstanceOf(DuplicateScheduleError);
      expect(await store.countSchedulesForThread(thread.id)).toBe(1);
    });

    it('lists due schedules of active personas by fire time', async () => {
      const thread = await createThread(store);
      const inactive: Persona = { ...personas[3], id: '5d3f9e20-2222-4b7c-9d0e-000000000099', isActive: false };
      await store.savePersona(inactive);
      const [late, early, future, muted] = await store.createSchedules(thread.id, [
        { personaId: personas[0].id, nextFireAt: minutes(3) },
        { personaId: personas[1].id, nextFireAt: minutes(1) },
        { personaId: personas[2].id, nextFireAt: minutes(30) },
        { personaId: inactive.id, nextFireAt: minutes(1) }
      ], T0);

      const due = await store.listDueSchedules(minutes(3));
      expect(due.map(schedule => schedule.id)).toEqual([early.id, late.id]);
      expect(due.map(schedule => schedule.id)).not.toContain(future.id);
      expect(due.map(schedule => schedule.id)).not.toContain(muted.id);
    });

    it('claims a schedule only while nextFireAt is unchanged', async () => {
      const thread = await createThread(store);
      const [schedule] = await store.createSchedules(
        thread.id, [{ personaId: personas[0].id, nextFireAt: minutes(1) }], T0
      );
      const claim = { claimToken: '9a1b2c3d-0000-4000-8000-000000000001', claimedAt: minutes(2) };

      expect(await store.claimSchedule(schedule.id, minutes(1), claim)).toBe(true);
      expect(await store.claimSchedule(schedule.id, minutes(1), { ...claim, claimToken: 'other' })).toBe(false);

      const claimed = await store.getSchedule(schedule.id);
      expect(claimed?.nextFireAt).toBeNull();
      expect(claimed?.claimToken).toBe(claim.claimToken);
      expect(claimed?.claimedAt).toEqual(minutes(2));
    });

    it('releases a claim only for the token that holds it', async () => {
      const thread = await createThread(store);
      const [schedule] = await store.createSchedules(
        thread.id, [{ personaId: personas[0].id, nextFireAt: minutes(1) }], T0
      );
      const token = '9a1b2c3d-0000-4000-8000-000000000001';
      await store.claimSchedule(schedule.id, minutes(1), { claimToken: token, claimedAt: minutes(1) });

      expect(await store.releaseClaim(schedule.id, 'stale-token', minutes(9))).toBe(false);
      expect(await store.releaseClaim(schedule.id, token, minutes(9))).toBe(true);

      const released = await store.getSchedule(schedule.id);
      expect(released?.nextFireAt).toEqual(minutes(9));
      expect(released?.claimToken).toBeNull();
      expect(released?.claimedAt).toBeNull();
    });

    it('bumps only schedules due after the threshold and later than the new time', async () => {
      const thread = await createThread(store);
      const [soon, later, claimed] = await store.createSchedules(thread.id, [
        { personaId: personas[0].id, nextFireAt: minutes(1) },
        { personaId: personas[1].id, nextFireAt: minutes(10) },
        { personaId: personas[2].id, nextFireAt: minutes(20) }
      ], T0);
      await store.claimSchedule(claimed.id, minutes(20), { claimToken: 'token', claimedAt: T0 });

      expect(await store.bumpSchedule(soon.id, minutes(1.5), minutes(2))).toBe(false);
      expect(await store.bumpSchedule(later.id, minutes(11), minutes(2))).toBe(false);
      expect(await store.bumpSchedule(later.id, minutes(1.5), minutes(2))).toBe(true);
      expect(await store.bumpSchedule(claimed.id, minutes(1.5), minutes(2))).toBe(true);

      expect((await store.getSchedule(later.id))?.nextFireAt).toEqual(minutes(1.5));
      expect((await store.getSchedule(claimed.id))?.nextFireAt).toEqual(minutes(1.5));
    });

    it('keeps a bumped schedule out of dispatch while its claim is held', async () => {
      const thread = await createThread(store);
      const [schedule] = await store.createSchedules(
        thread.id, [{ personaId: personas[0].id, nextFireAt: minutes(1) }], T0
      );
      await store.claimSchedule(schedule.id, minutes(1), { claimToken: 'in-flight', claimedAt: minutes(1) });

      expect(await store.bumpSchedule(schedule.id, minutes(3), minutes(2))).toBe(true);

      expect(await store.listDueSchedules(minutes(5))).toEqual([]);
      expect(await store.claimSchedule(schedule.id, minutes(3), { claimToken: 'second', claimedAt: minutes(5) })).toBe(false);
      expect(await store.getSchedule(schedule.id)).toMatchObject({ nextFireAt: minutes(3), claimToken: 'in-flight' });
      expect((await store.listStalledSchedules(minutes(31))).map(stalled => stalled.id)).toEqual([schedule.id]);
    });

    it('lists claimed schedules older than the cutoff as stalled', async () => {
      const thread = await createThread(store);
      const [old, fresh, idle] = await store.createSchedules(thread.id, [
        { personaId: personas[0].id, nextFireAt: minutes(1) },
        { personaId: personas[1].id, nextFireAt: minutes(1) },
        { personaId: personas[2].id, nextFireAt: minutes(1) }
      ], T0);
      await store.claimSchedule(old.id, minutes(1), { claimToken: 'a', claimedAt: minutes(1) });
      await store.claimSchedule(fresh.id, minutes(1), { claimToken: 'b', claimedAt: minutes(40) });

      const stalled = await store.listStalledSchedules(minutes(31));
      expect(stalled.map(schedule => schedule.id)).toEqual([old.id]);
      expect(stalled.map(schedule => schedule.id)).not.toContain(idle.id);
    });
  });

  describe('transaction', () => {
    it('commits every write when the callback resolves', async () => {
      const thread = await createThread(store);
      await store.transaction(async tx => {
        await tx.createReply({
          threadId: thread.id, author: { kind: 'user', userId: ALICE.id }, parentId: null,
          content: 'in tx', status: 'completed', createdAt: minutes(1)
        });
        await tx.touchThread(thread.id, minutes(1));
      });

      expect((await store.listReplies(thread.id)).map(reply => reply.content)).toEqual(['in tx']);
      expect((await store.getThread(thread.id))?.lastActivityAt).toEqual(minutes(1));
    });

    it('rolls back every write when the callback throws', async () => {
      const thread = await createThread(store);
      const [schedule] = await store.createSchedules(
        thread.id, [{ personaId: personas[0].id, nextFireAt: minutes(1) }], T0
      );

      await expect(store.transaction(async tx => {
        await tx.updateSchedule(schedule.id, { replyCount: 5 });
        await tx.createReply({
          threadId: thread.id, author: { kind: 'user', userId: ALICE.id }, parentId: null,
          content: 'lost', status: 'completed', createdAt: minutes(1)
        });
        throw new Error('boom');
      })).rejects.toThrow('boom');

      expect((await store.getSchedule(schedule.id))?.replyCount).toBe(0);
      expect(await store.listReplies(thread.id)).toEqual([]);
    });

    it('serializes other calls behind an open transaction', async () => {
      const thread = await createThread(store);
      const order: string[] = [];

      const tx = store.transaction(async inner => {
        order.push('tx start');
        await inner.touchThread(thread.id, minutes(5));
        await new Promise(resolve => setTimeout(resolve, 5));
        order.push('tx end');
      });
      const read = store.getThread(thread.id).then(found => {
        order.push('read');
        return found;
      });

      await Promise.all([tx, read]);
      expect(order).toEqual(['tx start', 'tx end', 'read']);
      expect((await read)?.lastActivityAt).toEqual(minutes(5));
    });
  });
});
