import { v4 as uuidv4 } from 'uuid';
import type {
  AgentSchedule,
  ForumUser,
  Persona,
  Reply,
  ReplyAuthor,
  ReplyStatus,
  Thread
} from '@chromedome/shared';
import {
  DuplicateScheduleError,
  ForumRepository,
  ForumStore,
  ForumTransaction,
  NewReply,
  NewSchedule,
  NewThread,
  Page,
  RecentRepliesOptions,
  ReplyPatch,
  ScheduleClaim,
  SchedulePatch,
  ThreadSummary
} from './types.js';

interface ThreadRow extends Thread {
  seq: number;
}

interface ReplyRow {
  id: string;
  threadId: string;
  userId: string | null;
  personaId: string | null;
  parentId: string | null;
  content: string | null;
  status: ReplyStatus;
  createdAt: Date;
  seq: number;
}

interface ScheduleRow extends AgentSchedule {
  seq: number;
}

interface MemoryState {
  users: Map<string, ForumUser>;
  personas: Map<string, Persona>;
  threads: Map<string, ThreadRow>;
  replies: Map<string, ReplyRow>;
  schedules: Map<string, ScheduleRow>;
  seq: number;
}

function emptyState(): MemoryState {
  return {
    users: new Map(),
    personas: new Map(),
    threads: new Map(),
    replies: new Map(),
    schedules: new Map(),
    seq: 0
  };
}

function copyMap<V extends object>(source: Map<string, V>): Map<string, V> {
  return new Map([...source].map(([key, value]) => [key, { ...value }]));
}

function snapshotState(state: MemoryState): MemoryState {
  return {
    users: copyMap(state.users),
    personas: copyMap(state.personas),
    threads: copyMap(state.threads),
    replies: copyMap(state.replies),
    schedules: copyMap(state.schedules),
    seq: state.seq
  };
}

function restoreState(target: MemoryState, snapshot: MemoryState): void {
  target.users = snapshot.users;
  target.personas = snapshot.personas;
  target.threads = snapshot.threads;
  target.replies = snapshot.replies;
  target.schedules = snapshot.schedules;
  target.seq = snapshot.seq;
}

function toThread(row: ThreadRow): Thread {
  const { seq: _seq, ...thread } = row;
  return thread;
}

function toSchedule(row: ScheduleRow): AgentSchedule {
  const { seq: _seq, ...schedule } = row;
  return schedule;
}

function resolveAuthor(row: ReplyRow): ReplyAuthor {
  if (row.userId) return { kind: 'user', userId: row.userId };
  if (row.personaId) return { kind: 'persona', personaId: row.personaId };
  return { kind: 'orphaned' };
}

function toReply(row: ReplyRow): Reply {
  return {
    id: row.id,
    threadId: row.threadId,
    author: resolveAuthor(row),
    parentId: row.parentId,
    content: row.content,
    status: row.status,
    createdAt: row.createdAt
  };
}

const byCreation = (a: { createdAt: Date; seq: number }, b: { createdAt: Date; seq: number }) =>
  a.createdAt.getTime() - b.createdAt.getTime() || a.seq - b.seq;

/**
 * Repository over plain Maps. Every method body runs through `exclusive`,
 * which the store implements as a lock and the transaction as a direct call.
 */
abstract class MemoryRepository implements ForumRepository {
  constructor(protected readonly state: MemoryState) {}

  protected abstract exclusive<T>(fn: () => T): Promise<T>;

  private nextSeq(): number {
    this.state.seq += 1;
    return this.state.seq;
  }

  // Users

  saveUser(user: ForumUser): Promise<void> {
    return this.exclusive(() => {
      this.state.users.set(user.id, { ...user });
    });
  }

  getUser(id: string): Promise<ForumUser | null> {
    return this.exclusive(() => {
      const user = this.state.users.get(id);
      return user ? { ...user } : null;
    });
  }

  getUsersByIds(ids: string[]): Promise<ForumUser[]> {
    return this.exclusive(() =>
      [...new Set(ids)].flatMap(id => {
        const user = this.state.users.get(id);
        return user ? [{ ...user }] : [];
      })
    );
  }

  // Personas

  savePersona(persona: Persona): Promise<void> {
    return this.exclusive(() => {
      if (!this.state.personas.has(persona.id)) {
        this.state.personas.set(persona.id, { ...persona });
      }
    });
  }

  listActivePersonas(): Promise<Persona[]> {
    return this.exclusive(() =>
      [...this.state.personas.values()]
        .filter(persona => persona.isActive)
        .sort((a, b) => a.name.localeCompare(b.name))
        .map(persona => ({ ...persona }))
    );
  }

  getPersona(id: string): Promise<Persona | null> {
    return this.exclusive(() => {
      const persona = this.state.personas.get(id);
      return persona ? { ...persona } : null;
    });
  }

  getPersonasByIds(ids: string[]): Promise<Persona[]> {
    return this.exclusive(() =>
      [...new Set(ids)].flatMap(id => {
        const persona = this.state.personas.get(id);
        return persona ? [{ ...persona }] : [];
      })
    );
  }

  // Threads

  createThread(input: NewThread): Promise<Thread> {
    return this.exclusive(() => {
      const row: ThreadRow = {
        id: uuidv4(),
        userId: input.userId,
        title: input.title,
        content: input.content,
        isPinned: input.isPinned ?? false,
        createdAt: input.createdAt,
        lastActivityAt: input.createdAt,
        seq: this.nextSeq()
      };
      this.state.threads.set(row.id, row);
      return toThread(row);
    });
  }

  getThread(id: string): Promise<Thread | null> {
    return this.exclusive(() => {
      const row = this.state.threads.get(id);
      return row ? toThread(row) : null;
    });
  }

  listThreads(page: Page): Promise<ThreadSummary[]> {
    return this.exclusive(() => {
      const replyCounts = new Map<string, number>();
      for (const reply of this.state.replies.values()) {
        replyCounts.set(reply.threadId, (replyCounts.get(reply.threadId) ?? 0) + 1);
      }

      return [...this.state.threads.values()]
        .sort((a, b) =>
          Number(b.isPinned) - Number(a.isPinned) ||
          b.lastActivityAt.getTime() - a.lastActivityAt.getTime() ||
          b.seq - a.seq
        )
        .slice(page.offset, page.offset + page.limit)
        .map(row => ({ ...toThread(row), replyCount: replyCounts.get(row.id) ?? 0 }));
    });
  }

  countThreads(): Promise<number> {
    return this.exclusive(() => this.state.threads.size);
  }

  deleteThread(id: string): Promise<boolean> {
    return this.exclusive(() => {
      if (!this.state.threads.delete(id)) return false;
      for (const [replyId, reply] of this.state.replies) {
        if (reply.threadId === id) this.state.replies.delete(replyId);
      }
      for (const [scheduleId, schedule] of this.state.schedules) {
        if (schedule.threadId === id) this.state.schedules.delete(scheduleId);
      }
      return true;
    });
  }

  touchThread(id: string, at: Date): Promise<void> {
    return this.exclusive(() => {
      const row = this.state.threads.get(id);
      if (row && at.getTime() > row.lastActivityAt.getTime()) {
        row.lastActivityAt = at;
      }
    });
  }

  // Replies

  createReply(input: NewReply): Promise<Reply> {
    return this.exclusive(() => {
      const row: ReplyRow = {
        id: uuidv4(),
        threadId: input.threadId,
        userId: input.author.kind === 'user' ? input.author.userId : null,
        personaId: input.author.kind === 'persona' ? input.author.personaId : null,
        parentId: input.parentId,
        content: input.content,
        status: input.status,
        createdAt: input.createdAt,
        seq: this.nextSeq()
      };
      this.state.replies.set(row.id, row);
      return toReply(row);
    });
  }

  getReply(id: string): Promise<Reply | null> {
    return this.exclusive(() => {
      const row = this.state.replies.get(id);
      return row ? toReply(row) : null;
    });
  }

  listReplies(threadId: string): Promise<Reply[]> {
    return this.exclusive(() =>
      [...this.state.replies.values()]
        .filter(row => row.threadId === threadId)
        .sort(byCreation)
        .map(toReply)
    );
  }

  listRecentCompletedReplies(threadId: string, options: RecentRepliesOptions): Promise<Reply[]> {
    return this.exclusive(() =>
      [...this.state.replies.values()]
        .filter(row =>
          row.threadId === threadId &&
          row.status === 'completed' &&
          row.id !== options.excludeReplyId
        )
        .sort(byCreation)
        .slice(-options.limit)
        .map(toReply)
    );
  }

  updateReply(id: string, patch: ReplyPatch): Promise<Reply | null> {
    return this.exclusive(() => {
      const row = this.state.replies.get(id);
      if (!row) return null;
      row.status = patch.status;
      if (patch.content !== undefined) row.content = patch.content;
      return toReply(row);
    });
  }

  deleteReply(id: string): Promise<boolean> {
    return this.exclusive(() => {
      if (!this.state.replies.has(id)) return false;
      const doomed = [id];
      while (doomed.length > 0) {
        const current = doomed.pop();
        if (current === undefined) break;
        this.state.replies.delete(current);
        for (const row of this.state.replies.values()) {
          if (row.parentId === current) doomed.push(row.id);
        }
      }
      return true;
    });
  }

  // Agent schedules

  createSchedules(threadId: string, entries: NewSchedule[], now: Date): Promise<AgentSchedule[]> {
    return this.exclusive(() => {
      const taken = new Set(
        [...this.state.schedules.values()]
          .filter(row => row.threadId === threadId)
          .map(row => row.personaId)
      );
      for (const entry of entries) {
        if (taken.has(entry.personaId)) {
          throw new DuplicateScheduleError(threadId, entry.personaId);
        }
        taken.add(entry.personaId);
      }

      return entries.map(entry => {
        const row: ScheduleRow = {
          id: uuidv4(),
          threadId,
          personaId: entry.personaId,
          nextFireAt: entry.nextFireAt,
          claimToken: null,
          claimedAt: null,
          replyCount: 0,
          lastReplyAt: null,
          isActive: true,
          createdAt: now,
          seq: this.nextSeq()
        };
        this.state.schedules.set(row.id, row);
        return toSchedule(row);
      });
    });
  }

  countSchedulesForThread(threadId: string): Promise<number> {
    return this.exclusive(() =>
      [...this.state.schedules.values()].filter(row => row.threadId === threadId).length
    );
  }

  getSchedule(id: string): Promise<AgentSchedule | null> {
    return this.exclusive(() => {
      const row = this.state.schedules.get(id);
      return row ? toSchedule(row) : null;
    });
  }

  listDueSchedules(now: Date): Promise<AgentSchedule[]> {
    return this.exclusive(() =>
      [...this.state.schedules.values()]
        .filter(row =>
          row.isActive &&
          row.claimToken === null &&
          row.nextFireAt !== null &&
          row.nextFireAt.getTime() <= now.getTime() &&
          this.state.personas.get(row.personaId)?.isActive === true
        )
        .sort((a, b) => (a.nextFireAt?.getTime() ?? 0) - (b.nextFireAt?.getTime() ?? 0) || a.seq - b.seq)
        .map(toSchedule)
    );
  }

  listActiveSchedulesForThread(threadId: string): Promise<AgentSchedule[]> {
    return this.exclusive(() =>
      [...this.state.schedules.values()]
        .filter(row => row.threadId === threadId && row.isActive)
        .sort(byCreation)
        .map(toSchedule)
    );
  }

  listStalledSchedules(claimedBefore: Date): Promise<AgentSchedule[]> {
    return this.exclusive(() =>
      [...this.state.schedules.values()]
        .filter(row =>
          row.isActive &&
          (row.claimToken !== null || row.nextFireAt === null) &&
          (row.claimedAt === null || row.claimedAt.getTime() < claimedBefore.getTime())
        )
        .sort((a, b) => a.seq - b.seq)
        .map(toSchedule)
    );
  }

  claimSchedule(id: string, expectedNextFireAt: Date, claim: ScheduleClaim): Promise<boolean> {
    return this.exclusive(() => {
      const row = this.state.schedules.get(id);
      if (
        !row ||
        !row.isActive ||
        row.claimToken !== null ||
        row.nextFireAt?.getTime() !== expectedNextFireAt.getTime()
      ) {
        return false;
      }
      row.nextFireAt = null;
      row.claimToken = claim.claimToken;
      row.claimedAt = claim.claimedAt;
      return true;
    });
  }

  releaseClaim(id: string, claimToken: string, nextFireAt: Date): Promise<boolean> {
    return this.exclusive(() => {
      const row = this.state.schedules.get(id);
      if (!row || row.claimToken !== claimToken) return false;
      row.nextFireAt = nextFireAt;
      row.claimToken = null;
      row.claimedAt = null;
      return true;
    });
  }

  bumpSchedule(id: string, nextFireAt: Date, threshold: Date): Promise<boolean> {
    return this.exclusive(() => {
      const row = this.state.schedules.get(id);
      if (!row || !row.isActive) return false;
      const current = row.nextFireAt;
      if (current !== null && (current.getTime() <= threshold.getTime() || current.getTime() <= nextFireAt.getTime())) {
        return false;
      }
      row.nextFireAt = nextFireAt;
      return true;
    });
  }

  updateSchedule(id: string, patch: SchedulePatch): Promise<AgentSchedule | null> {
    return this.exclusive(() => {
      const row = this.state.schedules.get(id);
      if (!row) return null;
      if (patch.nextFireAt !== undefined) row.nextFireAt = patch.nextFireAt;
      if (patch.claimToken !== undefined) row.claimToken = patch.claimToken;
      if (patch.claimedAt !== undefined) row.claimedAt = patch.claimedAt;
      if (patch.replyCount !== undefined) row.replyCount = patch.replyCount;
      if (patch.lastReplyAt !== undefined) row.lastReplyAt = patch.lastReplyAt;
      if (patch.isActive !== undefined) row.isActive = patch.isActive;
      return toSchedule(row);
    });
  }
}

class MemoryTransaction extends MemoryRepository implements ForumTransaction {
  protected async exclusive<T>(fn: () => T): Promise<T> {
    return fn();
  }

  lockSchedule(id: string): Promise<AgentSchedule | null> {
    return this.getSchedule(id);
  }
}

/**
 * In-process ForumStore used by tests and when no DATABASE_URL is configured.
 * Calls are serialized; a transaction holds the lock for its whole callback
 * and restores a snapshot if the callback throws.
 */
export class InMemoryForumStore extends MemoryRepository implements ForumStore {
  private tail: Promise<void> = Promise.resolve();

  constructor() {
    super(emptyState());
  }

  private withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  protected exclusive<T>(fn: () => T): Promise<T> {
    return this.withLock(async () => fn());
  }

  transaction<T>(fn: (tx: ForumTransaction) => Promise<T>): Promise<T> {
    return this.withLock(async () => {
      const snapshot = snapshotState(this.state);
      try {
        return await fn(new MemoryTransaction(this.state));
      } catch (error) {
        restoreState(this.state, snapshot);
        throw error;
      }
    });
  }

  async close(): Promise<void> {
    await this.tail;
  }
}
