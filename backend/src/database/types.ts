import type {
  AgentSchedule,
  ForumUser,
  Persona,
  Reply,
  ReplyStatus,
  Thread
} from '@chromedome/shared';

export type NewReplyAuthor =
  | { kind: 'user'; userId: string }
  | { kind: 'persona'; personaId: string };

export interface NewThread {
  userId: string;
  title: string;
  content: string;
  isPinned?: boolean;
  createdAt: Date;
}

export interface NewReply {
  threadId: string;
  author: NewReplyAuthor;
  parentId: string | null;
  content: string | null;
  status: ReplyStatus;
  createdAt: Date;
}

export interface ReplyPatch {
  status: ReplyStatus;
  content?: string | null;
}

export interface NewSchedule {
  personaId: string;
  nextFireAt: Date;
}

export interface SchedulePatch {
  nextFireAt?: Date | null;
  claimToken?: string | null;
  claimedAt?: Date | null;
  replyCount?: number;
  lastReplyAt?: Date | null;
  isActive?: boolean;
}

export interface ScheduleClaim {
  claimToken: string;
  claimedAt: Date;
}

export interface ThreadSummary extends Thread {
  replyCount: number;
}

export interface Page {
  offset: number;
  limit: number;
}

export interface RecentRepliesOptions {
  limit: number;
  excludeReplyId?: string;
}

/** Raised when a (thread, persona) schedule already exists. */
export class DuplicateScheduleError extends Error {
  constructor(readonly threadId: string, readonly personaId?: string) {
    super(
      personaId
        ? `Schedule already exists for thread ${threadId} and persona ${personaId}`
        : `Schedule already exists for thread ${threadId}`
    );
    this.name = 'DuplicateScheduleError';
  }
}

export interface ForumRepository {
  // Users
  saveUser(user: ForumUser): Promise<void>;
  getUser(id: string): Promise<ForumUser | null>;
  getUsersByIds(ids: string[]): Promise<ForumUser[]>;

  // Personas
  /** Inserts the persona unless one with the same id exists. */
  savePersona(persona: Persona): Promise<void>;
  listActivePersonas(): Promise<Persona[]>;
  getPersona(id: string): Promise<Persona | null>;
  getPersonasByIds(ids: string[]): Promise<Persona[]>;

  // Threads
  createThread(input: NewThread): Promise<Thread>;
  getThread(id: string): Promise<Thread | null>;
  /** Pinned threads first, then by latest activity. */
  listThreads(page: Page): Promise<ThreadSummary[]>;
  countThreads(): Promise<number>;
  deleteThread(id: string): Promise<boolean>;
  /** Moves lastActivityAt forward to `at`; never moves it back. */
  touchThread(id: string, at: Date): Promise<void>;

  // Replies
  createReply(input: NewReply): Promise<Reply>;
  getReply(id: string): Promise<Reply | null>;
  /** All replies of a thread, oldest first. */
  listReplies(threadId: string): Promise<Reply[]>;
  /** Most recent completed replies, returned oldest first. */
  listRecentCompletedReplies(threadId: string, options: RecentRepliesOptions): Promise<Reply[]>;
  updateReply(id: string, patch: ReplyPatch): Promise<Reply | null>;
  deleteReply(id: string): Promise<boolean>;

  // Agent schedules
  /** Inserts all schedules or none; throws DuplicateScheduleError on a (thread, persona) clash. */
  createSchedules(threadId: string, entries: NewSchedule[], now: Date): Promise<AgentSchedule[]>;
  countSchedulesForThread(threadId: string): Promise<number>;
  getSchedule(id: string): Promise<AgentSchedule | null>;
  /** Unclaimed active schedules of active personas with nextFireAt <= now, oldest first. */
  listDueSchedules(now: Date): Promise<AgentSchedule[]>;
  /** Active schedules of one thread in creation order. */
  listActiveSchedulesForThread(threadId: string): Promise<AgentSchedule[]>;
  /** Active schedules claimed before `claimedBefore`, or left with no nextFireAt and no claim. */
  listStalledSchedules(claimedBefore: Date): Promise<AgentSchedule[]>;
  /**
   * Conditional claim: succeeds only while the schedule is active, unclaimed
   * and nextFireAt still equals `expectedNextFireAt`.
   */
  claimSchedule(id: string, expectedNextFireAt: Date, claim: ScheduleClaim): Promise<boolean>;
  /** Clears a claim still held by `claimToken` and sets nextFireAt. */
  releaseClaim(id: string, claimToken: string, nextFireAt: Date): Promise<boolean>;
  /**
   * Sets nextFireAt when the current value is null, or later than both
   * `threshold` and the new value. On a claimed schedule the value is a
   * pending bump: it is not dispatched, and the job holding the claim folds
   * it into the time it reschedules to.
   */
  bumpSchedule(id: string, nextFireAt: Date, threshold: Date): Promise<boolean>;
  updateSchedule(id: string, patch: SchedulePatch): Promise<AgentSchedule | null>;
}

export interface ForumTransaction extends ForumRepository {
  /** Reads the schedule and holds a row lock until the transaction ends. */
  lockSchedule(id: string): Promise<AgentSchedule | null>;
}

export interface ForumStore extends ForumRepository {
  transaction<T>(fn: (tx: ForumTransaction) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
