import pg from 'pg';
import { v4 as uuidv4 } from 'uuid';
import {
  ReplyStatusSchema,
  type AgentSchedule,
  type ForumUser,
  type Persona,
  type Reply,
  type ReplyAuthor,
  type Thread
} from '@chromedome/shared';
import { Logger } from '../utils/logger.js';
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

export type Row = Record<string, unknown>;

export type SqlRunner = (text: string, values?: unknown[]) => Promise<pg.QueryResult<Row>>;

/** The slice of a pg pool the stores and the job queue need. */
export interface PgDriver {
  query: SqlRunner;
  transaction<T>(fn: (query: SqlRunner) => Promise<T>): Promise<T>;
  end(): Promise<void>;
}

export function createPool(connectionString: string): pg.Pool {
  const pool = new pg.Pool({ connectionString, max: 10 });
  pool.on('error', error => {
    Logger.error('[Postgres] Idle client error:', error);
  });
  return pool;
}

export function poolDriver(pool: pg.Pool): PgDriver {
  return {
    query: (text, values) => pool.query(text, values),

    async transaction<T>(fn: (query: SqlRunner) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        const result = await fn((text, values) => client.query(text, values));
        await client.query('COMMIT');
        return result;
      } catch (error) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          Logger.error('[Postgres] Rollback failed:', rollbackError);
        }
        throw error;
      } finally {
        client.release();
      }
    },

    end: () => pool.end()
  };
}

export const SCHEDULE_UNIQUE_CONSTRAINT = 'uq_agent_schedule_thread_persona';

export function isUniqueViolation(error: unknown, constraint: string): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === '23505' &&
    'constraint' in error &&
    error.constraint === constraint
  );
}

// Row mapping

export function toDate(value: unknown): Date {
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') return new Date(value);
  throw new TypeError(`Expected a timestamp, got ${typeof value}`);
}

export function toNullableDate(value: unknown): Date | null {
  return value === null || value === undefined ? null : toDate(value);
}

function toNullableString(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

const USER_COLUMNS = 'id, name, avatar_url, is_admin';
const PERSONA_COLUMNS = 'id, name, system_prompt, is_active, created_at, updated_at';
const THREAD_COLUMNS = 'id, user_id, title, content, is_pinned, created_at, last_activity_at';
const REPLY_COLUMNS = 'id, thread_id, user_id, persona_id, parent_id, content, status, created_at';
const SCHEDULE_COLUMNS = [
  'id',
  'thread_id',
  'persona_id',
  'next_fire_at',
  'claim_token',
  'claimed_at',
  'reply_count',
  'last_reply_at',
  'is_active',
  'created_at'
];

function columns(list: string, alias: string): string {
  return list
    .split(',')
    .map(column => `${alias}.${column.trim()}`)
    .join(', ');
}

function mapUser(row: Row): ForumUser {
  return {
    id: String(row.id),
    name: toNullableString(row.name),
    avatarUrl: toNullableString(row.avatar_url),
    isAdmin: Boolean(row.is_admin)
  };
}

function mapPersona(row: Row): Persona {
  return {
    id: String(row.id),
    name: String(row.name),
    systemPrompt: String(row.system_prompt),
    isActive: Boolean(row.is_active),
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at)
  };
}

function mapThread(row: Row): Thread {
  return {
    id: String(row.id),
    userId: String(row.user_id),
    title: String(row.title),
    content: String(row.content),
    isPinned: Boolean(row.is_pinned),
    createdAt: toDate(row.created_at),
    lastActivityAt: toDate(row.last_activity_at)
  };
}

function mapAuthor(row: Row): ReplyAuthor {
  const userId = toNullableString(row.user_id);
  if (userId) return { kind: 'user', userId };
  const personaId = toNullableString(row.persona_id);
  if (personaId) return { kind: 'persona', personaId };
  return { kind: 'orphaned' };
}

function mapReply(row: Row): Reply {
  return {
    id: String(row.id),
    threadId: String(row.thread_id),
    author: mapAuthor(row),
    parentId: toNullableString(row.parent_id),
    content: toNullableString(row.content),
    status: ReplyStatusSchema.parse(row.status),
    createdAt: toDate(row.created_at)
  };
}

function mapSchedule(row: Row): AgentSchedule {
  return {
    id: String(row.id),
    threadId: String(row.thread_id),
    personaId: String(row.persona_id),
    nextFireAt: toNullableDate(row.next_fire_at),
    claimToken: toNullableString(row.claim_token),
    claimedAt: toNullableDate(row.claimed_at),
    replyCount: Number(row.reply_count),
    lastReplyAt: toNullableDate(row.last_reply_at),
    isActive: Boolean(row.is_active),
    createdAt: toDate(row.created_at)
  };
}

function affected(result: pg.QueryResult<Row>): boolean {
  return (result.rowCount ?? 0) > 0;
}

class PgRepository implements ForumRepository {
  constructor(protected readonly query: SqlRunner) {}

  // Users

  async saveUser(user: ForumUser): Promise<void> {
    await this.query(
      `INSERT INTO forum_users (id, name, avatar_url, is_admin) VALUES ($1, $2, $3, $4)
       ON CONFLICT (id) DO UPDATE SET name = EXCLUDED.name, avatar_url = EXCLUDED.avatar_url, is_admin = EXCLUDED.is_admin`,
      [user.id, user.name, user.avatarUrl, user.isAdmin]
    );
  }

  async getUser(id: string): Promise<ForumUser | null> {
    const result = await this.query(`SELECT ${USER_COLUMNS} FROM forum_users WHERE id = $1`, [id]);
    return result.rows[0] ? mapUser(result.rows[0]) : null;
  }

  async getUsersByIds(ids: string[]): Promise<ForumUser[]> {
    if (ids.length === 0) return [];
    const result = await this.query(`SELECT ${USER_COLUMNS} FROM forum_users WHERE id = ANY($1::uuid[])`, [ids]);
    return result.rows.map(mapUser);
  }

  // Personas

  async savePersona(persona: Persona): Promise<void> {
    await this.query(
      `INSERT INTO forum_personas (id, name, system_prompt, is_active, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6) ON CONFLICT (id) DO NOTHING`,
      [persona.id, persona.name, persona.systemPrompt, persona.isActive, persona.createdAt, persona.updatedAt]
    );
  }

  async listActivePersonas(): Promise<Persona[]> {
    const result = await this.query(
      `SELECT ${PERSONA_COLUMNS} FROM forum_personas WHERE is_active = TRUE ORDER BY name ASC`
    );
    return result.rows.map(mapPersona);
  }

  async getPersona(id: string): Promise<Persona | null> {
    const result = await this.query(`SELECT ${PERSONA_COLUMNS} FROM forum_personas WHERE id = $1`, [id]);
    return result.rows[0] ? mapPersona(result.rows[0]) : null;
  }

  async getPersonasByIds(ids: string[]): Promise<Persona[]> {
    if (ids.length === 0) return [];
    const result = await this.query(
      `SELECT ${PERSONA_COLUMNS} FROM forum_personas WHERE id = ANY($1::uuid[])`,
      [ids]
    );
    return result.rows.map(mapPersona);
  }

  // Threads

  async createThread(input: NewThread): Promise<Thread> {
    const result = await this.query(
      `INSERT INTO forum_threads (id, user_id, title, content, is_pinned, created_at, last_activity_at)
       VALUES ($1, $2, $3, $4, $5, $6, $6) RETURNING ${THREAD_COLUMNS}`,
      [uuidv4(), input.userId, input.title, input.content, input.isPinned ?? false, input.createdAt]
    );
    return mapThread(result.rows[0] ?? {});
  }

  async getThread(id: string): Promise<Thread | null> {
    const result = await this.query(`SELECT ${THREAD_COLUMNS} FROM forum_threads WHERE id = $1`, [id]);
    return result.rows[0] ? mapThread(result.rows[0]) : null;
  }

  async listThreads(page: Page): Promise<ThreadSummary[]> {
    const result = await this.query(
      `SELECT ${columns(THREAD_COLUMNS, 't')},
              (SELECT COUNT(*) FROM forum_replies r WHERE r.thread_id = t.id) AS reply_count
       FROM forum_threads t
       ORDER BY t.is_pinned DESC, t.last_activity_at DESC, t.created_at DESC
       OFFSET $1 LIMIT $2`,
      [page.offset, page.limit]
    );
    return result.rows.map(row => ({ ...mapThread(row), replyCount: Number(row.reply_count) }));
  }

  async countThreads(): Promise<number> {
    const result = await this.query('SELECT COUNT(*) AS count FROM forum_threads');
    return Number(result.rows[0]?.count ?? 0);
  }

  async deleteThread(id: string): Promise<boolean> {
    return affected(await this.query('DELETE FROM forum_threads WHERE id = $1', [id]));
  }

  async touchThread(id: string, at: Date): Promise<void> {
    await this.query(
      'UPDATE forum_threads SET last_activity_at = GREATEST(last_activity_at, $2) WHERE id = $1',
      [id, at]
    );
  }

  // Replies

  async createReply(input: NewReply): Promise<Reply> {
    const result = await this.query(
      `INSERT INTO forum_replies (id, thread_id, user_id, persona_id, parent_id, content, status, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8) RETURNING ${REPLY_COLUMNS}`,
      [
        uuidv4(),
        input.threadId,
        input.author.kind === 'user' ? input.author.userId : null,
        input.author.kind === 'persona' ? input.author.personaId : null,
        input.parentId,
        input.content,
        input.status,
        input.createdAt
      ]
    );
    return mapReply(result.rows[0] ?? {});
  }

  async getReply(id: string): Promise<Reply | null> {
    const result = await this.query(`SELECT ${REPLY_COLUMNS} FROM forum_replies WHERE id = $1`, [id]);
    return result.rows[0] ? mapReply(result.rows[0]) : null;
  }

  async listReplies(threadId: string): Promise<Reply[]> {
    const result = await this.query(
      `SELECT ${REPLY_COLUMNS} FROM forum_replies WHERE thread_id = $1 ORDER BY created_at ASC, seq ASC`,
      [threadId]
    );
    return result.rows.map(mapReply);
  }

  async listRecentCompletedReplies(threadId: string, options: RecentRepliesOptions): Promise<Reply[]> {
    const result = await this.query(
      `SELECT ${REPLY_COLUMNS} FROM (
         SELECT ${REPLY_COLUMNS}, seq FROM forum_replies
         WHERE thread_id = $1 AND status = 'completed' AND ($3::uuid IS NULL OR id <> $3::uuid)
         ORDER BY created_at DESC, seq DESC
         LIMIT $2
       ) recent
       ORDER BY created_at ASC, seq ASC`,
      [threadId, options.limit, options.excludeReplyId ?? null]
    );
    return result.rows.map(mapReply);
  }

  async updateReply(id: string, patch: ReplyPatch): Promise<Reply | null> {
    const result = patch.content === undefined
      ? await this.query(
          `UPDATE forum_replies SET status = $2 WHERE id = $1 RETURNING ${REPLY_COLUMNS}`,
          [id, patch.status]
        )
      : await this.query(
          `UPDATE forum_replies SET status = $2, content = $3 WHERE id = $1 RETURNING ${REPLY_COLUMNS}`,
          [id, patch.status, patch.content]
        );
    return result.rows[0] ? mapReply(result.rows[0]) : null;
  }

  async deleteReply(id: string): Promise<boolean> {
    return affected(await this.query('DELETE FROM forum_replies WHERE id = $1', [id]));
  }

  // Agent schedules

  async createSchedules(threadId: string, entries: NewSchedule[], now: Date): Promise<AgentSchedule[]> {
    if (entries.length === 0) return [];

    const values: unknown[] = [threadId, now];
    const tuples = entries.map(entry => {
      values.push(uuidv4(), entry.personaId, entry.nextFireAt);
      const base = values.length - 2;
      return `($${base}, $1, $${base + 1}, $${base + 2}, 0, TRUE, $2)`;
    });

    try {
      const result = await this.query(
        `INSERT INTO forum_agent_schedules (id, thread_id, persona_id, next_fire_at, reply_count, is_active, created_at)
         VALUES ${tuples.join(', ')}
         RETURNING ${SCHEDULE_COLUMNS.join(', ')}`,
        values
      );
      return result.rows.map(mapSchedule);
    } catch (error) {
      if (isUniqueViolation(error, SCHEDULE_UNIQUE_CONSTRAINT)) {
        throw new DuplicateScheduleError(threadId);
      }
      throw error;
    }
  }

  async countSchedulesForThread(threadId: string): Promise<number> {
    const result = await this.query(
      'SELECT COUNT(*) AS count FROM forum_agent_schedules WHERE thread_id = $1',
      [threadId]
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async getSchedule(id: string): Promise<AgentSchedule | null> {
    const result = await this.query(
      `SELECT ${SCHEDULE_COLUMNS.join(', ')} FROM forum_agent_schedules WHERE id = $1`,
      [id]
    );
    return result.rows[0] ? mapSchedule(result.rows[0]) : null;
  }

  async listDueSchedules(now: Date): Promise<AgentSchedule[]> {
    const result = await this.query(
      `SELECT ${SCHEDULE_COLUMNS.map(column => `s.${column}`).join(', ')}
       FROM forum_agent_schedules s
       JOIN forum_personas p ON p.id = s.persona_id
       WHERE s.is_active = TRUE AND p.is_active = TRUE
         AND s.claim_token IS NULL
         AND s.next_fire_at IS NOT NULL AND s.next_fire_at <= $1
       ORDER BY s.next_fire_at ASC, s.seq ASC`,
      [now]
    );
    return result.rows.map(mapSchedule);
  }

  async listActiveSchedulesForThread(threadId: string): Promise<AgentSchedule[]> {
    const result = await this.query(
      `SELECT ${SCHEDULE_COLUMNS.join(', ')} FROM forum_agent_schedules
       WHERE thread_id = $1 AND is_active = TRUE
       ORDER BY created_at ASC, seq ASC`,
      [threadId]
    );
    return result.rows.map(mapSchedule);
  }

  async listStalledSchedules(claimedBefore: Date): Promise<AgentSchedule[]> {
    const result = await this.query(
      `SELECT ${SCHEDULE_COLUMNS.join(', ')} FROM forum_agent_schedules
       WHERE is_active = TRUE
         AND (claim_token IS NOT NULL OR next_fire_at IS NULL)
         AND (claimed_at IS NULL OR claimed_at < $1)
       ORDER BY seq ASC`,
      [claimedBefore]
    );
    return result.rows.map(mapSchedule);
  }

  async claimSchedule(id: string, expectedNextFireAt: Date, claim: ScheduleClaim): Promise<boolean> {
    // Compared at millisecond precision, the resolution of the value the caller read
    const result = await this.query(
      `UPDATE forum_agent_schedules
       SET next_fire_at = NULL, claim_token = $3, claimed_at = $4
       WHERE id = $1 AND is_active = TRUE AND claim_token IS NULL
         AND date_trunc('milliseconds', next_fire_at) = date_trunc('milliseconds', $2::timestamptz)`,
      [id, expectedNextFireAt, claim.claimToken, claim.claimedAt]
    );
    return affected(result);
  }

  async releaseClaim(id: string, claimToken: string, nextFireAt: Date): Promise<boolean> {
    const result = await this.query(
      `UPDATE forum_agent_schedules
       SET next_fire_at = $3, claim_token = NULL, claimed_at = NULL
       WHERE id = $1 AND claim_token = $2`,
      [id, claimToken, nextFireAt]
    );
    return affected(result);
  }

  async bumpSchedule(id: string, nextFireAt: Date, threshold: Date): Promise<boolean> {
    const result = await this.query(
      `UPDATE forum_agent_schedules
       SET next_fire_at = $2
       WHERE id = $1 AND is_active = TRUE
         AND (next_fire_at IS NULL OR (next_fire_at > $3 AND next_fire_at > $2))`,
      [id, nextFireAt, threshold]
    );
    return affected(result);
  }

  async updateSchedule(id: string, patch: SchedulePatch): Promise<AgentSchedule | null> {
    const values: unknown[] = [id];
    const assignments: string[] = [];
    const assign = (column: string, value: unknown) => {
      values.push(value);
      assignments.push(`${column} = $${values.length}`);
    };

    if (patch.nextFireAt !== undefined) assign('next_fire_at', patch.nextFireAt);
    if (patch.claimToken !== undefined) assign('claim_token', patch.claimToken);
    if (patch.claimedAt !== undefined) assign('claimed_at', patch.claimedAt);
    if (patch.replyCount !== undefined) assign('reply_count', patch.replyCount);
    if (patch.lastReplyAt !== undefined) assign('last_reply_at', patch.lastReplyAt);
    if (patch.isActive !== undefined) assign('is_active', patch.isActive);

    if (assignments.length === 0) return this.getSchedule(id);

    const result = await this.query(
      `UPDATE forum_agent_schedules SET ${assignments.join(', ')} WHERE id = $1
       RETURNING ${SCHEDULE_COLUMNS.join(', ')}`,
      values
    );
    return result.rows[0] ? mapSchedule(result.rows[0]) : null;
  }
}

class PgTransaction extends PgRepository implements ForumTransaction {
  async lockSchedule(id: string): Promise<AgentSchedule | null> {
    const result = await this.query(
      `SELECT ${SCHEDULE_COLUMNS.join(', ')} FROM forum_agent_schedules WHERE id = $1 FOR UPDATE`,
      [id]
    );
    return result.rows[0] ? mapSchedule(result.rows[0]) : null;
  }
}

export class PgForumStore extends PgRepository implements ForumStore {
  constructor(private readonly driver: PgDriver) {
    super(driver.query);
  }

  transaction<T>(fn: (tx: ForumTransaction) => Promise<T>): Promise<T> {
    return this.driver.transaction(query => fn(new PgTransaction(query)));
  }

  close(): Promise<void> {
    return this.driver.end();
  }
}
