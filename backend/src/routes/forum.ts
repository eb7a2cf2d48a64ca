import { Response, Router } from 'express';
import { validate as isUuid } from 'uuid';
import { z } from 'zod';
import {
  CreateReplyRequestSchema,
  CreateThreadRequestSchema,
  ThreadListQuerySchema,
  type ForumUser,
  type Persona,
  type Reply,
  type ReplyResponse,
  type ThreadDetailResponse,
  type ThreadListResponse,
  type UserBrief
} from '@chromedome/shared';
import { routeUserReply } from '../agents/direct-responder.js';
import { ForumStore } from '../database/types.js';
import { JobQueue } from '../jobs/types.js';
import { AuthRequest } from '../middleware/auth.js';
import { Clock, RandomSource } from '../utils/clock.js';
import { HTTP_ERRORS } from '../utils/error-messages.js';
import { Logger } from '../utils/logger.js';

export interface ForumRouterDeps {
  store: ForumStore;
  queue: JobQueue;
  clock: Clock;
  random: RandomSource;
}

function userBrief(user: ForumUser | undefined): UserBrief | null {
  return user ? { id: user.id, name: user.name, avatarUrl: user.avatarUrl } : null;
}

function toReplyResponse(
  reply: Reply,
  users: Map<string, ForumUser>,
  personas: Map<string, Persona>
): ReplyResponse {
  const base = {
    id: reply.id,
    content: reply.content,
    status: reply.status,
    parentId: reply.parentId,
    createdAt: reply.createdAt.toISOString()
  };

  switch (reply.author.kind) {
    case 'user':
      return { ...base, user: userBrief(users.get(reply.author.userId)), agent: null };
    case 'persona': {
      const persona = personas.get(reply.author.personaId);
      return {
        ...base,
        user: null,
        agent: { personaId: reply.author.personaId, displayName: persona?.name ?? 'Unknown' }
      };
    }
    case 'orphaned':
      return { ...base, user: null, agent: null };
  }
}

async function loadAuthors(store: ForumStore, replies: Reply[], extraUserIds: string[] = []) {
  const userIds = [
    ...extraUserIds,
    ...replies.flatMap(reply => (reply.author.kind === 'user' ? [reply.author.userId] : []))
  ];
  const personaIds = replies.flatMap(reply => (reply.author.kind === 'persona' ? [reply.author.personaId] : []));
  const [users, personas] = await Promise.all([store.getUsersByIds(userIds), store.getPersonasByIds(personaIds)]);
  return {
    users: new Map(users.map(user => [user.id, user])),
    personas: new Map(personas.map(persona => [persona.id, persona]))
  };
}

function invalidInput(res: Response, error: z.ZodError) {
  return res.status(400).json({ error: HTTP_ERRORS.INVALID_INPUT, details: error.errors });
}

export function forumRouter({ store, queue, clock, random }: ForumRouterDeps): Router {
  const router = Router();

  // ============== Threads ==============

  // List threads, pinned first then by latest activity
  router.get('/threads', async (req: AuthRequest, res) => {
    try {
      const { page, perPage } = ThreadListQuerySchema.parse(req.query);
      const [threads, total] = await Promise.all([
        store.listThreads({ offset: (page - 1) * perPage, limit: perPage }),
        store.countThreads()
      ]);
      const users = new Map(
        (await store.getUsersByIds(threads.map(thread => thread.userId))).map(user => [user.id, user])
      );

      const body: ThreadListResponse = {
        threads: threads.map(thread => ({
          id: thread.id,
          title: thread.title,
          user: userBrief(users.get(thread.userId)),
          createdAt: thread.createdAt.toISOString(),
          replyCount: thread.replyCount,
          lastActivityAt: thread.lastActivityAt.toISOString(),
          isPinned: thread.isPinned
        })),
        total,
        page,
        perPage
      };
      res.json(body);
    } catch (error) {
      if (error instanceof z.ZodError) {
        return invalidInput(res, error);
      }
      Logger.error('List threads error:', error);
      res.status(500).json({ error: HTTP_ERRORS.INTERNAL });
    }
  });

  // Create thread; personas are picked by a background job
  router.post('/threads', async (req: AuthRequest, res) => {
    try {
      if (!req.user) {
        return res.status(401).json({ error: HTTP_ERRORS.USER_NOT_FOUND });
      }

      const data = CreateThreadRequestSchema.parse(req.body);
      const thread = await store.createThread({ userId: req.user.id, ...data, createdAt: clock.now() });

      try {
        await queue.enqueue('forum.initialize_schedules', { threadId: thread.id });
      } catch (error) {
        Logger.error('Failed to enqueue schedule initialization:', { threadId: thread.id, error });
      }

      Logger.http(`[Forum] Thread ${thread.id} created by ${req.user.id}`);
      res.status(201).json({
        id: thread.id,
        title: thread.title,
        user: userBrief(req.user),
        createdAt: thread.createdAt.toISOString(),
        replyCount: 0,
        lastActivityAt: thread.lastActivityAt.toISOString(),
        isPinned: thread.isPinned
      });
    } catch (error) {
      if (error instanceof z.ZodError) {
        return invalidInput(res, error);
      }
      Logger.error('Create thread error:', error);
      res.status(500).json({ error: HTTP_ERRORS.INTERNAL });
    }
  });

  // Thread with every reply, oldest first
  router.get('/threads/:threadId', async (req: AuthRequest, res) => {
    try {
      const { threadId } = req.params;
      const thread = isUuid(threadId) ? await store.getThread(threadId) : null;
      if (!thread) {
        return res.status(404).json({ error: HTTP_ERRORS.THREAD_NOT_FOUND });
      }

      const replies = await store.listReplies(thread.id);
      const { users, personas } = await loadAuthors(store, replies, [thread.userId]);

      const body: ThreadDetailResponse = {
        id: thread.id,
        title: thread.title,
        content: thread.content,
        user: userBrief(users.get(thread.userId)),
        createdAt: thread.createdAt.toISOString(),
        lastActivityAt: thread.lastActivityAt.toISOString(),
        isPinned: thread.isPinned,
        replies: replies.map(reply => toReplyResponse(reply, users, personas))
      };
      res.json(body);
    } catch (error) {
      Logger.error('Get thread error:', error);
      res.status(500).json({ error: HTTP_ERRORS.INTERNAL });
    }
  });

  // Delete thread (author or admin); replies and schedules cascade
  router.delete('/threads/:threadId', async (req: AuthRequest, res) => {
    try {
      if (!req.user) {
        return res.status(401).json({ error: HTTP_ERRORS.USER_NOT_FOUND });
      }

      const { threadId } = req.params;
      const thread = isUuid(threadId) ? await store.getThread(threadId) : null;
      if (!thread) {
        return res.status(404).json({ error: HTTP_ERRORS.THREAD_NOT_FOUND });
      }
      if (thread.userId !== req.user.id && !req.user.isAdmin) {
        return res.status(403).json({ error: HTTP_ERRORS.NOT_THREAD_OWNER });
      }

      await store.deleteThread(thread.id);
      res.json({ success: true });
    } catch (error) {
      Logger.error('Delete thread error:', error);
      res.status(500).json({ error: HTTP_ERRORS.INTERNAL });
    }
  });

  // ============== Replies ==============

  // Top-level human reply; nudges the thread's personas
  router.post('/threads/:threadId/replies', async (req: AuthRequest, res) => {
    try {
      const user = req.user;
      if (!user) {
        return res.status(401).json({ error: HTTP_ERRORS.USER_NOT_FOUND });
      }

      const data = CreateReplyRequestSchema.parse(req.body);
      const { threadId } = req.params;
      const thread = isUuid(threadId) ? await store.getThread(threadId) : null;
      if (!thread) {
        return res.status(404).json({ error: HTTP_ERRORS.THREAD_NOT_FOUND });
      }

      const reply = await store.transaction(async tx => {
        const now = clock.now();
        const created = await tx.createReply({
          threadId: thread.id,
          author: { kind: 'user', userId: user.id },
          parentId: null,
          content: data.content,
          status: 'completed',
          createdAt: now
        });
        await tx.touchThread(thread.id, now);
        return created;
      });

      try {
        await routeUserReply(queue, random, reply, null);
      } catch (error) {
        Logger.error('Failed to enqueue reply follow-up:', { threadId: thread.id, replyId: reply.id, error });
      }

      res.status(201).json(toReplyResponse(reply, new Map([[user.id, user]]), new Map()));
    } catch (error) {
      if (error instanceof z.ZodError) {
        return invalidInput(res, error);
      }
      Logger.error('Create reply error:', error);
      res.status(500).json({ error: HTTP_ERRORS.INTERNAL });
    }
  });

  // Nested human reply; answering a persona earns a direct reply
  router.post('/replies/:replyId/replies', async (req: AuthRequest, res) => {
    try {
      const user = req.user;
      if (!user) {
        return res.status(401).json({ error: HTTP_ERRORS.USER_NOT_FOUND });
      }

      const data = CreateReplyRequestSchema.parse(req.body);
      const { replyId } = req.params;
      const parent = isUuid(replyId) ? await store.getReply(replyId) : null;
      if (!parent) {
        return res.status(404).json({ error: HTTP_ERRORS.REPLY_NOT_FOUND });
      }

      const reply = await store.transaction(async tx => {
        const now = clock.now();
        const created = await tx.createReply({
          threadId: parent.threadId,
          author: { kind: 'user', userId: user.id },
          parentId: parent.id,
          content: data.content,
          status: 'completed',
          createdAt: now
        });
        await tx.touchThread(parent.threadId, now);
        return created;
      });

      try {
        await routeUserReply(queue, random, reply, parent);
      } catch (error) {
        Logger.error('Failed to enqueue reply follow-up:', { threadId: parent.threadId, replyId: reply.id, error });
      }

      res.status(201).json(toReplyResponse(reply, new Map([[user.id, user]]), new Map()));
    } catch (error) {
      if (error instanceof z.ZodError) {
        return invalidInput(res, error);
      }
      Logger.error('Create nested reply error:', error);
      res.status(500).json({ error: HTTP_ERRORS.INTERNAL });
    }
  });

  // Poll a reply while a persona is writing it
  router.get('/replies/:replyId/status', async (req: AuthRequest, res) => {
    try {
      const { replyId } = req.params;
      const reply = isUuid(replyId) ? await store.getReply(replyId) : null;
      if (!reply) {
        return res.status(404).json({ error: HTTP_ERRORS.REPLY_NOT_FOUND });
      }
      res.json({ id: reply.id, status: reply.status, content: reply.content });
    } catch (error) {
      Logger.error('Get reply status error:', error);
      res.status(500).json({ error: HTTP_ERRORS.INTERNAL });
    }
  });

  // Delete reply (author or admin); nested replies cascade
  router.delete('/replies/:replyId', async (req: AuthRequest, res) => {
    try {
      if (!req.user) {
        return res.status(401).json({ error: HTTP_ERRORS.USER_NOT_FOUND });
      }

      const { replyId } = req.params;
      const reply = isUuid(replyId) ? await store.getReply(replyId) : null;
      if (!reply) {
        return res.status(404).json({ error: HTTP_ERRORS.REPLY_NOT_FOUND });
      }

      const isAuthor = reply.author.kind === 'user' && reply.author.userId === req.user.id;
      if (!isAuthor && !req.user.isAdmin) {
        return res.status(403).json({ error: HTTP_ERRORS.NOT_REPLY_OWNER });
      }

      await store.deleteReply(reply.id);
      res.json({ success: true });
    } catch (error) {
      Logger.error('Delete reply error:', error);
      res.status(500).json({ error: HTTP_ERRORS.INTERNAL });
    }
  });

  // ============== Personas ==============

  router.get('/personas', async (_req: AuthRequest, res) => {
    try {
      const personas = await store.listActivePersonas();
      res.json(personas.map(persona => ({ id: persona.id, name: persona.name })));
    } catch (error) {
      Logger.error('List personas error:', error);
      res.status(500).json({ error: HTTP_ERRORS.INTERNAL });
    }
  });

  return router;
}
