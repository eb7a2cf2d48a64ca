import { z } from 'zod';

// Forum users are owned by the external auth system; the forum only reads them
export const ForumUserSchema = z.object({
  id: z.string().uuid(),
  name: z.string().nullable(),
  avatarUrl: z.string().nullable(),
  isAdmin: z.boolean()
});

export type ForumUser = z.infer<typeof ForumUserSchema>;

// A simulated participant. The system prompt is opaque to the scheduler.
export const PersonaSchema = z.object({
  id: z.string().uuid(),
  name: z.string().min(1).max(100),
  systemPrompt: z.string().min(1),
  isActive: z.boolean(),
  createdAt: z.date(),
  updatedAt: z.date()
});

export type Persona = z.infer<typeof PersonaSchema>;

export const ThreadSchema = z.object({
  id: z.string().uuid(),
  userId: z.string().uuid(),
  title: z.string().min(1).max(255),
  content: z.string().min(1).max(10000),
  isPinned: z.boolean(),
  createdAt: z.date(),
  lastActivityAt: z.date()
});

export type Thread = z.infer<typeof ThreadSchema>;

export const ReplyStatusSchema = z.enum(['pending', 'processing', 'completed', 'failed']);

export type ReplyStatus = z.infer<typeof ReplyStatusSchema>;

/**
 * Who wrote a reply. Resolved once when the row is read, so callers switch on
 * `kind` instead of probing nullable columns.
 * `orphaned` means the author (user or persona) has since been deleted.
 */
export const ReplyAuthorSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('user'), userId: z.string().uuid() }),
  z.object({ kind: z.literal('persona'), personaId: z.string().uuid() }),
  z.object({ kind: z.literal('orphaned') })
]);

export type ReplyAuthor = z.infer<typeof ReplyAuthorSchema>;

export const ReplySchema = z.object({
  id: z.string().uuid(),
  threadId: z.string().uuid(),
  author: ReplyAuthorSchema,
  parentId: z.string().uuid().nullable(),
  // null while the reply is pending or processing
  content: z.string().nullable(),
  status: ReplyStatusSchema,
  createdAt: z.date()
});

export type Reply = z.infer<typeof ReplySchema>;

/**
 * One persona's ongoing participation in one thread.
 *
 * `nextFireAt` is null while a dispatcher claim is in flight; `claimToken` and
 * `claimedAt` identify that claim so a superseded job can tell it no longer
 * owns the schedule.
 */
export const AgentScheduleSchema = z.object({
  id: z.string().uuid(),
  threadId: z.string().uuid(),
  personaId: z.string().uuid(),
  nextFireAt: z.date().nullable(),
  claimToken: z.string().uuid().nullable(),
  claimedAt: z.date().nullable(),
  replyCount: z.number().int().nonnegative(),
  lastReplyAt: z.date().nullable(),
  isActive: z.boolean(),
  createdAt: z.date()
});

export type AgentSchedule = z.infer<typeof AgentScheduleSchema>;

export function isAgentReply(reply: Pick<Reply, 'author'>): boolean {
  return reply.author.kind === 'persona';
}
