import { z } from 'zod';
import { ReplyStatusSchema } from './forum-types.js';

// Request schemas

export const CreateThreadRequestSchema = z.object({
  title: z.string().trim().min(1).max(255),
  content: z.string().trim().min(1).max(10000)
});

export type CreateThreadRequest = z.infer<typeof CreateThreadRequestSchema>;

export const CreateReplyRequestSchema = z.object({
  content: z.string().trim().min(1).max(5000)
});

export type CreateReplyRequest = z.infer<typeof CreateReplyRequestSchema>;

export const ThreadListQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  perPage: z.coerce.number().int().min(1).max(100).default(20)
});

export type ThreadListQuery = z.infer<typeof ThreadListQuerySchema>;

// Response shapes (dates are ISO strings on the wire)

export const UserBriefSchema = z.object({
  id: z.string(),
  name: z.string().nullable(),
  avatarUrl: z.string().nullable()
});

export type UserBrief = z.infer<typeof UserBriefSchema>;

export const AgentInfoSchema = z.object({
  personaId: z.string().nullable(),
  displayName: z.string()
});

export type AgentInfo = z.infer<typeof AgentInfoSchema>;

export const ReplyResponseSchema = z.object({
  id: z.string(),
  content: z.string().nullable(),
  status: ReplyStatusSchema,
  user: UserBriefSchema.nullable(),
  agent: AgentInfoSchema.nullable(),
  parentId: z.string().nullable(),
  createdAt: z.string()
});

export type ReplyResponse = z.infer<typeof ReplyResponseSchema>;

export const ThreadListItemSchema = z.object({
  id: z.string(),
  title: z.string(),
  user: UserBriefSchema.nullable(),
  createdAt: z.string(),
  replyCount: z.number().int().nonnegative(),
  lastActivityAt: z.string(),
  isPinned: z.boolean()
});

export type ThreadListItem = z.infer<typeof ThreadListItemSchema>;

export const ThreadListResponseSchema = z.object({
  threads: z.array(ThreadListItemSchema),
  total: z.number().int().nonnegative(),
  page: z.number().int(),
  perPage: z.number().int()
});

export type ThreadListResponse = z.infer<typeof ThreadListResponseSchema>;

export const ThreadDetailResponseSchema = z.object({
  id: z.string(),
  title: z.string(),
  content: z.string(),
  user: UserBriefSchema.nullable(),
  createdAt: z.string(),
  lastActivityAt: z.string(),
  isPinned: z.boolean(),
  replies: z.array(ReplyResponseSchema)
});

export type ThreadDetailResponse = z.infer<typeof ThreadDetailResponseSchema>;

export const ReplyStatusResponseSchema = z.object({
  id: z.string(),
  status: ReplyStatusSchema,
  content: z.string().nullable()
});

export type ReplyStatusResponse = z.infer<typeof ReplyStatusResponseSchema>;

export const PersonaBriefSchema = z.object({
  id: z.string(),
  name: z.string()
});

export type PersonaBrief = z.infer<typeof PersonaBriefSchema>;
