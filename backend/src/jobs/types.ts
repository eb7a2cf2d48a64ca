import { z } from 'zod';
import type { JobResult } from '../agents/results.js';

export const JobPayloadSchemas = {
  'forum.initialize_schedules': z.object({
    threadId: z.string().uuid()
  }),
  'forum.generate_reply': z.object({
    scheduleId: z.string().uuid(),
    threadId: z.string().uuid(),
    personaId: z.string().uuid(),
    claimToken: z.string().uuid()
  }),
  'forum.bump_schedules': z.object({
    threadId: z.string().uuid()
  }),
  'forum.generate_direct_reply': z.object({
    threadId: z.string().uuid(),
    parentReplyId: z.string().uuid(),
    userReplyContent: z.string().min(1)
  })
} as const;

export type JobName = keyof typeof JobPayloadSchemas;

export type JobPayloads = {
  [K in JobName]: z.infer<(typeof JobPayloadSchemas)[K]>;
};

export interface EnqueueOptions {
  delayMs?: number;
}

export interface JobHandle {
  id: string;
  name: JobName;
  runAt: Date;
}

export interface JobQueue {
  enqueue<K extends JobName>(name: K, payload: JobPayloads[K], options?: EnqueueOptions): Promise<JobHandle>;
}

export type JobHandlers = {
  [K in JobName]: (payload: JobPayloads[K]) => Promise<JobResult<object>>;
};
