import type { JobResult } from '../agents/results.js';
import { DirectResponder } from '../agents/direct-responder.js';
import { ReactiveBumper } from '../agents/reactive-bumper.js';
import { ReplyGenerator } from '../agents/reply-generator.js';
import { ScheduleInitializer } from '../agents/schedule-initializer.js';
import { GeneratingAgentDeps } from '../agents/types.js';
import { JobHandlers, JobPayloadSchemas } from './types.js';

export class UnknownJobError extends Error {
  constructor(readonly jobName: string) {
    super(`Unknown job: ${jobName}`);
    this.name = 'UnknownJobError';
  }
}

export function createJobHandlers(deps: GeneratingAgentDeps): JobHandlers {
  const initializer = new ScheduleInitializer(deps);
  const replyGenerator = new ReplyGenerator(deps);
  const bumper = new ReactiveBumper(deps);
  const directResponder = new DirectResponder(deps);

  return {
    'forum.initialize_schedules': payload => initializer.run(payload),
    'forum.generate_reply': payload => replyGenerator.run(payload),
    'forum.bump_schedules': payload => bumper.run(payload),
    'forum.generate_direct_reply': payload => directResponder.run(payload)
  };
}

/**
 * Validates a stored payload against its job's schema and runs the handler.
 * Rejects with UnknownJobError or a ZodError when the job cannot be run at all.
 */
export async function runJob(handlers: JobHandlers, name: string, payload: unknown): Promise<JobResult<object>> {
  switch (name) {
    case 'forum.initialize_schedules':
      return handlers[name](JobPayloadSchemas[name].parse(payload));
    case 'forum.generate_reply':
      return handlers[name](JobPayloadSchemas[name].parse(payload));
    case 'forum.bump_schedules':
      return handlers[name](JobPayloadSchemas[name].parse(payload));
    case 'forum.generate_direct_reply':
      return handlers[name](JobPayloadSchemas[name].parse(payload));
    default:
      throw new UnknownJobError(name);
  }
}
