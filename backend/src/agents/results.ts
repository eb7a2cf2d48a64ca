import { Logger } from '../utils/logger.js';

export interface JobFailure {
  success: false;
  error: string;
  // Set when the job found nothing to do rather than failing
  skipped?: boolean;
}

export type JobResult<T extends object> = ({ success: true } & T) | JobFailure;

export interface InitializeSchedulesOutcome {
  threadId: string;
  participants: number;
  alreadyInitialized?: boolean;
}

export interface DispatchOutcome {
  queued: number;
  skipped: number;
  recovered: number;
}

export interface GenerateReplyOutcome {
  replyId: string;
  personaName: string;
  nextFireAt: Date | null;
}

export interface BumpOutcome {
  bumped: number;
}

export interface DirectReplyOutcome {
  replyId: string;
  personaName: string;
}

export function failure(error: string, skipped?: boolean): JobFailure {
  return skipped ? { success: false, error, skipped } : { success: false, error };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Job boundary: any error thrown by `run` is logged with the given context and
 * turned into a failure result, so one bad job never takes a worker down.
 */
export async function runAtBoundary<T extends object>(
  component: string,
  context: Record<string, string>,
  run: () => Promise<JobResult<T>>
): Promise<JobResult<T>> {
  try {
    return await run();
  } catch (error) {
    Logger.error(`[${component}] Job failed:`, { ...context, error: errorMessage(error) }, error);
    return failure(errorMessage(error));
  }
}
