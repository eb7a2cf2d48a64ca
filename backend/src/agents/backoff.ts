/**
 * Minutes a persona waits before its next reply, indexed by how many replies
 * it has already posted in the thread. Counts past the table use the daily cadence.
 */
export const BACKOFF_MINUTES = [2, 5, 15, 30, 60, 120, 240, 480] as const;

export const DAILY_BACKOFF_MINUTES = 1440;

export function nextDelayMinutes(replyCount: number): number {
  if (!Number.isInteger(replyCount) || replyCount < 0) {
    throw new RangeError(`replyCount must be a non-negative integer, got ${replyCount}`);
  }
  return BACKOFF_MINUTES[replyCount] ?? DAILY_BACKOFF_MINUTES;
}
