export type MatchCheck = { changed: true; matchId: string } | { changed: false };

export type NotificationResult =
  | { status: "sent"; messageId: string }
  | { status: "failed"; error: Error };

/**
 * - expired: the follow window ended and the record was deleted
 * - unchanged: no new match since the last pass
 * - notified: a new match was posted and the record now points at it
 * - ignored: a new match without the player in it, the record was advanced without posting
 * - failed: an error left the record as it was, it is retried next pass. This includes every failed send,
 *   whatever Discord answered.
 */
export type FollowOutcome = "expired" | "unchanged" | "notified" | "ignored" | "failed";

export type PassResult = Record<FollowOutcome, number> & {
  processed: number;
  /** records not reached because the pass was aborted */
  skipped: number;
};

export function anEmptyPassResult(): PassResult {
  return { processed: 0, skipped: 0, expired: 0, unchanged: 0, notified: 0, ignored: 0, failed: 0 };
}
