export const GUARD_STALE_MS = 5_000;
export const GUARD_POLL_MS = 5;
export const TOMBSTONE_RETENTION_MS = 24 * 60 * 60 * 1000;
export const PENDING_REQUEUE_GRACE_MS = 5_000;
