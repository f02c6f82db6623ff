/**
 * Effective priority of a pending request: its base priority plus a bonus that grows
 * linearly with time spent waiting. Strictly increasing in wait time whenever the rate is
 * positive.
 */
export const effectivePriority = ({
  priority,
  waitingSinceMs,
  nowMs,
  agingRatePerMinute,
}: {
  priority: number;
  waitingSinceMs: number;
  nowMs: number;
  agingRatePerMinute: number;
}): number => {
  const waitedMs = Math.max(0, nowMs - waitingSinceMs);
  return priority + (waitedMs / 60_000) * agingRatePerMinute;
};
