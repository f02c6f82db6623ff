import type { LockstepEvent } from "./events.js";
import { parseTimestampMs } from "./records.js";

export interface AgentUtilization {
  agentId: string;
  busyMs: number;
  /** Busy time over the metrics window. May exceed 1 for agents running tasks in parallel. */
  utilization: number;
  tasksCompleted: number;
  tasksRequeued: number;
}

export interface MetricsSnapshot {
  windowStart: string | null;
  windowEnd: string;
  acquires: number;
  blocked: number;
  /** blocked / (granted + blocked) acquire attempts. */
  collisionRate: number;
  deadlocksResolved: number;
  meanResolutionMs: number | null;
  preemptions: number;
  expired: number;
  reaped: number;
  lockTimeouts: number;
  tasksCompleted: number;
  tasksRequeued: number;
  tasksFailed: number;
  agents: AgentUtilization[];
  /** Blocked acquires per time bucket, oldest first. */
  collisionHistory: number[];
}

const readNumberField = ({ event, key }: { event: LockstepEvent; key: string }): number | null => {
  const value = event.data?.[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
};

const countKind = ({ events, kind }: { events: LockstepEvent[]; kind: LockstepEvent["kind"] }): number =>
  events.filter((event) => event.kind === kind).length;

const bucketCounts = ({
  times,
  startMs,
  endMs,
  buckets,
}: {
  times: number[];
  startMs: number;
  endMs: number;
  buckets: number;
}): number[] => {
  const counts = new Array<number>(buckets).fill(0);
  const spanMs = Math.max(1, endMs - startMs);
  for (const ms of times) {
    const index = Math.min(buckets - 1, Math.max(0, Math.floor(((ms - startMs) / spanMs) * buckets)));
    counts[index] = (counts[index] ?? 0) + 1;
  }
  return counts;
};

/**
 * Derives coordination metrics from the event log. Task busy time runs from `task_assigned`
 * to the task's completion, requeue or failure; tasks still running count up to `nowMs`.
 */
export const computeMetrics = ({
  events,
  nowMs,
  buckets = 20,
}: {
  events: LockstepEvent[];
  nowMs: number;
  buckets?: number;
}): MetricsSnapshot => {
  const timed = events
    .map((event) => ({ event, ms: parseTimestampMs({ value: event.ts }) }))
    .filter((entry): entry is { event: LockstepEvent; ms: number } => entry.ms !== null)
    .sort((a, b) => a.ms - b.ms);
  const startMs = timed[0]?.ms ?? null;
  const windowMs = startMs === null ? 0 : Math.max(0, nowMs - startMs);

  const acquires = countKind({ events, kind: "acquire" });
  const blocked = countKind({ events, kind: "blocked" });
  const attempts = acquires + blocked;

  const resolutions = events
    .filter((event) => event.kind === "deadlock")
    .map((event) => readNumberField({ event, key: "resolutionMs" }))
    .filter((value): value is number => value !== null);

  const agents = new Map<string, AgentUtilization>();
  const agentEntry = (agentId: string): AgentUtilization => {
    const existing = agents.get(agentId);
    if (existing) {
      return existing;
    }
    const created: AgentUtilization = { agentId, busyMs: 0, utilization: 0, tasksCompleted: 0, tasksRequeued: 0 };
    agents.set(agentId, created);
    return created;
  };
  const running = new Map<string, { agentId: string; startMs: number }>();
  for (const { event, ms } of timed) {
    const taskId = event.taskId;
    if (!taskId || !event.agentId) {
      continue;
    }
    if (event.kind === "task_assigned") {
      agentEntry(event.agentId);
      running.set(taskId, { agentId: event.agentId, startMs: ms });
      continue;
    }
    if (event.kind !== "task_completed" && event.kind !== "task_requeued" && event.kind !== "task_failed") {
      continue;
    }
    const open = running.get(taskId);
    const entry = agentEntry(event.agentId);
    if (open && open.agentId === event.agentId) {
      entry.busyMs += Math.max(0, ms - open.startMs);
      running.delete(taskId);
    }
    if (event.kind === "task_completed") {
      entry.tasksCompleted += 1;
    } else {
      entry.tasksRequeued += 1;
    }
  }
  for (const open of running.values()) {
    agentEntry(open.agentId).busyMs += Math.max(0, nowMs - open.startMs);
  }
  for (const entry of agents.values()) {
    entry.utilization = windowMs > 0 ? entry.busyMs / windowMs : 0;
  }

  return {
    windowStart: startMs === null ? null : new Date(startMs).toISOString(),
    windowEnd: new Date(nowMs).toISOString(),
    acquires,
    blocked,
    collisionRate: attempts > 0 ? blocked / attempts : 0,
    deadlocksResolved: countKind({ events, kind: "deadlock" }),
    meanResolutionMs:
      resolutions.length > 0 ? resolutions.reduce((sum, value) => sum + value, 0) / resolutions.length : null,
    preemptions: countKind({ events, kind: "preempt" }),
    expired: countKind({ events, kind: "expire" }),
    reaped: countKind({ events, kind: "reap" }),
    lockTimeouts: countKind({ events, kind: "lock_timeout" }),
    tasksCompleted: countKind({ events, kind: "task_completed" }),
    tasksRequeued: countKind({ events, kind: "task_requeued" }),
    tasksFailed: countKind({ events, kind: "task_failed" }),
    agents: [...agents.values()].sort((a, b) => a.agentId.localeCompare(b.agentId)),
    collisionHistory:
      startMs === null
        ? []
        : bucketCounts({
            times: timed.filter(({ event }) => event.kind === "blocked").map(({ ms }) => ms),
            startMs,
            endMs: nowMs,
            buckets,
          }),
  };
};
