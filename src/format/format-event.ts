import type { EventKind, LockstepEvent } from "../state/events.js";

const TAGS: Record<EventKind, string> = {
  acquire: "LOCK",
  blocked: "WAIT",
  renew: "LOCK",
  release: "FREE",
  expire: "REAP",
  preempt: "KILL",
  deadlock: "DEAD",
  reap: "REAP",
  lock_timeout: "WAIT",
  agent_crashed: "DEAD",
  task_enqueued: "TASK",
  task_assigned: "TASK",
  task_requeued: "RISK",
  task_completed: "DONE",
  task_failed: "FAIL",
  error: "FAIL",
};

const MAX_LINE = 140;

export const formatElapsed = ({ ts, nowMs }: { ts: string; nowMs: number }): string => {
  const deltaMs = Math.max(0, nowMs - new Date(ts).getTime());
  const seconds = Math.floor(deltaMs / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) {
    return `${minutes}m`;
  }
  const hours = Math.floor(minutes / 60);
  if (hours < 24) {
    return `${hours}h`;
  }
  return `${Math.floor(hours / 24)}d`;
};

export const formatEventLine = ({ event, nowMs }: { event: LockstepEvent; nowMs: number }): string => {
  const tag = TAGS[event.kind].padEnd(4, " ");
  const elapsed = formatElapsed({ ts: event.ts, nowMs });
  const agent = event.agentId ?? "-";
  const target = event.resource ?? event.taskId ?? "-";
  const line = `${tag} | t-${elapsed} | ${event.kind} | ${agent} | ${target} | ${event.msg}`;
  return line.length > MAX_LINE ? `${line.slice(0, MAX_LINE - 1)}…` : line;
};
