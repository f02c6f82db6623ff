import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

export const EVENT_KINDS = [
  "acquire",
  "blocked",
  "renew",
  "release",
  "expire",
  "preempt",
  "deadlock",
  "reap",
  "lock_timeout",
  "agent_crashed",
  "task_enqueued",
  "task_assigned",
  "task_requeued",
  "task_completed",
  "task_failed",
  "error",
] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

export interface LockstepEvent {
  ts: string;
  kind: EventKind;
  msg: string;
  agentId?: string;
  ticketId?: string;
  resource?: string;
  taskId?: string;
  data?: Record<string, unknown>;
}

export const isEventKind = (value: unknown): value is EventKind =>
  typeof value === "string" && EVENT_KINDS.some((kind) => kind === value);

// One JSON object per line. Lines are written with a single O_APPEND write.
export const appendEvent = async ({
  eventsLog,
  event,
}: {
  eventsLog: string;
  event: Omit<LockstepEvent, "ts"> & { ts?: string };
}): Promise<void> => {
  const payload: LockstepEvent = { ...event, ts: event.ts ?? new Date().toISOString() };
  await mkdir(dirname(eventsLog), { recursive: true });
  await appendFile(eventsLog, `${JSON.stringify(payload)}\n`, "utf-8");
};
