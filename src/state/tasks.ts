import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { LockstepPaths } from "../paths.js";
import { createJsonExclusive, listJsonFiles, readJsonFile } from "./atomic-file.js";
import { appendEvent } from "./events.js";
import {
  isRecord,
  isSafeId,
  parseTimestampMs,
  readNumber,
  readOptionalRecord,
  readOptionalString,
  readString,
} from "./records.js";

export interface Task {
  id: string;
  type: string;
  priority: number;
  createdAt: string;
  /** Free-form hints for the agent that runs the task. */
  requirements: Record<string, unknown>;
  retryCount: number;
  lastError?: string;
}

export interface TaskInput {
  id?: string;
  type: string;
  priority?: number;
  requirements?: Record<string, unknown>;
}

export const queuePathFor = ({ paths, taskId }: { paths: LockstepPaths; taskId: string }): string =>
  join(paths.queueDir, `${taskId}.json`);

export const parseTask = ({ value }: { value: unknown }): Task | null => {
  if (!isRecord(value)) {
    return null;
  }
  const id = readString({ record: value, key: "id" });
  const type = readString({ record: value, key: "type" });
  const createdAt = readString({ record: value, key: "createdAt" });
  const priority = readNumber({ record: value, key: "priority" });
  const retryCount = readNumber({ record: value, key: "retryCount" });
  if (!id || !type || !createdAt || priority === null || retryCount === null) {
    return null;
  }
  if (!isSafeId(id) || parseTimestampMs({ value: createdAt }) === null) {
    return null;
  }
  return {
    id,
    type,
    priority,
    createdAt,
    requirements: readOptionalRecord({ record: value, key: "requirements" }) ?? {},
    retryCount,
    lastError: readOptionalString({ record: value, key: "lastError" }),
  };
};

/** Highest priority first, then oldest, then id so the order is total. */
export const compareTasks = (a: Task, b: Task): number =>
  b.priority - a.priority ||
  (parseTimestampMs({ value: a.createdAt }) ?? 0) - (parseTimestampMs({ value: b.createdAt }) ?? 0) ||
  a.id.localeCompare(b.id);

export const listQueued = async ({ paths }: { paths: LockstepPaths }): Promise<Task[]> => {
  const files = await listJsonFiles({ dir: paths.queueDir });
  const tasks = await Promise.all(
    files.map(async (file) => parseTask({ value: await readJsonFile({ path: join(paths.queueDir, file) }) })),
  );
  return tasks.filter((task): task is Task => task !== null).sort(compareTasks);
};

export const loadQueued = async ({
  paths,
  taskId,
}: {
  paths: LockstepPaths;
  taskId: string;
}): Promise<Task | null> => {
  if (!isSafeId(taskId)) {
    return null;
  }
  const task = parseTask({ value: await readJsonFile({ path: queuePathFor({ paths, taskId }) }) });
  return task && task.id === taskId ? task : null;
};

export const enqueue = async ({
  paths,
  input,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  input: TaskInput;
  nowMs?: number;
}): Promise<Task> => {
  const type = input.type.trim();
  if (type.length === 0) {
    throw new Error("Missing task type");
  }
  const id = input.id?.trim() || randomUUID();
  if (!isSafeId(id)) {
    throw new Error(`Invalid task id: ${id}`);
  }
  const task: Task = {
    id,
    type,
    priority: input.priority ?? 0,
    createdAt: new Date(nowMs).toISOString(),
    requirements: input.requirements ?? {},
    retryCount: 0,
  };
  const created = await createJsonExclusive({ path: queuePathFor({ paths, taskId: id }), value: task });
  if (!created) {
    throw new Error(`Task ${id} is already queued`);
  }
  await appendEvent({
    eventsLog: paths.eventsLog,
    event: {
      kind: "task_enqueued",
      msg: `${type} queued`,
      taskId: id,
      data: { type, priority: task.priority },
    },
  });
  return task;
};
