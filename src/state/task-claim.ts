import { mkdir, rename, stat, utimes } from "node:fs/promises";
import { join } from "node:path";
import type { LockstepConfig } from "../config.js";
import { PENDING_REQUEUE_GRACE_MS } from "../constants.js";
import type { LockstepPaths } from "../paths.js";
import {
  createJsonExclusive,
  hasErrorCode,
  listJsonFiles,
  readJsonFile,
  removeFile,
  writeJsonAtomic,
} from "./atomic-file.js";
import { appendEvent } from "./events.js";
import { isRecord, isSafeId, parseTimestampMs, readString } from "./records.js";
import { isEligible } from "./specialization.js";
import type { Task } from "./tasks.js";
import { listQueued, parseTask, queuePathFor } from "./tasks.js";

export interface TaskClaim {
  taskId: string;
  agentId: string;
  claimedAt: string;
  task: Task;
}

/** A claim plus the last time its holder touched it. */
export interface ClaimInfo extends TaskClaim {
  touchedAtMs: number;
}

export interface FailedTask {
  task: Task;
  failedAt: string;
  error: string;
  agentId?: string;
}

export type RequeueResult =
  | { status: "requeued"; task: Task }
  | { status: "failed"; task: Task }
  | { status: "not_claimed" };

export type CompleteResult = { status: "ok"; task: Task; durationMs: number } | { status: "not_claimed" };

type ClaimConfig = Pick<LockstepConfig, "specialization">;
type RequeueConfig = Pick<LockstepConfig, "retryCeiling">;

export const claimPathFor = ({ paths, taskId }: { paths: LockstepPaths; taskId: string }): string =>
  join(paths.claimsDir, `${taskId}.json`);

const pendingPathFor = ({ paths, taskId }: { paths: LockstepPaths; taskId: string }): string =>
  join(paths.requeueDir, `${taskId}.json`);

const failedPathFor = ({ paths, taskId }: { paths: LockstepPaths; taskId: string }): string =>
  join(paths.failedDir, `${taskId}.json`);

const parseClaim = ({ value }: { value: unknown }): TaskClaim | null => {
  if (!isRecord(value)) {
    return null;
  }
  const taskId = readString({ record: value, key: "taskId" });
  const agentId = readString({ record: value, key: "agentId" });
  const claimedAt = readString({ record: value, key: "claimedAt" });
  const task = parseTask({ value: value.task });
  if (!taskId || !agentId || !claimedAt || !task || task.id !== taskId) {
    return null;
  }
  return { taskId, agentId, claimedAt, task };
};

const parseFailed = ({ value }: { value: unknown }): FailedTask | null => {
  if (!isRecord(value)) {
    return null;
  }
  const task = parseTask({ value: value.task });
  const failedAt = readString({ record: value, key: "failedAt" });
  const error = readString({ record: value, key: "error" });
  if (!task || !failedAt || !error) {
    return null;
  }
  const agentId = readString({ record: value, key: "agentId" });
  return agentId ? { task, failedAt, error, agentId } : { task, failedAt, error };
};

export const readClaim = async ({
  paths,
  taskId,
}: {
  paths: LockstepPaths;
  taskId: string;
}): Promise<TaskClaim | null> => {
  if (!isSafeId(taskId)) {
    return null;
  }
  return parseClaim({ value: await readJsonFile({ path: claimPathFor({ paths, taskId }) }) });
};

/**
 * Claims one specific queued task for `agentId`. The claim file is an exclusive create, so
 * among racing claimers exactly one wins.
 */
export const claimQueuedTask = async ({
  paths,
  task,
  agentId,
  assignedBy = "claim",
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  task: Task;
  agentId: string;
  assignedBy?: "claim" | "router";
  nowMs?: number;
}): Promise<TaskClaim | null> => {
  const claimedAt = new Date(nowMs).toISOString();
  const claimPath = claimPathFor({ paths, taskId: task.id });
  if (!(await createJsonExclusive({ path: claimPath, value: { taskId: task.id, agentId, claimedAt, task } }))) {
    return null;
  }
  // The listing may predate another agent's claim and completion or requeue of the same
  // task, so the claim carries the queued record as it is now, never the listed copy.
  const queuePath = queuePathFor({ paths, taskId: task.id });
  const current = parseTask({ value: await readJsonFile({ path: queuePath }) });
  if (!current || current.id !== task.id) {
    await removeFile({ path: claimPath });
    return null;
  }
  const claim: TaskClaim = { taskId: current.id, agentId, claimedAt, task: current };
  await writeJsonAtomic({ path: claimPath, value: claim });
  if (!(await removeFile({ path: queuePath }))) {
    await removeFile({ path: claimPath });
    return null;
  }
  await appendEvent({
    eventsLog: paths.eventsLog,
    event: {
      kind: "task_assigned",
      msg: `${current.type} assigned`,
      agentId,
      taskId: current.id,
      data: { type: current.type, priority: current.priority, retryCount: current.retryCount, assignedBy },
    },
  });
  return claim;
};

/** Claims the best eligible queued task. Never blocks: returns null when nothing is eligible. */
export const claimTask = async ({
  paths,
  config,
  agentId,
  capabilities = [],
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  config: ClaimConfig;
  agentId: string;
  capabilities?: string[];
  nowMs?: number;
}): Promise<TaskClaim | null> => {
  const queued = await listQueued({ paths });
  for (const task of queued) {
    if (!isEligible({ matrix: config.specialization, type: task.type, agentId, capabilities })) {
      continue;
    }
    const claim = await claimQueuedTask({ paths, task, agentId, nowMs });
    if (claim) {
      return claim;
    }
  }
  return null;
};

/** Refreshes the claim's mtime so orphan recovery leaves it alone. */
export const touchClaim = async ({
  paths,
  taskId,
  agentId,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  taskId: string;
  agentId: string;
  nowMs?: number;
}): Promise<boolean> => {
  const claim = await readClaim({ paths, taskId });
  if (!claim || claim.agentId !== agentId) {
    return false;
  }
  const at = new Date(nowMs);
  try {
    await utimes(claimPathFor({ paths, taskId }), at, at);
  } catch (error) {
    if (hasErrorCode({ error, code: "ENOENT" })) {
      return false;
    }
    throw error;
  }
  return true;
};

export const completeTask = async ({
  paths,
  taskId,
  agentId,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  taskId: string;
  agentId: string;
  nowMs?: number;
}): Promise<CompleteResult> => {
  const claim = await readClaim({ paths, taskId });
  if (!claim || claim.agentId !== agentId) {
    return { status: "not_claimed" };
  }
  const durationMs = Math.max(0, nowMs - (parseTimestampMs({ value: claim.claimedAt }) ?? nowMs));
  if (!(await removeFile({ path: claimPathFor({ paths, taskId }) }))) {
    return { status: "not_claimed" };
  }
  await appendEvent({
    eventsLog: paths.eventsLog,
    event: {
      kind: "task_completed",
      msg: `${claim.task.type} completed`,
      agentId,
      taskId,
      data: { durationMs, retryCount: claim.task.retryCount },
    },
  });
  return { status: "ok", task: claim.task, durationMs };
};

const settlePending = async ({
  paths,
  config,
  claim,
  reason,
  nowMs,
}: {
  paths: LockstepPaths;
  config: RequeueConfig;
  claim: TaskClaim;
  reason: string;
  nowMs: number;
}): Promise<RequeueResult> => {
  const task: Task = { ...claim.task, retryCount: claim.task.retryCount + 1, lastError: reason };
  const pendingPath = pendingPathFor({ paths, taskId: task.id });
  if (task.retryCount > config.retryCeiling) {
    await appendEvent({
      eventsLog: paths.eventsLog,
      event: {
        kind: "task_failed",
        msg: `retry ceiling reached: ${reason}`,
        agentId: claim.agentId,
        taskId: task.id,
        data: { retryCount: task.retryCount, retryCeiling: config.retryCeiling },
      },
    });
    const failed: FailedTask = {
      task,
      failedAt: new Date(nowMs).toISOString(),
      error: reason,
      agentId: claim.agentId,
    };
    await writeJsonAtomic({ path: failedPathFor({ paths, taskId: task.id }), value: failed });
    await removeFile({ path: pendingPath });
    return { status: "failed", task };
  }
  await appendEvent({
    eventsLog: paths.eventsLog,
    event: {
      kind: "task_requeued",
      msg: reason,
      agentId: claim.agentId,
      taskId: task.id,
      data: { retryCount: task.retryCount },
    },
  });
  await writeJsonAtomic({ path: queuePathFor({ paths, taskId: task.id }), value: task });
  await removeFile({ path: pendingPath });
  return { status: "requeued", task };
};

/**
 * Returns a claimed task to the queue with `retryCount + 1`, or moves it to the failed
 * state once the count passes the retry ceiling. Renaming the claim aside is the commit
 * point: of several concurrent requeuers only one finds the claim to move.
 */
export const requeueTask = async ({
  paths,
  config,
  taskId,
  reason,
  expectedAgentId,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  config: RequeueConfig;
  taskId: string;
  reason: string;
  expectedAgentId?: string;
  nowMs?: number;
}): Promise<RequeueResult> => {
  const claim = await readClaim({ paths, taskId });
  if (!claim || (expectedAgentId !== undefined && claim.agentId !== expectedAgentId)) {
    return { status: "not_claimed" };
  }
  const pendingPath = pendingPathFor({ paths, taskId });
  await mkdir(paths.requeueDir, { recursive: true });
  try {
    await rename(claimPathFor({ paths, taskId }), pendingPath);
  } catch (error) {
    if (hasErrorCode({ error, code: "ENOENT" })) {
      return { status: "not_claimed" };
    }
    throw error;
  }
  return settlePending({ paths, config, claim, reason, nowMs });
};

/** Agent-reported failure. Counts as an attempt, like a timeout. */
export const failTask = async ({
  paths,
  config,
  taskId,
  agentId,
  error,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  config: RequeueConfig;
  taskId: string;
  agentId: string;
  error: string;
  nowMs?: number;
}): Promise<RequeueResult> =>
  requeueTask({ paths, config, taskId, reason: error, expectedAgentId: agentId, nowMs });

/** Finishes requeues whose process died between moving the claim aside and settling it. */
export const finishPendingRequeues = async ({
  paths,
  config,
  nowMs = Date.now(),
  graceMs = PENDING_REQUEUE_GRACE_MS,
}: {
  paths: LockstepPaths;
  config: RequeueConfig;
  nowMs?: number;
  graceMs?: number;
}): Promise<RequeueResult[]> => {
  const results: RequeueResult[] = [];
  for (const file of await listJsonFiles({ dir: paths.requeueDir })) {
    const path = join(paths.requeueDir, file);
    const claim = parseClaim({ value: await readJsonFile({ path }) });
    if (!claim) {
      continue;
    }
    const info = await statOrNull({ path });
    if (!info || nowMs - info.mtimeMs <= graceMs) {
      continue;
    }
    results.push(await settlePending({ paths, config, claim, reason: "requeue interrupted", nowMs }));
  }
  return results;
};

const statOrNull = async ({ path }: { path: string }): Promise<{ mtimeMs: number } | null> => {
  try {
    return await stat(path);
  } catch (error) {
    if (hasErrorCode({ error, code: "ENOENT" })) {
      return null;
    }
    throw error;
  }
};

export const listClaims = async ({ paths }: { paths: LockstepPaths }): Promise<ClaimInfo[]> => {
  const claims: ClaimInfo[] = [];
  for (const file of await listJsonFiles({ dir: paths.claimsDir })) {
    const path = join(paths.claimsDir, file);
    const claim = parseClaim({ value: await readJsonFile({ path }) });
    const info = claim ? await statOrNull({ path }) : null;
    if (claim && info) {
      claims.push({ ...claim, touchedAtMs: info.mtimeMs });
    }
  }
  return claims;
};

export const listFailed = async ({ paths }: { paths: LockstepPaths }): Promise<FailedTask[]> => {
  const files = await listJsonFiles({ dir: paths.failedDir });
  const failed = await Promise.all(
    files.map(async (file) => parseFailed({ value: await readJsonFile({ path: join(paths.failedDir, file) }) })),
  );
  return failed.filter((entry): entry is FailedTask => entry !== null);
};

/** Puts a failed task back in the queue with a fresh retry budget. */
export const retryFailed = async ({
  paths,
  taskId,
}: {
  paths: LockstepPaths;
  taskId: string;
}): Promise<Task | null> => {
  if (!isSafeId(taskId)) {
    return null;
  }
  const failedPath = failedPathFor({ paths, taskId });
  const failed = parseFailed({ value: await readJsonFile({ path: failedPath }) });
  if (!failed) {
    return null;
  }
  const { lastError: _lastError, ...rest } = failed.task;
  const task: Task = { ...rest, retryCount: 0 };
  if (!(await createJsonExclusive({ path: queuePathFor({ paths, taskId }), value: task }))) {
    throw new Error(`Task ${taskId} is already queued`);
  }
  await removeFile({ path: failedPath });
  await appendEvent({
    eventsLog: paths.eventsLog,
    event: {
      kind: "task_enqueued",
      msg: `${task.type} retried from failed`,
      taskId,
      data: { type: task.type, priority: task.priority, retried: true },
    },
  });
  return task;
};
