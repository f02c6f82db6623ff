import { join } from "node:path";
import type { LockstepPaths } from "../paths.js";
import { readJsonFile, writeJsonAtomic } from "./atomic-file.js";
import {
  isRecord,
  parseTimestampMs,
  readNumber,
  readOptionalRecord,
  readOptionalString,
  readString,
} from "./records.js";

export const AGENT_STATES = ["idle", "working", "blocked", "crashed"] as const;

export type AgentState = (typeof AGENT_STATES)[number];

export const isAgentState = (value: unknown): value is AgentState =>
  typeof value === "string" && AGENT_STATES.some((state) => state === value);

export interface CurrentTask {
  taskId: string;
  startedAt: string;
  estimatedCompletion?: string;
}

export interface AgentStatus {
  agentId: string;
  state: AgentState;
  currentTask?: CurrentTask;
  queueDepth: number;
  /** Rolling mean in milliseconds. */
  avgTaskDuration: number;
  lastHeartbeat: string;
  processHandle?: string;
}

export type HeartbeatResult = { status: "ok"; record: AgentStatus } | { status: "crashed"; record: AgentStatus };

export interface HeartbeatUpdate {
  state?: Exclude<AgentState, "crashed">;
  currentTask?: CurrentTask | null;
  queueDepth?: number;
  avgTaskDuration?: number;
  processHandle?: string;
}

export const statusPathFor = ({ paths, agentId }: { paths: LockstepPaths; agentId: string }): string =>
  join(paths.statusDir, `${agentId}.json`);

const parseCurrentTask = ({ value }: { value: unknown }): CurrentTask | undefined => {
  if (!isRecord(value)) {
    return undefined;
  }
  const taskId = readString({ record: value, key: "taskId" });
  const startedAt = readString({ record: value, key: "startedAt" });
  if (!taskId || !startedAt) {
    return undefined;
  }
  return {
    taskId,
    startedAt,
    estimatedCompletion: readOptionalString({ record: value, key: "estimatedCompletion" }),
  };
};

export const parseAgentStatus = ({ value }: { value: unknown }): AgentStatus | null => {
  if (!isRecord(value)) {
    return null;
  }
  const agentId = readString({ record: value, key: "agentId" });
  const lastHeartbeat = readString({ record: value, key: "lastHeartbeat" });
  if (!agentId || !lastHeartbeat || !isAgentState(value.state)) {
    return null;
  }
  return {
    agentId,
    state: value.state,
    currentTask: parseCurrentTask({ value: readOptionalRecord({ record: value, key: "currentTask" }) }),
    queueDepth: readNumber({ record: value, key: "queueDepth" }) ?? 0,
    avgTaskDuration: readNumber({ record: value, key: "avgTaskDuration" }) ?? 0,
    lastHeartbeat,
    processHandle: readOptionalString({ record: value, key: "processHandle" }),
  };
};

export const readStatus = async ({
  paths,
  agentId,
}: {
  paths: LockstepPaths;
  agentId: string;
}): Promise<AgentStatus | null> => {
  const status = parseAgentStatus({ value: await readJsonFile({ path: statusPathFor({ paths, agentId }) }) });
  return status && status.agentId === agentId ? status : null;
};

export const isHeartbeatStale = ({
  status,
  nowMs,
  thresholdMs,
}: {
  status: AgentStatus;
  nowMs: number;
  thresholdMs: number;
}): boolean => {
  const lastMs = parseTimestampMs({ value: status.lastHeartbeat });
  return lastMs === null || nowMs - lastMs > thresholdMs;
};

/** Writes a fresh idle record, replacing whatever was there, including a crashed one. */
export const registerAgent = async ({
  paths,
  agentId,
  processHandle,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  agentId: string;
  processHandle?: string;
  nowMs?: number;
}): Promise<AgentStatus> => {
  const previous = await readStatus({ paths, agentId });
  const record: AgentStatus = {
    agentId,
    state: "idle",
    queueDepth: 0,
    avgTaskDuration: previous?.avgTaskDuration ?? 0,
    lastHeartbeat: new Date(nowMs).toISOString(),
    processHandle,
  };
  await writeJsonAtomic({ path: statusPathFor({ paths, agentId }), value: record });
  return record;
};

/**
 * Overwrites the agent's record in place. A record the reaper already marked crashed is
 * left untouched: the agent has to register again.
 */
export const heartbeat = async ({
  paths,
  agentId,
  update = {},
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  agentId: string;
  update?: HeartbeatUpdate;
  nowMs?: number;
}): Promise<HeartbeatResult> => {
  const previous = await readStatus({ paths, agentId });
  if (previous?.state === "crashed") {
    return { status: "crashed", record: previous };
  }
  const currentTask =
    update.currentTask === null ? undefined : (update.currentTask ?? previous?.currentTask);
  const record: AgentStatus = {
    agentId,
    state: update.state ?? previous?.state ?? "idle",
    currentTask,
    queueDepth: update.queueDepth ?? previous?.queueDepth ?? 0,
    avgTaskDuration: update.avgTaskDuration ?? previous?.avgTaskDuration ?? 0,
    lastHeartbeat: new Date(nowMs).toISOString(),
    processHandle: update.processHandle ?? previous?.processHandle,
  };
  await writeJsonAtomic({ path: statusPathFor({ paths, agentId }), value: record });
  return { status: "ok", record };
};

/**
 * Marks the agent crashed from the record on disk. Returns null when the agent has
 * heartbeated since `status` was read, leaving the fresher record in place.
 */
export const markCrashed = async ({
  paths,
  status,
}: {
  paths: LockstepPaths;
  status: AgentStatus;
}): Promise<AgentStatus | null> => {
  const current = await readStatus({ paths, agentId: status.agentId });
  if (!current || current.lastHeartbeat !== status.lastHeartbeat) {
    return null;
  }
  const record: AgentStatus = { ...current, state: "crashed" };
  await writeJsonAtomic({ path: statusPathFor({ paths, agentId: status.agentId }), value: record });
  return record;
};

/** Folds one finished task into the rolling mean. */
export const nextAverageDuration = ({
  previousMs,
  sampleMs,
}: {
  previousMs: number;
  sampleMs: number;
}): number => (previousMs <= 0 ? sampleMs : Math.round(previousMs * 0.8 + sampleMs * 0.2));
