import { join } from "node:path";
import type { LockstepPaths } from "../paths.js";
import { listDirs, listJsonFiles, readJsonFile, removeFile, writeJsonAtomic } from "./atomic-file.js";
import type { LockMode } from "./compatibility.js";
import { isLockMode } from "./compatibility.js";
import { effectivePriority } from "./priority-aging.js";
import { isRecord, parseTimestampMs, readNumber, readString } from "./records.js";
import { slotIdFor } from "./tickets.js";

/**
 * A blocked request that is still being retried. Owned by the deadlock detector: it is
 * the only input besides tickets from which the wait-for graph is built, and it is never
 * a ticket.
 */
export interface WaitEdge {
  agentId: string;
  resource: string;
  mode: LockMode;
  priority: number;
  since: string;
  refreshedAt: string;
}

const waitPathFor = ({
  paths,
  agentId,
  resource,
}: {
  paths: LockstepPaths;
  agentId: string;
  resource: string;
}): string => join(paths.waitsDir, agentId, `${slotIdFor({ resource })}.json`);

const parseWaitEdge = ({ value }: { value: unknown }): WaitEdge | null => {
  if (!isRecord(value)) {
    return null;
  }
  const agentId = readString({ record: value, key: "agentId" });
  const resource = readString({ record: value, key: "resource" });
  const since = readString({ record: value, key: "since" });
  const refreshedAt = readString({ record: value, key: "refreshedAt" });
  const priority = readNumber({ record: value, key: "priority" });
  if (!agentId || !resource || !since || !refreshedAt || priority === null || !isLockMode(value.mode)) {
    return null;
  }
  return { agentId, resource, mode: value.mode, priority, since, refreshedAt };
};

/** Records or refreshes a wait. The original `since` is kept so aging keeps accruing. */
export const registerWait = async ({
  paths,
  agentId,
  resource,
  mode,
  priority,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  agentId: string;
  resource: string;
  mode: LockMode;
  priority: number;
  nowMs?: number;
}): Promise<WaitEdge> => {
  const path = waitPathFor({ paths, agentId, resource });
  const existing = parseWaitEdge({ value: await readJsonFile({ path }) });
  const now = new Date(nowMs).toISOString();
  const edge: WaitEdge = {
    agentId,
    resource,
    mode,
    priority,
    since: existing && existing.mode === mode ? existing.since : now,
    refreshedAt: now,
  };
  await writeJsonAtomic({ path, value: edge });
  return edge;
};

export const clearWait = async ({
  paths,
  agentId,
  resource,
}: {
  paths: LockstepPaths;
  agentId: string;
  resource: string;
}): Promise<void> => {
  await removeFile({ path: waitPathFor({ paths, agentId, resource }) });
};

export const clearAgentWaits = async ({
  paths,
  agentId,
}: {
  paths: LockstepPaths;
  agentId: string;
}): Promise<number> => {
  const dir = join(paths.waitsDir, agentId);
  const files = await listJsonFiles({ dir });
  let removed = 0;
  for (const file of files) {
    if (await removeFile({ path: join(dir, file) })) {
      removed += 1;
    }
  }
  return removed;
};

export const isWaitFresh = ({
  edge,
  nowMs,
  waitTtlMs,
}: {
  edge: WaitEdge;
  nowMs: number;
  waitTtlMs: number;
}): boolean => {
  const refreshedMs = parseTimestampMs({ value: edge.refreshedAt });
  return refreshedMs !== null && nowMs - refreshedMs <= waitTtlMs;
};

export const readAllWaits = async ({ paths }: { paths: LockstepPaths }): Promise<WaitEdge[]> => {
  const agents = await listDirs({ dir: paths.waitsDir });
  const edges: WaitEdge[] = [];
  for (const agent of agents) {
    const dir = join(paths.waitsDir, agent);
    for (const file of await listJsonFiles({ dir })) {
      const edge = parseWaitEdge({ value: await readJsonFile({ path: join(dir, file) }) });
      if (edge) {
        edges.push(edge);
      }
    }
  }
  return edges;
};

export const readFreshWaits = async ({
  paths,
  nowMs,
  waitTtlMs,
}: {
  paths: LockstepPaths;
  nowMs: number;
  waitTtlMs: number;
}): Promise<WaitEdge[]> => {
  const edges = await readAllWaits({ paths });
  return edges.filter((edge) => isWaitFresh({ edge, nowMs, waitTtlMs }));
};

/** Deletes wait records nobody has refreshed within `waitTtlMs`. */
export const pruneStaleWaits = async ({
  paths,
  nowMs,
  waitTtlMs,
}: {
  paths: LockstepPaths;
  nowMs: number;
  waitTtlMs: number;
}): Promise<number> => {
  const edges = await readAllWaits({ paths });
  let pruned = 0;
  for (const edge of edges) {
    if (!isWaitFresh({ edge, nowMs, waitTtlMs })) {
      await clearWait({ paths, agentId: edge.agentId, resource: edge.resource });
      pruned += 1;
    }
  }
  return pruned;
};

export const waitEffectivePriority = ({
  edge,
  nowMs,
  agingRatePerMinute,
}: {
  edge: WaitEdge;
  nowMs: number;
  agingRatePerMinute: number;
}): number =>
  effectivePriority({
    priority: edge.priority,
    waitingSinceMs: parseTimestampMs({ value: edge.since }) ?? nowMs,
    nowMs,
    agingRatePerMinute,
  });
