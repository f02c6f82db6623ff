import type { LockstepConfig } from "../config.js";
import { TOMBSTONE_RETENTION_MS } from "../constants.js";
import type { LockstepPaths } from "../paths.js";
import { appendEvent } from "./events.js";
import type { AgentStatus } from "./heartbeat.js";
import { isHeartbeatStale, markCrashed } from "./heartbeat.js";
import type { ProcessAliveCheck } from "./liveness.js";
import { isProcessAlive as pidIsAlive } from "./liveness.js";
import { evict, pruneTombstones } from "./lock-store.js";
import { readStatuses } from "./read-statuses.js";
import type { RequeueResult } from "./task-claim.js";
import { finishPendingRequeues, listClaims, requeueTask } from "./task-claim.js";
import type { Ticket } from "./tickets.js";
import { isTicketExpired, readAllTickets } from "./tickets.js";
import { clearAgentWaits, pruneStaleWaits } from "./waits.js";

export interface ReapReport {
  expired: Ticket[];
  reaped: Ticket[];
  crashedAgents: string[];
  requeued: { taskId: string; result: RequeueResult }[];
  prunedWaits: number;
  prunedTombstones: number;
}

type ReaperConfig = Pick<
  LockstepConfig,
  | "crashThresholdMs"
  | "claimTimeoutMs"
  | "retryCeiling"
  | "waitTtlMs"
  | "defaultTtlMs"
  | "maxTtlMs"
  | "guardWaitMs"
  | "agingRatePerMinute"
>;

/**
 * A stale heartbeat alone is not proof of death. The agent's process handle must also be
 * gone (or never have been recorded) before its work is reclaimed.
 */
const isAgentCrashed = ({
  status,
  nowMs,
  config,
  isProcessAlive,
}: {
  status: AgentStatus;
  nowMs: number;
  config: ReaperConfig;
  isProcessAlive: ProcessAliveCheck;
}): boolean =>
  status.state !== "crashed" &&
  isHeartbeatStale({ status, nowMs, thresholdMs: config.crashThresholdMs }) &&
  (status.processHandle === undefined || !isProcessAlive(status.processHandle));

export const runReaperPass = async ({
  paths,
  config,
  nowMs = Date.now(),
  isProcessAlive = pidIsAlive,
}: {
  paths: LockstepPaths;
  config: ReaperConfig;
  nowMs?: number;
  isProcessAlive?: ProcessAliveCheck;
}): Promise<ReapReport> => {
  const report: ReapReport = {
    expired: [],
    reaped: [],
    crashedAgents: [],
    requeued: [],
    prunedWaits: 0,
    prunedTombstones: 0,
  };

  for (const result of await finishPendingRequeues({ paths, config, nowMs })) {
    if (result.status !== "not_claimed") {
      report.requeued.push({ taskId: result.task.id, result });
    }
  }

  for (const ticket of await readAllTickets({ paths })) {
    if (isTicketExpired({ ticket, nowMs })) {
      const result = await evict({
        paths,
        config,
        ticketId: ticket.id,
        kind: "expire",
        reason: "ttl expired",
        shouldEvict: (current) => isTicketExpired({ ticket: current, nowMs }),
      });
      if (result.status === "evicted") {
        report.expired.push(result.ticket);
      }
      continue;
    }
    if (ticket.processHandle !== undefined && !isProcessAlive(ticket.processHandle)) {
      const result = await evict({
        paths,
        config,
        ticketId: ticket.id,
        kind: "reap",
        reason: `process ${ticket.processHandle} of ${ticket.owner} is dead`,
        shouldEvict: (current) =>
          current.processHandle !== undefined && !isProcessAlive(current.processHandle),
      });
      if (result.status === "evicted") {
        report.reaped.push(result.ticket);
      }
    }
  }

  const crashed = new Set<string>();
  for (const status of await readStatuses({ paths })) {
    if (status.state === "crashed") {
      crashed.add(status.agentId);
      continue;
    }
    if (!isAgentCrashed({ status, nowMs, config, isProcessAlive })) {
      continue;
    }
    if (!(await markCrashed({ paths, status }))) {
      continue;
    }
    await appendEvent({
      eventsLog: paths.eventsLog,
      event: {
        kind: "agent_crashed",
        msg: `no heartbeat since ${status.lastHeartbeat}`,
        agentId: status.agentId,
        taskId: status.currentTask?.taskId,
        data: { lastHeartbeat: status.lastHeartbeat, processHandle: status.processHandle },
      },
    });
    crashed.add(status.agentId);
    report.crashedAgents.push(status.agentId);

    for (const ticket of await readAllTickets({ paths })) {
      if (ticket.owner !== status.agentId) {
        continue;
      }
      const result = await evict({
        paths,
        config,
        ticketId: ticket.id,
        kind: "reap",
        reason: `owner ${status.agentId} crashed`,
        shouldEvict: (current) => current.owner === status.agentId,
      });
      if (result.status === "evicted") {
        report.reaped.push(result.ticket);
      }
    }
    await clearAgentWaits({ paths, agentId: status.agentId });

    const currentTaskId = status.currentTask?.taskId;
    if (currentTaskId) {
      const result = await requeueTask({
        paths,
        config,
        taskId: currentTaskId,
        reason: `agent ${status.agentId} crashed`,
        expectedAgentId: status.agentId,
        nowMs,
      });
      if (result.status !== "not_claimed") {
        report.requeued.push({ taskId: currentTaskId, result });
      }
    }
  }

  for (const claim of await listClaims({ paths })) {
    const ownerCrashed = crashed.has(claim.agentId);
    if (!ownerCrashed && nowMs - claim.touchedAtMs <= config.claimTimeoutMs) {
      continue;
    }
    const result = await requeueTask({
      paths,
      config,
      taskId: claim.taskId,
      reason: ownerCrashed ? `agent ${claim.agentId} crashed` : "claim timed out",
      expectedAgentId: claim.agentId,
      nowMs,
    });
    if (result.status !== "not_claimed") {
      report.requeued.push({ taskId: claim.taskId, result });
    }
  }

  report.prunedWaits = await pruneStaleWaits({ paths, nowMs, waitTtlMs: config.waitTtlMs });
  report.prunedTombstones = await pruneTombstones({
    paths,
    nowMs,
    retentionMs: TOMBSTONE_RETENTION_MS,
  });
  return report;
};
