import type { LockstepConfig } from "../config.js";
import type { AgentStatus } from "./heartbeat.js";
import { isHeartbeatStale } from "./heartbeat.js";
import { candidatesFor } from "./specialization.js";
import type { Task } from "./tasks.js";

export type RoutingDecision =
  | { kind: "route"; agentId: string; rank: number }
  | { kind: "saturated"; candidates: string[] }
  | { kind: "unrouted" };

type RoutingConfig = Pick<LockstepConfig, "specialization" | "crashThresholdMs" | "queueDepthThreshold">;

export const isAgentAvailable = ({
  status,
  nowMs,
  config,
}: {
  status: AgentStatus | undefined;
  nowMs: number;
  config: RoutingConfig;
}): boolean => {
  if (!status || status.state === "crashed") {
    return false;
  }
  if (isHeartbeatStale({ status, nowMs, thresholdMs: config.crashThresholdMs })) {
    return false;
  }
  return status.state === "idle" || status.queueDepth < config.queueDepthThreshold;
};

/**
 * Walks the task type's ranked candidates and picks the first that is alive and either idle
 * or under the queue-depth threshold. Types with no candidates are left for agents to claim
 * by capability.
 */
export const routeTask = ({
  task,
  statuses,
  nowMs,
  config,
}: {
  task: Task;
  statuses: Map<string, AgentStatus>;
  nowMs: number;
  config: RoutingConfig;
}): RoutingDecision => {
  const candidates = candidatesFor({ matrix: config.specialization, type: task.type });
  if (candidates.length === 0) {
    return { kind: "unrouted" };
  }
  const rank = candidates.findIndex((agentId) =>
    isAgentAvailable({ status: statuses.get(agentId), nowMs, config }),
  );
  const agentId = candidates[rank];
  if (rank < 0 || agentId === undefined) {
    return { kind: "saturated", candidates };
  }
  return { kind: "route", agentId, rank };
};
