import type { LockstepConfig } from "../config.js";
import type { LockstepPaths } from "../paths.js";
import type { AgentStatus } from "./heartbeat.js";
import { readStatuses } from "./read-statuses.js";
import { routeTask } from "./routing-policy.js";
import type { TaskClaim } from "./task-claim.js";
import { claimQueuedTask } from "./task-claim.js";
import { listQueued } from "./tasks.js";

export interface Assignment {
  claim: TaskClaim;
  rank: number;
}

/**
 * One router pass. Queued tasks are offered in priority order; each routed task is claimed on
 * behalf of the chosen agent, and that agent's depth is bumped locally so later tasks in the
 * same pass see the added load.
 */
export const assignQueuedTasks = async ({
  paths,
  config,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  config: Pick<LockstepConfig, "specialization" | "crashThresholdMs" | "queueDepthThreshold">;
  nowMs?: number;
}): Promise<Assignment[]> => {
  const statuses = new Map<string, AgentStatus>(
    (await readStatuses({ paths })).map((status) => [status.agentId, status]),
  );
  const assignments: Assignment[] = [];
  for (const task of await listQueued({ paths })) {
    const decision = routeTask({ task, statuses, nowMs, config });
    if (decision.kind !== "route") {
      continue;
    }
    const claim = await claimQueuedTask({
      paths,
      task,
      agentId: decision.agentId,
      assignedBy: "router",
      nowMs,
    });
    if (!claim) {
      continue;
    }
    assignments.push({ claim, rank: decision.rank });
    const status = statuses.get(decision.agentId);
    if (status) {
      statuses.set(decision.agentId, {
        ...status,
        state: "working",
        queueDepth: status.queueDepth + 1,
      });
    }
  }
  return assignments;
};
