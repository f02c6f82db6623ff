import { isHeartbeatStale } from "../state/heartbeat.js";
import { listGranted } from "../state/lock-store.js";
import { readStatuses } from "../state/read-statuses.js";
import { listClaims, listFailed } from "../state/task-claim.js";
import { listQueued } from "../state/tasks.js";
import { commandParser, formatSeconds, loadCommandContext, printJson } from "./context.js";

export const runStatus = async ({ args }: { args: string[] }): Promise<number> => {
  const { paths, config } = await loadCommandContext();
  const parsed = commandParser({ args, scriptName: "lockstep status" })
    .option("json", { type: "boolean", default: false })
    .parseSync();
  const nowMs = Date.now();
  const [statuses, tickets, queued, claims, failed] = await Promise.all([
    readStatuses({ paths }),
    listGranted({ paths, nowMs }),
    listQueued({ paths }),
    listClaims({ paths }),
    listFailed({ paths }),
  ]);

  const agents = statuses.map((status) => ({
    ...status,
    stale: isHeartbeatStale({ status, nowMs, thresholdMs: config.crashThresholdMs }),
    tickets: tickets.filter((ticket) => ticket.owner === status.agentId).length,
  }));
  if (parsed.json) {
    printJson({
      value: { agents, tickets: tickets.length, queued: queued.length, claimed: claims.length, failed: failed.length },
    });
    return 0;
  }

  console.log(`agents=${agents.length}`);
  console.log(`tickets=${tickets.length}`);
  console.log(`queued=${queued.length}`);
  console.log(`claimed=${claims.length}`);
  console.log(`failed=${failed.length}`);
  for (const agent of agents) {
    const heartbeatAgeMs = nowMs - new Date(agent.lastHeartbeat).getTime();
    console.log(
      [
        `agent=${agent.agentId}`,
        `state=${agent.state}`,
        `task=${agent.currentTask?.taskId ?? "-"}`,
        `queueDepth=${agent.queueDepth}`,
        `tickets=${agent.tickets}`,
        `heartbeat=${formatSeconds({ ms: heartbeatAgeMs })}`,
        agent.stale ? "stale" : "",
      ]
        .filter((part) => part.length > 0)
        .join(" "),
    );
  }
  return 0;
};
