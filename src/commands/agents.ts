import { normalizeAgentId, processHandleFor } from "../agent-ids.js";
import type { CurrentTask, HeartbeatUpdate } from "../state/heartbeat.js";
import { heartbeat, readStatus, registerAgent } from "../state/heartbeat.js";
import { touchClaim } from "../state/task-claim.js";
import {
  commandParser,
  EXIT_REFUSED,
  loadCommandContext,
  positionalValue,
  requireValue,
} from "./context.js";

const HEARTBEAT_STATES = ["idle", "working", "blocked"] as const;

type HeartbeatState = (typeof HEARTBEAT_STATES)[number];

const isHeartbeatState = (value: unknown): value is HeartbeatState =>
  typeof value === "string" && HEARTBEAT_STATES.some((state) => state === value);

export const runRegister = async ({ args }: { args: string[] }): Promise<number> => {
  const { paths } = await loadCommandContext();
  const parsed = commandParser({ args, scriptName: "lockstep register" })
    .command("$0 <agent>", "register an agent", (y) => y.positional("agent", { type: "string" }))
    .option("pid", { type: "number" })
    .parseSync();
  const agentId = normalizeAgentId({ idRaw: positionalValue({ argv: parsed, name: "agent" }) });
  const record = await registerAgent({
    paths,
    agentId,
    processHandle: parsed.pid === undefined ? undefined : processHandleFor({ pid: parsed.pid }),
  });
  console.log(`agent=${record.agentId}`);
  console.log(`state=${record.state}`);
  return 0;
};

/**
 * Refreshes the agent's status. Naming a task also touches its claim, so one heartbeat
 * keeps both the agent and its work from being reclaimed.
 */
export const runHeartbeat = async ({ args }: { args: string[] }): Promise<number> => {
  const { paths } = await loadCommandContext();
  const parsed = commandParser({ args, scriptName: "lockstep heartbeat" })
    .command("$0 <agent>", "refresh an agent's status", (y) => y.positional("agent", { type: "string" }))
    .option("state", { type: "string" })
    .option("task", { type: "string" })
    .option("clear-task", { type: "boolean", default: false })
    .option("eta", { type: "string" })
    .option("queue-depth", { type: "number" })
    .option("avg-ms", { type: "number" })
    .option("pid", { type: "number" })
    .parseSync();
  const agentId = normalizeAgentId({ idRaw: positionalValue({ argv: parsed, name: "agent" }) });
  if (parsed.state !== undefined && !isHeartbeatState(parsed.state)) {
    throw new Error(`Invalid --state value: ${parsed.state} (use idle, working or blocked)`);
  }

  const nowMs = Date.now();
  let currentTask: CurrentTask | null | undefined;
  if (parsed.clearTask) {
    currentTask = null;
  } else if (parsed.task !== undefined) {
    const taskId = requireValue({ value: parsed.task, label: "task id" });
    const previous = await readStatus({ paths, agentId });
    const startedAt =
      previous?.currentTask?.taskId === taskId ? previous.currentTask.startedAt : new Date(nowMs).toISOString();
    currentTask = parsed.eta ? { taskId, startedAt, estimatedCompletion: parsed.eta } : { taskId, startedAt };
  }
  const update: HeartbeatUpdate = {
    state: parsed.state,
    currentTask,
    queueDepth: parsed.queueDepth,
    avgTaskDuration: parsed.avgMs,
    processHandle: parsed.pid === undefined ? undefined : processHandleFor({ pid: parsed.pid }),
  };
  const result = await heartbeat({ paths, agentId, update, nowMs });
  if (result.status === "crashed") {
    console.log("crashed");
    return EXIT_REFUSED;
  }
  const taskId = result.record.currentTask?.taskId;
  if (taskId) {
    await touchClaim({ paths, taskId, agentId, nowMs });
  }
  console.log(`state=${result.record.state}`);
  console.log(`lastHeartbeat=${result.record.lastHeartbeat}`);
  return 0;
};
