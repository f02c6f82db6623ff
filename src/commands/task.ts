import { normalizeAgentId } from "../agent-ids.js";
import { heartbeat, nextAverageDuration, readStatus } from "../state/heartbeat.js";
import { isRecord } from "../state/records.js";
import {
  claimTask,
  completeTask,
  failTask,
  listClaims,
  listFailed,
  retryFailed,
  touchClaim,
} from "../state/task-claim.js";
import type { RequeueResult } from "../state/task-claim.js";
import { enqueue, listQueued } from "../state/tasks.js";
import type { CommandContext } from "./context.js";
import { commandParser, EXIT_REFUSED, loadCommandContext, printJson, requireValue } from "./context.js";

const parseRequirements = ({ raw }: { raw: string | undefined }): Record<string, unknown> | undefined => {
  if (raw === undefined || raw.trim().length === 0) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch (error) {
    throw new Error("--requirements must be a JSON object", { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new Error("--requirements must be a JSON object");
  }
  return parsed;
};

const parseCapabilities = ({ raw }: { raw: string | undefined }): string[] =>
  (raw ?? "")
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

const printRequeue = ({ result }: { result: RequeueResult }): number => {
  switch (result.status) {
    case "requeued": {
      console.log(`requeued=${result.task.id}`);
      console.log(`retryCount=${result.task.retryCount}`);
      return 0;
    }
    case "failed": {
      console.log(`failed=${result.task.id}`);
      console.log(`retryCount=${result.task.retryCount}`);
      return 0;
    }
    case "not_claimed": {
      console.log("not_claimed");
      return EXIT_REFUSED;
    }
  }
};

const markIdle = async ({
  context,
  agentId,
  durationMs,
}: {
  context: CommandContext;
  agentId: string;
  durationMs?: number;
}): Promise<void> => {
  const previous = await readStatus({ paths: context.paths, agentId });
  if (!previous) {
    return;
  }
  await heartbeat({
    paths: context.paths,
    agentId,
    update: {
      state: "idle",
      currentTask: null,
      avgTaskDuration:
        durationMs === undefined
          ? undefined
          : nextAverageDuration({ previousMs: previous.avgTaskDuration, sampleMs: durationMs }),
    },
  });
};

export const runTask = async ({ args }: { args: string[] }): Promise<number> => {
  const context = await loadCommandContext();
  const { paths, config } = context;
  let exitCode = 0;
  const parser = commandParser({ args, scriptName: "lockstep task" })
    .command(
      "enqueue <type>",
      "queue a task",
      (y) =>
        y
          .positional("type", { type: "string", demandOption: true })
          .option("id", { type: "string" })
          .option("priority", { type: "number", default: 0 })
          .option("requirements", { type: "string" }),
      async (argv) => {
        const task = await enqueue({
          paths,
          input: {
            id: argv.id,
            type: requireValue({ value: argv.type, label: "task type" }),
            priority: argv.priority,
            requirements: parseRequirements({ raw: argv.requirements }),
          },
        });
        console.log(`task=${task.id}`);
      },
    )
    .command(
      "claim",
      "claim the best eligible task",
      (y) =>
        y
          .option("agent", { type: "string", demandOption: true })
          .option("capabilities", { type: "string" }),
      async (argv) => {
        const agentId = normalizeAgentId({ idRaw: argv.agent });
        const claim = await claimTask({
          paths,
          config,
          agentId,
          capabilities: parseCapabilities({ raw: argv.capabilities }),
        });
        if (!claim) {
          console.log("task=-");
          return;
        }
        const status = await heartbeat({
          paths,
          agentId,
          update: { state: "working", currentTask: { taskId: claim.taskId, startedAt: claim.claimedAt } },
        });
        if (status.status === "crashed") {
          exitCode = EXIT_REFUSED;
        }
        console.log(`task=${claim.taskId}`);
        console.log(`type=${claim.task.type}`);
        console.log(`retryCount=${claim.task.retryCount}`);
      },
    )
    .command(
      "complete <id>",
      "mark a claimed task done",
      (y) =>
        y
          .positional("id", { type: "string", demandOption: true })
          .option("agent", { type: "string", demandOption: true }),
      async (argv) => {
        const agentId = normalizeAgentId({ idRaw: argv.agent });
        const result = await completeTask({ paths, taskId: argv.id, agentId });
        if (result.status === "not_claimed") {
          console.log("not_claimed");
          exitCode = EXIT_REFUSED;
          return;
        }
        await markIdle({ context, agentId, durationMs: result.durationMs });
        console.log(`completed=${result.task.id}`);
        console.log(`durationMs=${result.durationMs}`);
      },
    )
    .command(
      "fail <id>",
      "report a failed attempt",
      (y) =>
        y
          .positional("id", { type: "string", demandOption: true })
          .option("agent", { type: "string", demandOption: true })
          .option("error", { type: "string", default: "failed" }),
      async (argv) => {
        const agentId = normalizeAgentId({ idRaw: argv.agent });
        const result = await failTask({ paths, config, taskId: argv.id, agentId, error: argv.error });
        if (result.status !== "not_claimed") {
          await markIdle({ context, agentId });
        }
        exitCode = printRequeue({ result });
      },
    )
    .command(
      "touch <id>",
      "refresh a claim",
      (y) =>
        y
          .positional("id", { type: "string", demandOption: true })
          .option("agent", { type: "string", demandOption: true }),
      async (argv) => {
        const agentId = normalizeAgentId({ idRaw: argv.agent });
        const touched = await touchClaim({ paths, taskId: argv.id, agentId });
        console.log(touched ? `touched=${argv.id}` : "not_claimed");
        exitCode = touched ? 0 : EXIT_REFUSED;
      },
    )
    .command(
      "list",
      "list queued and claimed tasks",
      (y) => y.option("agent", { type: "string" }).option("json", { type: "boolean", default: false }),
      async (argv) => {
        const queued = await listQueued({ paths });
        const claims = (await listClaims({ paths })).filter(
          (claim) => argv.agent === undefined || claim.agentId === argv.agent,
        );
        if (argv.json) {
          printJson({ value: { queued, claims } });
          return;
        }
        for (const task of queued) {
          console.log(`queued ${task.id} type=${task.type} priority=${task.priority} retryCount=${task.retryCount}`);
        }
        for (const claim of claims) {
          console.log(`claimed ${claim.taskId} type=${claim.task.type} agent=${claim.agentId}`);
        }
      },
    )
    .command(
      "failed",
      "list tasks past the retry ceiling",
      (y) => y.option("json", { type: "boolean", default: false }),
      async (argv) => {
        const failed = await listFailed({ paths });
        if (argv.json) {
          printJson({ value: failed });
          return;
        }
        for (const entry of failed) {
          console.log(`failed ${entry.task.id} type=${entry.task.type} error=${entry.error}`);
        }
      },
    )
    .command(
      "retry <id>",
      "return a failed task to the queue",
      (y) => y.positional("id", { type: "string", demandOption: true }),
      async (argv) => {
        const task = await retryFailed({ paths, taskId: argv.id });
        if (!task) {
          console.log("not_failed");
          exitCode = EXIT_REFUSED;
          return;
        }
        console.log(`task=${task.id}`);
      },
    )
    .demandCommand(1);
  await parser.parseAsync();
  return exitCode;
};
