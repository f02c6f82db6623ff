import { DEFAULT_CONFIG } from "../../src/config.js";
import { heartbeat, registerAgent } from "../../src/state/heartbeat.js";
import { acquire } from "../../src/state/lock-store.js";
import { readEvents } from "../../src/state/read-events.js";
import { runReaperPass } from "../../src/state/reaper.js";
import { claimTask } from "../../src/state/task-claim.js";
import { enqueue } from "../../src/state/tasks.js";
import { makeTmpRepo, runCli } from "./utils.js";

describe("integration: crash reclaim", () => {
  test("a dead agent's lock and task go to a live agent", async () => {
    const { root, paths } = await makeTmpRepo();
    const config = DEFAULT_CONFIG;
    const startMs = Date.now();

    await registerAgent({ paths, agentId: "agent-a", processHandle: "4242", nowMs: startMs });
    await enqueue({ paths, input: { id: "task-1", type: "docs" }, nowMs: startMs });
    const claim = await claimTask({ paths, config, agentId: "agent-a", capabilities: ["docs"], nowMs: startMs });
    expect(claim?.taskId).toBe("task-1");
    await heartbeat({
      paths,
      agentId: "agent-a",
      update: { state: "working", currentTask: { taskId: "task-1", startedAt: new Date(startMs).toISOString() } },
      nowMs: startMs,
    });
    const held = await acquire({
      paths,
      config,
      request: { resource: "docs/guide.md", mode: "write", owner: "agent-a", processHandle: "4242" },
      nowMs: startMs,
    });
    expect(held.status).toBe("granted");

    const report = await runReaperPass({
      paths,
      config,
      nowMs: startMs + config.crashThresholdMs + 1_000,
      isProcessAlive: (handle) => handle !== "4242",
    });
    expect(report.crashedAgents).toEqual(["agent-a"]);
    expect(report.reaped.map((ticket) => ticket.resource)).toEqual(["docs/guide.md"]);
    expect(report.requeued.map((entry) => entry.taskId)).toEqual(["task-1"]);

    expect(await runCli({ root, args: ["heartbeat", "agent-a"] })).toEqual({ code: 2, lines: ["crashed"] });

    const claimed = await runCli({ root, args: ["task", "claim", "--agent", "agent-b", "--capabilities", "docs"] });
    expect(claimed).toEqual({ code: 0, lines: ["task=task-1", "type=docs", "retryCount=1"] });
    const lock = await runCli({ root, args: ["acquire", "docs/guide.md", "--agent", "agent-b"] });
    expect(lock.code).toBe(0);

    const registered = await runCli({ root, args: ["register", "agent-a"] });
    expect(registered.lines).toEqual(["agent=agent-a", "state=idle"]);

    const kinds = (await readEvents({ eventsLog: paths.eventsLog })).map((event) => event.kind);
    expect(kinds).toEqual([
      "task_enqueued",
      "task_assigned",
      "acquire",
      "reap",
      "agent_crashed",
      "task_requeued",
      "task_assigned",
      "acquire",
    ]);
  });

  test("a slow agent with a live process keeps its work", async () => {
    const { paths } = await makeTmpRepo();
    const startMs = Date.now();
    await registerAgent({ paths, agentId: "agent-a", processHandle: "4242", nowMs: startMs });
    const report = await runReaperPass({
      paths,
      config: DEFAULT_CONFIG,
      nowMs: startMs + DEFAULT_CONFIG.crashThresholdMs + 1_000,
      isProcessAlive: () => true,
    });
    expect(report.crashedAgents).toEqual([]);
  });
});
