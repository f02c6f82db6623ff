import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { LockstepPaths } from "../paths.js";
import { getLockstepPaths } from "../paths.js";
import { ensureStateDirs } from "../state/ensure-state.js";
import { readEvents } from "../state/read-events.js";
import { enqueue, listQueued, loadQueued } from "../state/tasks.js";

const NOW_MS = Date.parse("2026-05-01T10:00:00.000Z");

const makePaths = async (): Promise<LockstepPaths> => {
  const paths = getLockstepPaths({ repoRoot: await mkdtemp(join(tmpdir(), "lockstep-tasks-")) });
  await ensureStateDirs({ paths });
  return paths;
};

describe("enqueue", () => {
  test("writes the task and logs it", async () => {
    const paths = await makePaths();
    const task = await enqueue({
      paths,
      input: { id: "task-1", type: " docs ", priority: 2, requirements: { files: ["README.md"] } },
      nowMs: NOW_MS,
    });
    expect(task).toEqual({
      id: "task-1",
      type: "docs",
      priority: 2,
      createdAt: "2026-05-01T10:00:00.000Z",
      requirements: { files: ["README.md"] },
      retryCount: 0,
    });
    expect(await loadQueued({ paths, taskId: "task-1" })).toEqual(task);
    const events = await readEvents({ eventsLog: paths.eventsLog });
    expect(events.map((event) => [event.kind, event.taskId])).toEqual([["task_enqueued", "task-1"]]);
  });

  test("rejects duplicates and bad input", async () => {
    const paths = await makePaths();
    await enqueue({ paths, input: { id: "task-1", type: "docs" } });
    await expect(enqueue({ paths, input: { id: "task-1", type: "docs" } })).rejects.toThrow(
      "Task task-1 is already queued",
    );
    await expect(enqueue({ paths, input: { type: "  " } })).rejects.toThrow("Missing task type");
    await expect(enqueue({ paths, input: { id: "a/b", type: "docs" } })).rejects.toThrow("Invalid task id: a/b");
  });

  test("generates an id when none is given", async () => {
    const paths = await makePaths();
    const task = await enqueue({ paths, input: { type: "docs" } });
    expect(task.id).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe("listQueued", () => {
  test("orders by priority, then age, then id", async () => {
    const paths = await makePaths();
    await enqueue({ paths, input: { id: "old-low", type: "docs", priority: 0 }, nowMs: NOW_MS });
    await enqueue({ paths, input: { id: "new-high", type: "docs", priority: 5 }, nowMs: NOW_MS + 2_000 });
    await enqueue({ paths, input: { id: "b-high", type: "docs", priority: 5 }, nowMs: NOW_MS + 1_000 });
    await enqueue({ paths, input: { id: "a-high", type: "docs", priority: 5 }, nowMs: NOW_MS + 1_000 });
    await writeFile(join(paths.queueDir, "junk.json"), JSON.stringify({ id: 3 }), "utf-8");
    const queued = await listQueued({ paths });
    expect(queued.map((task) => task.id)).toEqual(["a-high", "b-high", "new-high", "old-low"]);
  });
});
