import { formatElapsed, formatEventLine } from "../format/format-event.js";

const NOW_MS = Date.parse("2026-03-01T12:00:00.000Z");

describe("formatEventLine", () => {
  test("formats tag, age, agent and resource", () => {
    const line = formatEventLine({
      event: {
        ts: "2026-03-01T11:58:00.000Z",
        kind: "preempt",
        msg: "preempted: deadlock",
        agentId: "agent-2",
        resource: "src/a.ts",
      },
      nowMs: NOW_MS,
    });
    expect(line).toBe("KILL | t-2m | preempt | agent-2 | src/a.ts | preempted: deadlock");
  });

  test("falls back to task id and dashes", () => {
    const line = formatEventLine({
      event: { ts: "2026-03-01T11:59:30.000Z", kind: "task_requeued", msg: "claim timed out", taskId: "t9" },
      nowMs: NOW_MS,
    });
    expect(line).toBe("RISK | t-30s | task_requeued | - | t9 | claim timed out");
  });

  test("clips long lines", () => {
    const line = formatEventLine({
      event: { ts: "2026-03-01T12:00:00.000Z", kind: "error", msg: "x".repeat(300) },
      nowMs: NOW_MS,
    });
    expect(line).toHaveLength(140);
    expect(line.endsWith("…")).toBe(true);
  });
});

describe("formatElapsed", () => {
  test("scales units", () => {
    expect(formatElapsed({ ts: "2026-03-01T09:00:00.000Z", nowMs: NOW_MS })).toBe("3h");
    expect(formatElapsed({ ts: "2026-02-27T12:00:00.000Z", nowMs: NOW_MS })).toBe("2d");
  });
});
