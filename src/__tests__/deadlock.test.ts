import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { LockstepConfig } from "../config.js";
import { DEFAULT_CONFIG } from "../config.js";
import type { LockstepPaths } from "../paths.js";
import { getLockstepPaths } from "../paths.js";
import { buildWaitForGraph, findCycle, runDeadlockPass, selectVictim } from "../state/deadlock.js";
import { ensureStateDirs } from "../state/ensure-state.js";
import { acquire, checkTicket } from "../state/lock-store.js";
import { readEvents } from "../state/read-events.js";
import type { Ticket } from "../state/tickets.js";
import type { WaitEdge } from "../state/waits.js";
import { registerWait } from "../state/waits.js";

const NOW_MS = Date.parse("2026-05-01T10:00:00.000Z");

const config: LockstepConfig = { ...DEFAULT_CONFIG, guardWaitMs: 200 };

const makePaths = async (): Promise<LockstepPaths> => {
  const paths = getLockstepPaths({ repoRoot: await mkdtemp(join(tmpdir(), "lockstep-deadlock-")) });
  await ensureStateDirs({ paths });
  return paths;
};

const ticket = ({ id, owner, resource, priority = 0 }: { id: string; owner: string; resource: string; priority?: number }): Ticket => ({
  id,
  resource,
  mode: "write",
  owner,
  acquiredAt: "2026-05-01T10:00:00.000Z",
  expiresAt: "2026-05-01T10:01:00.000Z",
  priority,
  fencingToken: 1,
});

const wait = ({ agentId, resource, mode = "write" }: { agentId: string; resource: string; mode?: WaitEdge["mode"] }): WaitEdge => ({
  agentId,
  resource,
  mode,
  priority: 0,
  since: "2026-05-01T10:00:00.000Z",
  refreshedAt: "2026-05-01T10:00:00.000Z",
});

const grantAt = async ({
  paths,
  owner,
  resource,
  priority,
  nowMs,
}: {
  paths: LockstepPaths;
  owner: string;
  resource: string;
  priority?: number;
  nowMs: number;
}): Promise<Ticket> => {
  const result = await acquire({ paths, config, request: { resource, mode: "write", owner, priority }, nowMs });
  if (result.status !== "granted") {
    throw new Error(`expected grant for ${owner}`);
  }
  return result.ticket;
};

describe("buildWaitForGraph", () => {
  test("skips self waits and compatible holders", () => {
    const graph = buildWaitForGraph({
      tickets: [
        ticket({ id: "t1", owner: "agent-a", resource: "x" }),
        { ...ticket({ id: "t2", owner: "agent-b", resource: "y" }), mode: "read" },
      ],
      waits: [wait({ agentId: "agent-a", resource: "x" }), wait({ agentId: "agent-c", resource: "y", mode: "read" })],
    });
    expect(graph.nodes).toEqual([]);
    expect(graph.adjacency.size).toBe(0);
  });
});

describe("findCycle", () => {
  test("finds a three-agent cycle starting at the smallest agent", () => {
    const graph = buildWaitForGraph({
      tickets: [
        ticket({ id: "t1", owner: "agent-b", resource: "r1" }),
        ticket({ id: "t2", owner: "agent-c", resource: "r2" }),
        ticket({ id: "t3", owner: "agent-a", resource: "r3" }),
      ],
      waits: [
        wait({ agentId: "agent-c", resource: "r3" }),
        wait({ agentId: "agent-a", resource: "r1" }),
        wait({ agentId: "agent-b", resource: "r2" }),
      ],
    });
    const cycle = findCycle({ graph });
    expect(cycle?.map((edge) => [edge.from, edge.to, edge.resource])).toEqual([
      ["agent-a", "agent-b", "r1"],
      ["agent-b", "agent-c", "r2"],
      ["agent-c", "agent-a", "r3"],
    ]);
  });

  test("returns null for a chain", () => {
    const graph = buildWaitForGraph({
      tickets: [ticket({ id: "t1", owner: "agent-b", resource: "r1" })],
      waits: [wait({ agentId: "agent-a", resource: "r1" })],
    });
    expect(findCycle({ graph })).toBeNull();
  });
});

describe("selectVictim", () => {
  test("picks the lowest priority ticket", () => {
    const graph = buildWaitForGraph({
      tickets: [
        ticket({ id: "t1", owner: "agent-a", resource: "x", priority: 4 }),
        ticket({ id: "t2", owner: "agent-b", resource: "y", priority: 1 }),
      ],
      waits: [wait({ agentId: "agent-a", resource: "y" }), wait({ agentId: "agent-b", resource: "x" })],
    });
    const cycle = findCycle({ graph });
    expect(cycle && selectVictim({ cycle, nowMs: NOW_MS, agingRatePerMinute: 1 })?.id).toBe("t2");
  });

  test("counts the holder's accrued aging", () => {
    const graph = buildWaitForGraph({
      tickets: [
        ticket({ id: "t1", owner: "agent-a", resource: "x", priority: 2 }),
        ticket({ id: "t2", owner: "agent-b", resource: "y", priority: 0 }),
      ],
      waits: [
        wait({ agentId: "agent-a", resource: "y" }),
        { ...wait({ agentId: "agent-b", resource: "x" }), since: "2026-05-01T09:55:00.000Z" },
      ],
    });
    const cycle = findCycle({ graph });
    expect(cycle && selectVictim({ cycle, nowMs: NOW_MS, agingRatePerMinute: 1 })?.id).toBe("t1");
  });

  test("breaks ties by the smallest ticket id", () => {
    const graph = buildWaitForGraph({
      tickets: [ticket({ id: "t9", owner: "agent-a", resource: "x" }), ticket({ id: "t3", owner: "agent-b", resource: "y" })],
      waits: [wait({ agentId: "agent-a", resource: "y" }), wait({ agentId: "agent-b", resource: "x" })],
    });
    const cycle = findCycle({ graph });
    expect(cycle && selectVictim({ cycle, nowMs: NOW_MS, agingRatePerMinute: 1 })?.id).toBe("t3");
  });
});

describe("runDeadlockPass", () => {
  test("preempts the youngest ticket of a two-agent cycle and logs the resolution", async () => {
    const paths = await makePaths();
    const held = await grantAt({ paths, owner: "agent-a", resource: "x.ts", nowMs: NOW_MS });
    const victim = await grantAt({ paths, owner: "agent-b", resource: "y.ts", nowMs: NOW_MS + 1_000 });
    await registerWait({ paths, agentId: "agent-a", resource: "y.ts", mode: "write", priority: 0, nowMs: NOW_MS + 2_000 });
    await registerWait({ paths, agentId: "agent-b", resource: "x.ts", mode: "write", priority: 0, nowMs: NOW_MS + 2_000 });

    const resolutions = await runDeadlockPass({ paths, config, nowMs: NOW_MS + 5_000 });

    expect(resolutions).toEqual([{ cycle: ["agent-a", "agent-b"], victim, resolutionMs: 3_000 }]);
    expect(await checkTicket({ paths, ticketId: victim.id, nowMs: NOW_MS + 5_000 })).toMatchObject({
      status: "preempted",
      tombstone: { reason: "deadlock agent-a -> agent-b -> agent-a" },
    });
    expect((await checkTicket({ paths, ticketId: held.id, nowMs: NOW_MS + 5_000 })).status).toBe("granted");
    const events = await readEvents({ eventsLog: paths.eventsLog });
    expect(events.map((event) => event.kind)).toEqual(["acquire", "acquire", "preempt", "deadlock"]);
    expect(events[3]?.data).toEqual({
      cycle: ["agent-a", "agent-b"],
      victimTicketId: victim.id,
      victimOwner: "agent-b",
      resolutionMs: 3_000,
    });
  });

  test("spares the higher priority holder", async () => {
    const paths = await makePaths();
    const low = await grantAt({ paths, owner: "agent-a", resource: "x.ts", priority: 0, nowMs: NOW_MS });
    await grantAt({ paths, owner: "agent-b", resource: "y.ts", priority: 5, nowMs: NOW_MS + 1_000 });
    await registerWait({ paths, agentId: "agent-a", resource: "y.ts", mode: "write", priority: 0, nowMs: NOW_MS + 2_000 });
    await registerWait({ paths, agentId: "agent-b", resource: "x.ts", mode: "write", priority: 5, nowMs: NOW_MS + 2_000 });

    const resolutions = await runDeadlockPass({ paths, config, nowMs: NOW_MS + 5_000 });
    expect(resolutions.map((resolution) => resolution.victim.id)).toEqual([low.id]);
  });

  test("does nothing without a cycle", async () => {
    const paths = await makePaths();
    await grantAt({ paths, owner: "agent-a", resource: "x.ts", nowMs: NOW_MS });
    await registerWait({ paths, agentId: "agent-b", resource: "x.ts", mode: "write", priority: 0, nowMs: NOW_MS });
    expect(await runDeadlockPass({ paths, config, nowMs: NOW_MS + 1_000 })).toEqual([]);
  });
});
