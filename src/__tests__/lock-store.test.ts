import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { LockstepConfig } from "../config.js";
import { DEFAULT_CONFIG } from "../config.js";
import { LockConflictError } from "../errors.js";
import type { LockstepPaths } from "../paths.js";
import { getLockstepPaths } from "../paths.js";
import { ensureStateDirs } from "../state/ensure-state.js";
import { readEvents } from "../state/read-events.js";
import {
  acquire,
  checkFence,
  checkTicket,
  evict,
  preempt,
  pruneTombstones,
  query,
  release,
  releaseOwned,
  renew,
  snapshotLocks,
} from "../state/lock-store.js";
import { guardPathFor } from "../state/tickets.js";
import { registerWait } from "../state/waits.js";

const NOW_MS = Date.parse("2026-05-01T10:00:00.000Z");

const config: LockstepConfig = { ...DEFAULT_CONFIG, guardWaitMs: 200 };

const makePaths = async (): Promise<LockstepPaths> => {
  const paths = getLockstepPaths({ repoRoot: await mkdtemp(join(tmpdir(), "lockstep-store-")) });
  await ensureStateDirs({ paths });
  return paths;
};

const grant = async ({
  paths,
  owner,
  mode = "write",
  resource = "src/a.ts",
  priority,
  nowMs = NOW_MS,
}: {
  paths: LockstepPaths;
  owner: string;
  mode?: "read" | "write" | "exclusive";
  resource?: string;
  priority?: number;
  nowMs?: number;
}) => {
  const result = await acquire({ paths, config, request: { resource, mode, owner, priority }, nowMs });
  if (result.status !== "granted") {
    throw new Error(`expected a grant for ${owner}, got ${result.reason}`);
  }
  return result.ticket;
};

describe("acquire", () => {
  test("grants a ticket with the default ttl and logs it", async () => {
    const paths = await makePaths();
    const ticket = await grant({ paths, owner: "agent-1", priority: 2 });
    expect(ticket).toMatchObject({
      resource: "src/a.ts",
      mode: "write",
      owner: "agent-1",
      priority: 2,
      acquiredAt: "2026-05-01T10:00:00.000Z",
      expiresAt: "2026-05-01T10:01:00.000Z",
    });
    const events = await readEvents({ eventsLog: paths.eventsLog });
    expect(events.map((event) => [event.kind, event.ticketId])).toEqual([["acquire", ticket.id]]);
  });

  test("clamps the ttl to the maximum", async () => {
    const paths = await makePaths();
    const result = await acquire({
      paths,
      config,
      request: { resource: "src/a.ts", mode: "read", owner: "agent-1", ttlMs: 10 * 60 * 60 * 1000 },
      nowMs: NOW_MS,
    });
    expect(result.status === "granted" && result.ticket.expiresAt).toBe("2026-05-01T10:10:00.000Z");
  });

  test("shares reads and blocks writes against them", async () => {
    const paths = await makePaths();
    await grant({ paths, owner: "agent-1", mode: "read" });
    await grant({ paths, owner: "agent-2", mode: "read" });
    const blocked = await acquire({
      paths,
      config,
      request: { resource: "./src/a.ts", mode: "write", owner: "agent-3" },
      nowMs: NOW_MS,
    });
    expect(blocked.status).toBe("blocked");
    if (blocked.status === "blocked") {
      expect(blocked.reason).toBe("incompatible");
      expect(blocked.holders.map((ticket) => ticket.owner).sort()).toEqual(["agent-1", "agent-2"]);
    }
    const events = await readEvents({ eventsLog: paths.eventsLog });
    expect(events.map((event) => event.kind)).toEqual(["acquire", "acquire", "blocked"]);
  });

  test("blocks reads and exclusives against a writer", async () => {
    const paths = await makePaths();
    await grant({ paths, owner: "agent-1", mode: "write" });
    for (const mode of ["read", "write", "exclusive"] as const) {
      const result = await acquire({ paths, config, request: { resource: "src/a.ts", mode, owner: "agent-2" }, nowMs: NOW_MS });
      expect(result.status).toBe("blocked");
    }
  });

  test("returns the holder's own ticket with a refreshed ttl", async () => {
    const paths = await makePaths();
    const first = await grant({ paths, owner: "agent-1", mode: "write" });
    const again = await grant({ paths, owner: "agent-1", mode: "read", nowMs: NOW_MS + 30_000 });
    expect(again.id).toBe(first.id);
    expect(again.mode).toBe("write");
    expect(again.expiresAt).toBe("2026-05-01T10:01:30.000Z");
    expect(await query({ paths, resource: "src/a.ts", nowMs: NOW_MS + 30_000 })).toHaveLength(1);
  });

  test("upgrades the holder's read in place when nobody else reads", async () => {
    const paths = await makePaths();
    const first = await grant({ paths, owner: "agent-1", mode: "read" });
    const upgraded = await grant({ paths, owner: "agent-1", mode: "write" });
    expect(upgraded.id).toBe(first.id);
    expect(upgraded.mode).toBe("write");
  });

  test("does not upgrade while another agent reads", async () => {
    const paths = await makePaths();
    await grant({ paths, owner: "agent-1", mode: "read" });
    await grant({ paths, owner: "agent-2", mode: "read" });
    const result = await acquire({ paths, config, request: { resource: "src/a.ts", mode: "write", owner: "agent-1" }, nowMs: NOW_MS });
    expect(result.status === "blocked" && result.holders.map((ticket) => ticket.owner)).toEqual(["agent-2"]);
  });

  test("ignores expired tickets", async () => {
    const paths = await makePaths();
    await grant({ paths, owner: "agent-1" });
    const later = await grant({ paths, owner: "agent-2", nowMs: NOW_MS + 61_000 });
    expect(later.owner).toBe("agent-2");
  });

  test("yields to an older incompatible waiter with higher effective priority", async () => {
    const paths = await makePaths();
    await registerWait({
      paths,
      agentId: "agent-9",
      resource: "src/a.ts",
      mode: "write",
      priority: 0,
      nowMs: NOW_MS - 5 * 60_000,
    });
    await registerWait({ paths, agentId: "agent-9", resource: "src/a.ts", mode: "write", priority: 0, nowMs: NOW_MS });
    const result = await acquire({
      paths,
      config,
      request: { resource: "src/a.ts", mode: "write", owner: "agent-1", priority: 3 },
      nowMs: NOW_MS,
    });
    expect(result.status === "blocked" && result.reason).toBe("yield");
    expect(result.status === "blocked" && result.waiters.map((edge) => edge.agentId)).toEqual(["agent-9"]);

    const higher = await acquire({
      paths,
      config,
      request: { resource: "src/a.ts", mode: "write", owner: "agent-1", priority: 6 },
      nowMs: NOW_MS,
    });
    expect(higher.status).toBe("granted");
  });

  test("reports contention when the slot guard stays busy", async () => {
    const paths = await makePaths();
    await grant({ paths, owner: "agent-1", mode: "read" });
    await writeFile(
      guardPathFor({ paths, resource: "src/a.ts" }),
      JSON.stringify({ key: "src/a.ts", lockedAt: new Date().toISOString(), pid: 1 }),
      { flag: "wx" },
    );
    const result = await acquire({
      paths,
      config: { ...config, guardWaitMs: 20 },
      request: { resource: "src/a.ts", mode: "read", owner: "agent-2" },
      nowMs: NOW_MS,
    });
    expect(result).toEqual({ status: "blocked", reason: "contended", holders: [], waiters: [] });
  });

  test("racing writers produce exactly one grant", async () => {
    const paths = await makePaths();
    const results = await Promise.all(
      Array.from({ length: 6 }, (_, index) =>
        acquire({
          paths,
          config: { ...config, guardWaitMs: 5_000 },
          request: { resource: "src/race.ts", mode: "write", owner: `agent-${index}` },
          nowMs: NOW_MS,
        }),
      ),
    );
    expect(results.filter((result) => result.status === "granted")).toHaveLength(1);
    expect(await query({ paths, resource: "src/race.ts", nowMs: NOW_MS })).toHaveLength(1);
  });

  test("rejects unsafe owner ids and empty resources", async () => {
    const paths = await makePaths();
    await expect(
      acquire({ paths, config, request: { resource: "a", mode: "read", owner: "../x" } }),
    ).rejects.toThrow("Invalid owner id: ../x");
    await expect(
      acquire({ paths, config, request: { resource: " ./ ", mode: "read", owner: "agent-1" } }),
    ).rejects.toThrow("Missing resource");
  });
});

describe("fencing tokens", () => {
  test("grow per resource across holders and stay with a reused ticket", async () => {
    const paths = await makePaths();
    const first = await grant({ paths, owner: "agent-1" });
    expect(first.fencingToken).toBe(1);
    await release({ paths, config, ticketId: first.id, nowMs: NOW_MS });
    const second = await grant({ paths, owner: "agent-2" });
    expect(second.fencingToken).toBe(2);
    expect((await grant({ paths, owner: "agent-2" })).fencingToken).toBe(2);
    expect((await grant({ paths, owner: "agent-1", resource: "src/b.ts" })).fencingToken).toBe(1);
    const events = await readEvents({ eventsLog: paths.eventsLog });
    expect(events.filter((event) => event.kind === "acquire").map((event) => event.data?.fencingToken)).toEqual([1, 2, 2, 1]);
  });

  test("a preempted holder's token no longer checks out", async () => {
    const paths = await makePaths();
    const lost = await grant({ paths, owner: "agent-1" });
    expect(await checkFence({ paths, resource: "src/a.ts", fencingToken: lost.fencingToken, nowMs: NOW_MS })).toBe(true);
    await preempt({ paths, config, ticketId: lost.id, reason: "deadlock", nowMs: NOW_MS });
    const next = await grant({ paths, owner: "agent-2" });
    expect(await checkFence({ paths, resource: "./src/a.ts", fencingToken: lost.fencingToken, nowMs: NOW_MS })).toBe(false);
    expect(await checkFence({ paths, resource: "src/a.ts", fencingToken: next.fencingToken, nowMs: NOW_MS })).toBe(true);
    expect(
      await checkFence({ paths, resource: "src/a.ts", fencingToken: next.fencingToken, nowMs: NOW_MS + 120_000 }),
    ).toBe(false);
  });
});

describe("renew", () => {
  test("extends the expiry", async () => {
    const paths = await makePaths();
    const ticket = await grant({ paths, owner: "agent-1" });
    const result = await renew({ paths, config, ticketId: ticket.id, ttlMs: 120_000, nowMs: NOW_MS + 50_000 });
    expect(result.status === "ok" && result.ticket.expiresAt).toBe("2026-05-01T10:02:50.000Z");
  });

  test("reports not_found for unknown and expired tickets", async () => {
    const paths = await makePaths();
    const ticket = await grant({ paths, owner: "agent-1" });
    expect(await renew({ paths, config, ticketId: "missing-ticket", nowMs: NOW_MS })).toEqual({ status: "not_found" });
    expect(await renew({ paths, config, ticketId: ticket.id, nowMs: NOW_MS + 61_000 })).toEqual({ status: "not_found" });
  });

  test("reports preemption to the displaced owner", async () => {
    const paths = await makePaths();
    const ticket = await grant({ paths, owner: "agent-1" });
    expect((await preempt({ paths, config, ticketId: ticket.id, reason: "deadlock", nowMs: NOW_MS })).status).toBe("ok");
    const result = await renew({ paths, config, ticketId: ticket.id, nowMs: NOW_MS });
    expect(result).toEqual({
      status: "preempted",
      tombstone: {
        ticketId: ticket.id,
        resource: "src/a.ts",
        owner: "agent-1",
        reason: "deadlock",
        preemptedAt: "2026-05-01T10:00:00.000Z",
      },
    });
    expect(await checkTicket({ paths, ticketId: ticket.id, nowMs: NOW_MS })).toMatchObject({ status: "preempted" });
  });
});

describe("release", () => {
  test("is idempotent", async () => {
    const paths = await makePaths();
    const ticket = await grant({ paths, owner: "agent-1" });
    expect((await release({ paths, config, ticketId: ticket.id })).status).toBe("ok");
    expect(await release({ paths, config, ticketId: ticket.id })).toEqual({ status: "not_found" });
    expect(await release({ paths, config, ticketId: "../escape" })).toEqual({ status: "not_found" });
    expect(await checkTicket({ paths, ticketId: ticket.id })).toEqual({ status: "absent" });
  });

  test("releaseOwned drops only the owner's tickets", async () => {
    const paths = await makePaths();
    await grant({ paths, owner: "agent-1", mode: "read" });
    await grant({ paths, owner: "agent-2", mode: "read" });
    const released = await releaseOwned({ paths, config, resource: "src/a.ts", owner: "agent-1", nowMs: NOW_MS });
    expect(released.map((ticket) => ticket.owner)).toEqual(["agent-1"]);
    expect((await query({ paths, resource: "src/a.ts", nowMs: NOW_MS })).map((ticket) => ticket.owner)).toEqual([
      "agent-2",
    ]);
  });
});

describe("preempt", () => {
  test("logs before removing and reports not_found afterwards", async () => {
    const paths = await makePaths();
    const ticket = await grant({ paths, owner: "agent-1" });
    await preempt({ paths, config, ticketId: ticket.id, reason: "operator", nowMs: NOW_MS });
    expect(await preempt({ paths, config, ticketId: ticket.id, reason: "again", nowMs: NOW_MS })).toEqual({
      status: "not_found",
    });
    const events = await readEvents({ eventsLog: paths.eventsLog });
    expect(events.map((event) => event.kind)).toEqual(["acquire", "preempt"]);
    expect(await query({ paths, resource: "src/a.ts", nowMs: NOW_MS })).toEqual([]);
  });

  test("tombstones are pruned after the retention window", async () => {
    const paths = await makePaths();
    const ticket = await grant({ paths, owner: "agent-1" });
    await preempt({ paths, config, ticketId: ticket.id, reason: "operator", nowMs: NOW_MS });
    expect(await pruneTombstones({ paths, nowMs: NOW_MS + 1_000, retentionMs: 60_000 })).toBe(0);
    expect(await pruneTombstones({ paths, nowMs: NOW_MS + 61_000, retentionMs: 60_000 })).toBe(1);
    expect(await checkTicket({ paths, ticketId: ticket.id })).toEqual({ status: "absent" });
  });
});

describe("evict", () => {
  test("re-checks the predicate before removing", async () => {
    const paths = await makePaths();
    const ticket = await grant({ paths, owner: "agent-1" });
    const skipped = await evict({
      paths,
      config,
      ticketId: ticket.id,
      kind: "expire",
      reason: "ttl expired",
      shouldEvict: () => false,
    });
    expect(skipped).toEqual({ status: "skipped" });
    const evicted = await evict({
      paths,
      config,
      ticketId: ticket.id,
      kind: "reap",
      reason: "dead",
      shouldEvict: () => true,
    });
    expect(evicted.status).toBe("evicted");
    const events = await readEvents({ eventsLog: paths.eventsLog });
    expect(events.map((event) => event.kind)).toEqual(["acquire", "reap"]);
  });

  test("throws a conflict when the slot stays busy", async () => {
    const paths = await makePaths();
    const ticket = await grant({ paths, owner: "agent-1" });
    await writeFile(
      guardPathFor({ paths, resource: "src/a.ts" }),
      JSON.stringify({ key: "src/a.ts", lockedAt: new Date().toISOString(), pid: 1 }),
      { flag: "wx" },
    );
    await expect(
      release({ paths, config: { ...config, guardWaitMs: 20 }, ticketId: ticket.id }),
    ).rejects.toBeInstanceOf(LockConflictError);
  });
});

describe("snapshotLocks", () => {
  test("reports hold time and ttl remaining", async () => {
    const paths = await makePaths();
    await grant({ paths, owner: "agent-1", resource: "b.ts" });
    await grant({ paths, owner: "agent-2", resource: "a.ts", nowMs: NOW_MS + 10_000 });
    const views = await snapshotLocks({ paths, nowMs: NOW_MS + 20_000 });
    expect(
      views.map((view) => [view.ticket.resource, view.heldMs, view.ttlRemainingMs]),
    ).toEqual([
      ["a.ts", 10_000, 50_000],
      ["b.ts", 20_000, 40_000],
    ]);
  });
});
