import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { LockstepConfig } from "../config.js";
import { LockConflictError } from "../errors.js";
import type { LockstepPaths } from "../paths.js";
import {
  createJsonExclusive,
  listJsonFiles,
  readJsonFile,
  removeFile,
  writeJsonAtomic,
} from "./atomic-file.js";
import type { LockMode } from "./compatibility.js";
import { areModesCompatible, modeCovers, normalizeResource } from "./compatibility.js";
import { appendEvent } from "./events.js";
import { isRecord, isSafeId, parseTimestampMs, readString } from "./records.js";
import { acquireGuard } from "./slot-guard.js";
import type { Ticket } from "./tickets.js";
import {
  acquiredAtMs,
  expiresAtMs,
  fencePathFor,
  findTicket,
  guardPathFor,
  isTicketExpired,
  parseTicket,
  readAllTickets,
  readLastFence,
  readSlotTickets,
  slotDirFor,
  ticketPathFor,
} from "./tickets.js";
import type { WaitEdge } from "./waits.js";
import { readFreshWaits, waitEffectivePriority } from "./waits.js";

type LockStoreConfig = Pick<
  LockstepConfig,
  "defaultTtlMs" | "maxTtlMs" | "guardWaitMs" | "waitTtlMs" | "agingRatePerMinute"
>;

export interface AcquireRequest {
  resource: string;
  mode: LockMode;
  owner: string;
  priority?: number;
  ttlMs?: number;
  processHandle?: string;
  metadata?: Record<string, unknown>;
}

export type BlockedReason = "incompatible" | "yield" | "contended";

export type AcquireResult =
  | { status: "granted"; ticket: Ticket; reused: boolean }
  | { status: "blocked"; reason: BlockedReason; holders: Ticket[]; waiters: WaitEdge[] };

export interface PreemptionTombstone {
  ticketId: string;
  resource: string;
  owner: string;
  reason: string;
  preemptedAt: string;
}

export type RenewResult =
  | { status: "ok"; ticket: Ticket }
  | { status: "not_found" }
  | { status: "preempted"; tombstone: PreemptionTombstone };

export type ReleaseResult = { status: "ok"; ticket: Ticket } | { status: "not_found" };

export type PreemptResult = { status: "ok"; ticket: Ticket } | { status: "not_found" };

export type EvictResult = { status: "evicted"; ticket: Ticket } | { status: "skipped" } | { status: "not_found" };

export type TicketState =
  | { status: "granted"; ticket: Ticket }
  | { status: "preempted"; tombstone: PreemptionTombstone }
  | { status: "absent" };

const clampTtl = ({ ttlMs, config }: { ttlMs?: number; config: LockStoreConfig }): number => {
  const requested = ttlMs !== undefined && Number.isFinite(ttlMs) && ttlMs > 0 ? ttlMs : config.defaultTtlMs;
  return Math.min(Math.round(requested), config.maxTtlMs);
};

const tombstonePathFor = ({ paths, ticketId }: { paths: LockstepPaths; ticketId: string }): string =>
  join(paths.preemptedDir, `${ticketId}.json`);

const parseTombstone = ({ value }: { value: unknown }): PreemptionTombstone | null => {
  if (!isRecord(value)) {
    return null;
  }
  const ticketId = readString({ record: value, key: "ticketId" });
  const resource = readString({ record: value, key: "resource" });
  const owner = readString({ record: value, key: "owner" });
  const reason = readString({ record: value, key: "reason" });
  const preemptedAt = readString({ record: value, key: "preemptedAt" });
  if (!ticketId || !resource || !owner || !reason || !preemptedAt) {
    return null;
  }
  return { ticketId, resource, owner, reason, preemptedAt };
};

const readTombstone = async ({
  paths,
  ticketId,
}: {
  paths: LockstepPaths;
  ticketId: string;
}): Promise<PreemptionTombstone | null> =>
  parseTombstone({ value: await readJsonFile({ path: tombstonePathFor({ paths, ticketId }) }) });

const liveTickets = ({
  tickets,
  resource,
  nowMs,
}: {
  tickets: Ticket[];
  resource: string;
  nowMs: number;
}): Ticket[] =>
  tickets.filter((ticket) => ticket.resource === resource && !isTicketExpired({ ticket, nowMs }));

const requireResource = ({ value }: { value: string }): string => {
  const resource = normalizeResource({ value });
  if (resource.length === 0) {
    throw new Error("Missing resource");
  }
  return resource;
};

const requireTicketId = ({ ticketId }: { ticketId: string }): boolean => isSafeId(ticketId);

const findTicketAt = async ({ path, ticketId }: { path: string; ticketId: string }): Promise<Ticket | null> => {
  const ticket = parseTicket({ value: await readJsonFile({ path }) });
  return ticket && ticket.id === ticketId ? ticket : null;
};

/** Runs `action` while holding the resource slot guard. Mutations never skip the guard. */
const withSlotGuard = async <T>({
  paths,
  config,
  resource,
  action,
}: {
  paths: LockstepPaths;
  config: LockStoreConfig;
  resource: string;
  action: () => Promise<T>;
}): Promise<T> => {
  const guard = await acquireGuard({
    path: guardPathFor({ paths, resource }),
    key: resource,
    waitMs: config.guardWaitMs,
  });
  if (!guard) {
    throw new LockConflictError(`Resource slot busy: ${resource}`, resource);
  }
  try {
    return await action();
  } finally {
    await guard.release();
  }
};

const recordBlocked = async ({
  paths,
  request,
  resource,
  reason,
  holders,
  waiters,
}: {
  paths: LockstepPaths;
  request: AcquireRequest;
  resource: string;
  reason: BlockedReason;
  holders: Ticket[];
  waiters: WaitEdge[];
}): Promise<AcquireResult> => {
  await appendEvent({
    eventsLog: paths.eventsLog,
    event: {
      kind: "blocked",
      msg: `${request.mode} blocked (${reason})`,
      agentId: request.owner,
      resource,
      data: {
        mode: request.mode,
        reason,
        holders: holders.map((ticket) => ticket.owner),
        waiters: waiters.map((edge) => edge.agentId),
      },
    },
  });
  return { status: "blocked", reason, holders, waiters };
};

/**
 * Grants a ticket or reports Blocked. The compatibility check and the ticket creation run
 * under the slot guard, itself an exclusive-create file, so two racing acquirers can never
 * both be granted incompatible modes.
 */
export const acquire = async ({
  paths,
  config,
  request,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  config: LockStoreConfig;
  request: AcquireRequest;
  nowMs?: number;
}): Promise<AcquireResult> => {
  const resource = requireResource({ value: request.resource });
  if (!isSafeId(request.owner)) {
    throw new Error(`Invalid owner id: ${request.owner}`);
  }
  const priority = request.priority ?? 0;
  const ttlMs = clampTtl({ ttlMs: request.ttlMs, config });

  const guard = await acquireGuard({
    path: guardPathFor({ paths, resource }),
    key: resource,
    waitMs: config.guardWaitMs,
  });
  if (!guard) {
    return recordBlocked({ paths, request, resource, reason: "contended", holders: [], waiters: [] });
  }

  try {
    const slotTickets = await readSlotTickets({ slotDir: slotDirFor({ paths, resource }) });
    const live = liveTickets({ tickets: slotTickets, resource, nowMs });
    const foreignConflicts = live.filter(
      (ticket) =>
        ticket.owner !== request.owner &&
        !areModesCompatible({ held: ticket.mode, requested: request.mode }),
    );
    if (foreignConflicts.length > 0) {
      return await recordBlocked({
        paths,
        request,
        resource,
        reason: "incompatible",
        holders: foreignConflicts,
        waiters: [],
      });
    }

    const expiresAt = new Date(nowMs + ttlMs).toISOString();
    const own = live.find((ticket) => ticket.owner === request.owner);
    if (own) {
      // re-acquire by the holder: refresh, upgrading the mode in place when asked for more
      const upgraded: Ticket = {
        ...own,
        mode: modeCovers({ held: own.mode, requested: request.mode }) ? own.mode : request.mode,
        priority: Math.max(own.priority, priority),
        expiresAt: expiresAtMs({ ticket: own }) > nowMs + ttlMs ? own.expiresAt : expiresAt,
      };
      await writeJsonAtomic({
        path: ticketPathFor({ paths, resource, ticketId: own.id }),
        value: upgraded,
      });
      await appendEvent({
        eventsLog: paths.eventsLog,
        event: {
          kind: "acquire",
          msg: `${upgraded.mode} re-acquired`,
          agentId: request.owner,
          ticketId: own.id,
          resource,
          data: {
            mode: upgraded.mode,
            priority: upgraded.priority,
            reused: true,
            fencingToken: upgraded.fencingToken,
          },
        },
      });
      return { status: "granted", ticket: upgraded, reused: true };
    }

    const waits = await readFreshWaits({ paths, nowMs, waitTtlMs: config.waitTtlMs });
    const senior = waits.filter(
      (edge) =>
        edge.resource === resource &&
        edge.agentId !== request.owner &&
        !areModesCompatible({ held: edge.mode, requested: request.mode }) &&
        waitEffectivePriority({ edge, nowMs, agingRatePerMinute: config.agingRatePerMinute }) >
          priority,
    );
    if (senior.length > 0) {
      return await recordBlocked({
        paths,
        request,
        resource,
        reason: "yield",
        holders: [],
        waiters: senior,
      });
    }

    const fencingToken = (await readLastFence({ paths, resource })) + 1;
    await writeJsonAtomic({ path: fencePathFor({ paths, resource }), value: { resource, last: fencingToken } });
    const ticket: Ticket = {
      id: randomUUID(),
      resource,
      mode: request.mode,
      owner: request.owner,
      processHandle: request.processHandle,
      acquiredAt: new Date(nowMs).toISOString(),
      expiresAt,
      priority,
      fencingToken,
      metadata: request.metadata,
    };
    const created = await createJsonExclusive({
      path: ticketPathFor({ paths, resource, ticketId: ticket.id }),
      value: ticket,
    });
    if (!created) {
      throw new Error(`Ticket id collision on ${resource}`);
    }
    await appendEvent({
      eventsLog: paths.eventsLog,
      event: {
        kind: "acquire",
        msg: `${ticket.mode} granted`,
        agentId: ticket.owner,
        ticketId: ticket.id,
        resource,
        data: { mode: ticket.mode, priority, ttlMs, fencingToken },
      },
    });
    return { status: "granted", ticket, reused: false };
  } finally {
    await guard.release();
  }
};

/**
 * True while a live ticket on the resource carries `fencingToken`. A holder whose ticket
 * expired, was preempted or was reaped fails the check even if it never noticed.
 */
export const checkFence = async ({
  paths,
  resource,
  fencingToken,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  resource: string;
  fencingToken: number;
  nowMs?: number;
}): Promise<boolean> => {
  const normalized = requireResource({ value: resource });
  const tickets = await readSlotTickets({ slotDir: slotDirFor({ paths, resource: normalized }) });
  return liveTickets({ tickets, resource: normalized, nowMs }).some((ticket) => ticket.fencingToken === fencingToken);
};

export const renew = async ({
  paths,
  config,
  ticketId,
  ttlMs,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  config: LockStoreConfig;
  ticketId: string;
  ttlMs?: number;
  nowMs?: number;
}): Promise<RenewResult> => {
  if (!requireTicketId({ ticketId })) {
    return { status: "not_found" };
  }
  const absent = async (): Promise<RenewResult> => {
    const tombstone = await readTombstone({ paths, ticketId });
    return tombstone ? { status: "preempted", tombstone } : { status: "not_found" };
  };
  const found = await findTicket({ paths, ticketId });
  if (!found) {
    return absent();
  }
  return withSlotGuard({
    paths,
    config,
    resource: found.resource,
    action: async () => {
      const path = ticketPathFor({ paths, resource: found.resource, ticketId });
      const current = await findTicketAt({ path, ticketId });
      if (!current) {
        return absent();
      }
      if (isTicketExpired({ ticket: current, nowMs })) {
        return { status: "not_found" };
      }
      const renewed: Ticket = {
        ...current,
        expiresAt: new Date(nowMs + clampTtl({ ttlMs, config })).toISOString(),
      };
      await writeJsonAtomic({ path, value: renewed });
      await appendEvent({
        eventsLog: paths.eventsLog,
        event: {
          kind: "renew",
          msg: "ticket renewed",
          agentId: renewed.owner,
          ticketId,
          resource: renewed.resource,
          data: { expiresAt: renewed.expiresAt },
        },
      });
      return { status: "ok", ticket: renewed };
    },
  });
};

/** Idempotent: releasing an unknown or already released ticket reports not_found. */
export const release = async ({
  paths,
  config,
  ticketId,
  reason,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  config: LockStoreConfig;
  ticketId: string;
  reason?: string;
  nowMs?: number;
}): Promise<ReleaseResult> => {
  if (!requireTicketId({ ticketId })) {
    return { status: "not_found" };
  }
  const found = await findTicket({ paths, ticketId });
  if (!found) {
    return { status: "not_found" };
  }
  return withSlotGuard({
    paths,
    config,
    resource: found.resource,
    action: async (): Promise<ReleaseResult> => {
      const path = ticketPathFor({ paths, resource: found.resource, ticketId });
      const current = await findTicketAt({ path, ticketId });
      if (!current) {
        return { status: "not_found" };
      }
      await appendEvent({
        eventsLog: paths.eventsLog,
        event: {
          kind: "release",
          msg: reason ? `released (${reason})` : "released",
          agentId: current.owner,
          ticketId,
          resource: current.resource,
          data: { heldMs: Math.max(0, nowMs - acquiredAtMs({ ticket: current })) },
        },
      });
      await removeFile({ path });
      return { status: "ok", ticket: current };
    },
  });
};

/** Releases every ticket `owner` holds on `resource`. */
export const releaseOwned = async ({
  paths,
  config,
  resource,
  owner,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  config: LockStoreConfig;
  resource: string;
  owner: string;
  nowMs?: number;
}): Promise<Ticket[]> => {
  const held = (await query({ paths, resource, nowMs })).filter((ticket) => ticket.owner === owner);
  const released: Ticket[] = [];
  for (const ticket of held) {
    const result = await release({ paths, config, ticketId: ticket.id, nowMs });
    if (result.status === "ok") {
      released.push(result.ticket);
    }
  }
  return released;
};

/**
 * Revokes a ticket: the tombstone is written and the event logged before the ticket file is
 * removed, so the displaced owner's next renew reports `preempted` rather than `not_found`.
 */
export const preempt = async ({
  paths,
  config,
  ticketId,
  reason,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  config: LockStoreConfig;
  ticketId: string;
  reason: string;
  nowMs?: number;
}): Promise<PreemptResult> => {
  if (!requireTicketId({ ticketId })) {
    return { status: "not_found" };
  }
  const found = await findTicket({ paths, ticketId });
  if (!found) {
    return { status: "not_found" };
  }
  return withSlotGuard({
    paths,
    config,
    resource: found.resource,
    action: async (): Promise<PreemptResult> => {
      const path = ticketPathFor({ paths, resource: found.resource, ticketId });
      const current = await findTicketAt({ path, ticketId });
      if (!current) {
        return { status: "not_found" };
      }
      const tombstone: PreemptionTombstone = {
        ticketId,
        resource: current.resource,
        owner: current.owner,
        reason,
        preemptedAt: new Date(nowMs).toISOString(),
      };
      await writeJsonAtomic({ path: tombstonePathFor({ paths, ticketId }), value: tombstone });
      await appendEvent({
        eventsLog: paths.eventsLog,
        event: {
          kind: "preempt",
          msg: `preempted: ${reason}`,
          agentId: current.owner,
          ticketId,
          resource: current.resource,
          data: { mode: current.mode, priority: current.priority },
        },
      });
      await removeFile({ path });
      return { status: "ok", ticket: current };
    },
  });
};

/**
 * Reclamation entry point for the reaper. `shouldEvict` is evaluated again under the slot
 * guard so a ticket renewed since the caller looked is left alone.
 */
export const evict = async ({
  paths,
  config,
  ticketId,
  kind,
  reason,
  shouldEvict,
}: {
  paths: LockstepPaths;
  config: LockStoreConfig;
  ticketId: string;
  kind: "expire" | "reap";
  reason: string;
  shouldEvict: (ticket: Ticket) => boolean;
}): Promise<EvictResult> => {
  const found = await findTicket({ paths, ticketId });
  if (!found) {
    return { status: "not_found" };
  }
  return withSlotGuard({
    paths,
    config,
    resource: found.resource,
    action: async (): Promise<EvictResult> => {
      const path = ticketPathFor({ paths, resource: found.resource, ticketId });
      const current = await findTicketAt({ path, ticketId });
      if (!current) {
        return { status: "not_found" };
      }
      if (!shouldEvict(current)) {
        return { status: "skipped" };
      }
      await appendEvent({
        eventsLog: paths.eventsLog,
        event: {
          kind,
          msg: reason,
          agentId: current.owner,
          ticketId,
          resource: current.resource,
          data: { mode: current.mode, expiresAt: current.expiresAt, processHandle: current.processHandle },
        },
      });
      await removeFile({ path });
      return { status: "evicted", ticket: current };
    },
  });
};

/** Granted (present and unexpired) tickets on one resource. */
export const query = async ({
  paths,
  resource,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  resource: string;
  nowMs?: number;
}): Promise<Ticket[]> => {
  const normalized = requireResource({ value: resource });
  const tickets = await readSlotTickets({ slotDir: slotDirFor({ paths, resource: normalized }) });
  return liveTickets({ tickets, resource: normalized, nowMs });
};

export const listGranted = async ({
  paths,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  nowMs?: number;
}): Promise<Ticket[]> => {
  const tickets = await readAllTickets({ paths });
  return tickets
    .filter((ticket) => !isTicketExpired({ ticket, nowMs }))
    .sort((a, b) => a.resource.localeCompare(b.resource) || a.acquiredAt.localeCompare(b.acquiredAt));
};

export const checkTicket = async ({
  paths,
  ticketId,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  ticketId: string;
  nowMs?: number;
}): Promise<TicketState> => {
  if (!requireTicketId({ ticketId })) {
    return { status: "absent" };
  }
  const ticket = await findTicket({ paths, ticketId });
  if (ticket && !isTicketExpired({ ticket, nowMs })) {
    return { status: "granted", ticket };
  }
  const tombstone = await readTombstone({ paths, ticketId });
  return tombstone ? { status: "preempted", tombstone } : { status: "absent" };
};

export const pruneTombstones = async ({
  paths,
  nowMs,
  retentionMs,
}: {
  paths: LockstepPaths;
  nowMs: number;
  retentionMs: number;
}): Promise<number> => {
  const files = await listJsonFiles({ dir: paths.preemptedDir });
  let pruned = 0;
  for (const file of files) {
    const path = join(paths.preemptedDir, file);
    const tombstone = parseTombstone({ value: await readJsonFile({ path }) });
    const preemptedMs = tombstone ? parseTimestampMs({ value: tombstone.preemptedAt }) : null;
    if (preemptedMs === null || nowMs - preemptedMs > retentionMs) {
      if (await removeFile({ path })) {
        pruned += 1;
      }
    }
  }
  return pruned;
};

export interface LockView {
  ticket: Ticket;
  heldMs: number;
  ttlRemainingMs: number;
}

export const snapshotLocks = async ({
  paths,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  nowMs?: number;
}): Promise<LockView[]> =>
  (await listGranted({ paths, nowMs })).map((ticket) => ({
    ticket,
    heldMs: Math.max(0, nowMs - acquiredAtMs({ ticket })),
    ttlRemainingMs: Math.max(0, expiresAtMs({ ticket }) - nowMs),
  }));
