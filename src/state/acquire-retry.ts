import { setTimeout as delay } from "node:timers/promises";
import type { LockstepConfig } from "../config.js";
import { LockConflictError, LockTimeoutError, PreemptedError } from "../errors.js";
import type { LockstepPaths } from "../paths.js";
import type { LockMode } from "./compatibility.js";
import { modeCovers, normalizeResource } from "./compatibility.js";
import { appendEvent } from "./events.js";
import type { AcquireRequest, AcquireResult } from "./lock-store.js";
import { acquire, release, renew } from "./lock-store.js";
import type { Ticket } from "./tickets.js";
import { clearWait, registerWait } from "./waits.js";

type BlockedResult = Extract<AcquireResult, { status: "blocked" }>;

export type RetryOutcome =
  | { status: "granted"; ticket: Ticket; attempts: number; waitedMs: number }
  | { status: "blocked"; blocked: BlockedResult; attempts: number }
  | { status: "timed_out"; blocked: BlockedResult; attempts: number; waitedMs: number };

type RetryConfig = Pick<
  LockstepConfig,
  | "defaultTtlMs"
  | "maxTtlMs"
  | "guardWaitMs"
  | "waitTtlMs"
  | "agingRatePerMinute"
  | "acquireTimeoutMs"
  | "backoffBaseMs"
  | "backoffMaxMs"
>;

export interface RetryClock {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}

const systemClock: RetryClock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await delay(ms);
  },
};

export const backoffDelayMs = ({
  attempt,
  baseMs,
  maxMs,
}: {
  attempt: number;
  baseMs: number;
  maxMs: number;
}): number => Math.min(maxMs, baseMs * 2 ** Math.max(0, attempt - 1));

/**
 * Acquires with exponential backoff until granted or `timeoutMs` runs out. While blocked the
 * caller's wait edge is kept fresh so the deadlock detector and the aging rule can see it.
 * A timeout of zero makes a single attempt. With `keepWait` a refused attempt leaves its wait
 * edge in place (it goes stale after `waitTtlMs`), so a caller that retries on its own is
 * still seen; a later grant clears it.
 */
export const acquireWithRetry = async ({
  paths,
  config,
  request,
  timeoutMs = config.acquireTimeoutMs,
  keepWait = false,
  clock = systemClock,
}: {
  paths: LockstepPaths;
  config: RetryConfig;
  request: AcquireRequest;
  timeoutMs?: number;
  keepWait?: boolean;
  clock?: RetryClock;
}): Promise<RetryOutcome> => {
  const resource = normalizeResource({ value: request.resource });
  const refreshWait = async (): Promise<void> => {
    await registerWait({
      paths,
      agentId: request.owner,
      resource,
      mode: request.mode,
      priority: request.priority ?? 0,
      nowMs: clock.now(),
    });
  };
  const startedMs = clock.now();
  let attempts = 0;
  let waiting = false;
  try {
    for (;;) {
      attempts += 1;
      const result = await acquire({ paths, config, request: { ...request, resource }, nowMs: clock.now() });
      if (result.status === "granted") {
        waiting = waiting || keepWait;
        return { status: "granted", ticket: result.ticket, attempts, waitedMs: clock.now() - startedMs };
      }
      if (timeoutMs <= 0) {
        if (keepWait) {
          await refreshWait();
        }
        return { status: "blocked", blocked: result, attempts };
      }
      const waitedMs = clock.now() - startedMs;
      if (waitedMs >= timeoutMs) {
        await appendEvent({
          eventsLog: paths.eventsLog,
          event: {
            kind: "lock_timeout",
            msg: `gave up after ${waitedMs}ms`,
            agentId: request.owner,
            resource,
            data: { mode: request.mode, attempts, waitedMs, holders: result.holders.map((t) => t.owner) },
          },
        });
        waiting = waiting && !keepWait;
        return { status: "timed_out", blocked: result, attempts, waitedMs };
      }
      await refreshWait();
      waiting = true;
      const backoff = backoffDelayMs({ attempt: attempts, baseMs: config.backoffBaseMs, maxMs: config.backoffMaxMs });
      await clock.sleep(Math.min(backoff, timeoutMs - waitedMs));
    }
  } finally {
    if (waiting) {
      await clearWait({ paths, agentId: request.owner, resource });
    }
  }
};

export interface LockRequest {
  resource: string;
  mode: LockMode;
}

export interface HeldLocks {
  tickets: Ticket[];
  /** Renews every ticket. Throws PreemptedError when one has been lost. */
  assertHeld: () => Promise<void>;
}

/** One request per resource, keeping the strongest mode, in sorted order. */
export const planLockOrder = ({ requests }: { requests: LockRequest[] }): LockRequest[] => {
  const byResource = new Map<string, LockMode>();
  for (const request of requests) {
    const resource = normalizeResource({ value: request.resource });
    const current = byResource.get(resource);
    if (!current || !modeCovers({ held: current, requested: request.mode })) {
      byResource.set(resource, request.mode);
    }
  }
  return [...byResource.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([resource, mode]) => ({ resource, mode }));
};

/**
 * Runs `operation` while holding every requested lock. Locks are taken in sorted resource
 * order and all released when the operation settles, whatever the outcome.
 */
export const withLocks = async <T>({
  paths,
  config,
  owner,
  requests,
  priority,
  ttlMs,
  timeoutMs,
  processHandle,
  clock,
  operation,
}: {
  paths: LockstepPaths;
  config: RetryConfig;
  owner: string;
  requests: LockRequest[];
  priority?: number;
  ttlMs?: number;
  timeoutMs?: number;
  processHandle?: string;
  clock?: RetryClock;
  operation: (held: HeldLocks) => Promise<T>;
}): Promise<T> => {
  const tickets: Ticket[] = [];
  try {
    for (const request of planLockOrder({ requests })) {
      const outcome = await acquireWithRetry({
        paths,
        config,
        request: { ...request, owner, priority, ttlMs, processHandle },
        timeoutMs,
        clock,
      });
      if (outcome.status === "timed_out") {
        throw new LockTimeoutError(request.resource, outcome.waitedMs);
      }
      if (outcome.status === "blocked") {
        throw new LockConflictError(
          `${request.resource} is held in an incompatible mode (${outcome.blocked.reason})`,
          request.resource,
        );
      }
      tickets.push(outcome.ticket);
    }
    const held: HeldLocks = {
      tickets,
      assertHeld: async () => {
        for (const ticket of tickets) {
          const result = await renew({ paths, config, ticketId: ticket.id, ttlMs });
          if (result.status === "preempted") {
            throw new PreemptedError(ticket.id, ticket.resource, result.tombstone.reason);
          }
          if (result.status === "not_found") {
            throw new PreemptedError(ticket.id, ticket.resource, "ticket expired or was reaped");
          }
        }
      },
    };
    return await operation(held);
  } finally {
    for (const ticket of [...tickets].reverse()) {
      await release({ paths, config, ticketId: ticket.id });
    }
  }
};
