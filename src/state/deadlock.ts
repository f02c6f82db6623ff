import type { LockstepConfig } from "../config.js";
import type { LockstepPaths } from "../paths.js";
import { areModesCompatible } from "./compatibility.js";
import { appendEvent } from "./events.js";
import { listGranted, preempt } from "./lock-store.js";
import { parseTimestampMs } from "./records.js";
import type { Ticket } from "./tickets.js";
import { acquiredAtMs } from "./tickets.js";
import type { WaitEdge } from "./waits.js";
import { readFreshWaits, waitEffectivePriority } from "./waits.js";

/** `from` waits on `resource`, which `to` holds through `ticket`. */
export interface WaitForEdge {
  from: string;
  to: string;
  resource: string;
  ticket: Ticket;
  wait: WaitEdge;
}

export interface WaitForGraph {
  nodes: string[];
  adjacency: Map<string, WaitForEdge[]>;
}

export interface DeadlockResolution {
  /** Agents in cycle order, starting from the lexicographically smallest. */
  cycle: string[];
  victim: Ticket;
  resolutionMs: number;
}

type DetectorConfig = Pick<
  LockstepConfig,
  "agingRatePerMinute" | "waitTtlMs" | "defaultTtlMs" | "maxTtlMs" | "guardWaitMs"
>;

export const buildWaitForGraph = ({
  tickets,
  waits,
}: {
  tickets: Ticket[];
  waits: WaitEdge[];
}): WaitForGraph => {
  const adjacency = new Map<string, WaitForEdge[]>();
  const nodes = new Set<string>();
  for (const wait of waits) {
    for (const ticket of tickets) {
      if (ticket.resource !== wait.resource || ticket.owner === wait.agentId) {
        continue;
      }
      if (areModesCompatible({ held: ticket.mode, requested: wait.mode })) {
        continue;
      }
      nodes.add(wait.agentId);
      nodes.add(ticket.owner);
      const edges = adjacency.get(wait.agentId) ?? [];
      edges.push({ from: wait.agentId, to: ticket.owner, resource: wait.resource, ticket, wait });
      adjacency.set(wait.agentId, edges);
    }
  }
  for (const edges of adjacency.values()) {
    edges.sort((a, b) => a.to.localeCompare(b.to) || a.ticket.id.localeCompare(b.ticket.id));
  }
  return { nodes: [...nodes].sort(), adjacency };
};

const rotateToSmallest = ({ edges }: { edges: WaitForEdge[] }): WaitForEdge[] => {
  let start = 0;
  edges.forEach((edge, index) => {
    const current = edges[start];
    if (current && edge.from < current.from) {
      start = index;
    }
  });
  return [...edges.slice(start), ...edges.slice(0, start)];
};

/** Depth-first search with white/gray/black colouring. Returns the edges of the first cycle found. */
export const findCycle = ({ graph }: { graph: WaitForGraph }): WaitForEdge[] | null => {
  const color = new Map<string, "gray" | "black">();
  const path: WaitForEdge[] = [];

  const visit = (node: string): WaitForEdge[] | null => {
    color.set(node, "gray");
    for (const edge of graph.adjacency.get(node) ?? []) {
      const next = color.get(edge.to);
      if (next === "gray") {
        const startIndex = path.findIndex((step) => step.from === edge.to);
        const cycle = startIndex >= 0 ? [...path.slice(startIndex), edge] : [edge];
        return rotateToSmallest({ edges: cycle });
      }
      if (next === undefined) {
        path.push(edge);
        const found = visit(edge.to);
        if (found) {
          return found;
        }
        path.pop();
      }
    }
    color.set(node, "black");
    return null;
  };

  for (const node of graph.nodes) {
    if (!color.has(node)) {
      const found = visit(node);
      if (found) {
        return found;
      }
    }
  }
  return null;
};

/**
 * The victim is the cycle ticket with the lowest effective priority (its ticket priority plus
 * the aging its holder has accrued while waiting), then the one held for the shortest time,
 * then the smallest ticket id.
 */
export const selectVictim = ({
  cycle,
  nowMs,
  agingRatePerMinute,
}: {
  cycle: WaitForEdge[];
  nowMs: number;
  agingRatePerMinute: number;
}): Ticket | null => {
  const agingOf = (agentId: string): number => {
    const bonuses = cycle
      .filter((edge) => edge.from === agentId)
      .map(
        (edge) =>
          waitEffectivePriority({ edge: edge.wait, nowMs, agingRatePerMinute }) - edge.wait.priority,
      );
    return bonuses.length > 0 ? Math.max(...bonuses) : 0;
  };
  const candidates = new Map<string, { ticket: Ticket; score: number }>();
  for (const edge of cycle) {
    candidates.set(edge.ticket.id, {
      ticket: edge.ticket,
      score: edge.ticket.priority + agingOf(edge.ticket.owner),
    });
  }
  const ranked = [...candidates.values()].sort(
    (a, b) =>
      a.score - b.score ||
      acquiredAtMs({ ticket: b.ticket }) - acquiredAtMs({ ticket: a.ticket }) ||
      a.ticket.id.localeCompare(b.ticket.id),
  );
  return ranked[0]?.ticket ?? null;
};

/** Time since the cycle closed, i.e. since its most recent wait began. */
const resolutionMsFor = ({ cycle, nowMs }: { cycle: WaitForEdge[]; nowMs: number }): number => {
  const starts = cycle.map((edge) => parseTimestampMs({ value: edge.wait.since }) ?? nowMs);
  return Math.max(0, nowMs - Math.max(...starts));
};

/**
 * One detector pass: rebuild the graph from live tickets and fresh waits, preempt one victim
 * per cycle, repeat until the graph is acyclic.
 */
export const runDeadlockPass = async ({
  paths,
  config,
  nowMs = Date.now(),
}: {
  paths: LockstepPaths;
  config: DetectorConfig;
  nowMs?: number;
}): Promise<DeadlockResolution[]> => {
  const resolutions: DeadlockResolution[] = [];
  const initial = await listGranted({ paths, nowMs });
  for (let round = 0; round <= initial.length; round += 1) {
    const tickets = round === 0 ? initial : await listGranted({ paths, nowMs });
    const waits = await readFreshWaits({ paths, nowMs, waitTtlMs: config.waitTtlMs });
    const cycle = findCycle({ graph: buildWaitForGraph({ tickets, waits }) });
    if (!cycle) {
      break;
    }
    const victim = selectVictim({ cycle, nowMs, agingRatePerMinute: config.agingRatePerMinute });
    if (!victim) {
      break;
    }
    const agents = cycle.map((edge) => edge.from);
    const result = await preempt({
      paths,
      config,
      ticketId: victim.id,
      reason: `deadlock ${[...agents, agents[0] ?? ""].join(" -> ")}`,
      nowMs,
    });
    if (result.status === "not_found") {
      continue;
    }
    const resolutionMs = resolutionMsFor({ cycle, nowMs });
    await appendEvent({
      eventsLog: paths.eventsLog,
      event: {
        kind: "deadlock",
        msg: `cycle broken by preempting ${victim.owner}`,
        agentId: victim.owner,
        ticketId: victim.id,
        resource: victim.resource,
        data: { cycle: agents, victimTicketId: victim.id, victimOwner: victim.owner, resolutionMs },
      },
    });
    resolutions.push({ cycle: agents, victim, resolutionMs });
  }
  return resolutions;
};
