import { createHash } from "node:crypto";
import { join } from "node:path";
import type { LockstepPaths } from "../paths.js";
import { listDirs, listJsonFiles, readJsonFile } from "./atomic-file.js";
import type { LockMode } from "./compatibility.js";
import { isLockMode } from "./compatibility.js";
import {
  isRecord,
  parseTimestampMs,
  readNumber,
  readOptionalRecord,
  readOptionalString,
  readString,
} from "./records.js";

export interface Ticket {
  id: string;
  resource: string;
  mode: LockMode;
  owner: string;
  /** Liveness token for the owning process, usually its pid. */
  processHandle?: string;
  acquiredAt: string;
  expiresAt: string;
  priority: number;
  /**
   * Issued from a per-resource counter that only grows. A holder passes it along with its
   * writes so a store can refuse a writer whose ticket was lost to a newer grant.
   */
  fencingToken: number;
  /** Informational only (task reference, session). Never read for correctness. */
  metadata?: Record<string, unknown>;
}

export const GUARD_FILE = ".guard";
export const FENCE_FILE = ".fence";

export const slotIdFor = ({ resource }: { resource: string }): string =>
  createHash("sha256").update(resource).digest("hex").slice(0, 40);

export const slotDirFor = ({ paths, resource }: { paths: LockstepPaths; resource: string }): string =>
  join(paths.ticketsDir, slotIdFor({ resource }));

export const ticketPathFor = ({
  paths,
  resource,
  ticketId,
}: {
  paths: LockstepPaths;
  resource: string;
  ticketId: string;
}): string => join(slotDirFor({ paths, resource }), `${ticketId}.json`);

export const guardPathFor = ({ paths, resource }: { paths: LockstepPaths; resource: string }): string =>
  join(slotDirFor({ paths, resource }), GUARD_FILE);

export const fencePathFor = ({ paths, resource }: { paths: LockstepPaths; resource: string }): string =>
  join(slotDirFor({ paths, resource }), FENCE_FILE);

/** The last fencing token issued on the resource, 0 before the first grant. */
export const readLastFence = async ({ paths, resource }: { paths: LockstepPaths; resource: string }): Promise<number> => {
  const value = await readJsonFile({ path: fencePathFor({ paths, resource }) });
  const last = isRecord(value) ? readNumber({ record: value, key: "last" }) : null;
  return last !== null && Number.isSafeInteger(last) && last > 0 ? last : 0;
};

export const parseTicket = ({ value }: { value: unknown }): Ticket | null => {
  if (!isRecord(value)) {
    return null;
  }
  const id = readString({ record: value, key: "id" });
  const resource = readString({ record: value, key: "resource" });
  const owner = readString({ record: value, key: "owner" });
  const acquiredAt = readString({ record: value, key: "acquiredAt" });
  const expiresAt = readString({ record: value, key: "expiresAt" });
  const priority = readNumber({ record: value, key: "priority" });
  const fencingToken = readNumber({ record: value, key: "fencingToken" });
  if (!id || !resource || !owner || !acquiredAt || !expiresAt || priority === null || fencingToken === null) {
    return null;
  }
  if (!isLockMode(value.mode)) {
    return null;
  }
  if (parseTimestampMs({ value: acquiredAt }) === null || parseTimestampMs({ value: expiresAt }) === null) {
    return null;
  }
  return {
    id,
    resource,
    mode: value.mode,
    owner,
    processHandle: readOptionalString({ record: value, key: "processHandle" }),
    acquiredAt,
    expiresAt,
    priority,
    fencingToken,
    metadata: readOptionalRecord({ record: value, key: "metadata" }),
  };
};

export const expiresAtMs = ({ ticket }: { ticket: Ticket }): number =>
  parseTimestampMs({ value: ticket.expiresAt }) ?? 0;

export const acquiredAtMs = ({ ticket }: { ticket: Ticket }): number =>
  parseTimestampMs({ value: ticket.acquiredAt }) ?? 0;

export const isTicketExpired = ({ ticket, nowMs }: { ticket: Ticket; nowMs: number }): boolean =>
  nowMs > expiresAtMs({ ticket });

export const readSlotTickets = async ({ slotDir }: { slotDir: string }): Promise<Ticket[]> => {
  const files = await listJsonFiles({ dir: slotDir });
  const tickets = await Promise.all(
    files.map(async (file) => parseTicket({ value: await readJsonFile({ path: join(slotDir, file) }) })),
  );
  return tickets.filter((ticket): ticket is Ticket => ticket !== null);
};

/** Every ticket record on disk, expired or not. */
export const readAllTickets = async ({ paths }: { paths: LockstepPaths }): Promise<Ticket[]> => {
  const slots = await listDirs({ dir: paths.ticketsDir });
  const perSlot = await Promise.all(
    slots.map((slot) => readSlotTickets({ slotDir: join(paths.ticketsDir, slot) })),
  );
  return perSlot.flat();
};

export const findTicket = async ({
  paths,
  ticketId,
}: {
  paths: LockstepPaths;
  ticketId: string;
}): Promise<Ticket | null> => {
  const slots = await listDirs({ dir: paths.ticketsDir });
  for (const slot of slots) {
    const value = await readJsonFile({ path: join(paths.ticketsDir, slot, `${ticketId}.json`) });
    const ticket = parseTicket({ value });
    if (ticket && ticket.id === ticketId) {
      return ticket;
    }
  }
  return null;
};
