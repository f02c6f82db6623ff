import { randomUUID } from "node:crypto";
import { link, mkdir, rename, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { GUARD_POLL_MS, GUARD_STALE_MS } from "../constants.js";
import { hasErrorCode, readJsonFile, removeFile } from "./atomic-file.js";
import { isRecord, parseTimestampMs, readString } from "./records.js";

interface GuardPayload {
  key: string;
  lockedAt: string;
  pid: number;
  nonce: string;
}

export interface SlotGuard {
  release: () => Promise<void>;
}

interface GuardStamp {
  lockedAtMs: number;
  nonce: string | null;
}

/** Null when the guard is gone. An unreadable guard falls back to its mtime. */
const readGuardStamp = async ({ path }: { path: string }): Promise<GuardStamp | null> => {
  const parsed = await readJsonFile({ path });
  const nonce = isRecord(parsed) ? readString({ record: parsed, key: "nonce" }) : null;
  const lockedAt = isRecord(parsed) ? readString({ record: parsed, key: "lockedAt" }) : null;
  const ms = lockedAt ? parseTimestampMs({ value: lockedAt }) : null;
  if (ms !== null) {
    return { lockedAtMs: ms, nonce };
  }
  try {
    const info = await stat(path);
    return { lockedAtMs: info.mtimeMs, nonce };
  } catch (error) {
    if (hasErrorCode({ error, code: "ENOENT" })) {
      return null;
    }
    throw error;
  }
};

const sameStamp = (a: GuardStamp | null, b: GuardStamp | null): boolean =>
  a !== null && b !== null && a.lockedAtMs === b.lockedAtMs && a.nonce === b.nonce;

/**
 * Moves the guard aside and deletes it only if it is the one `expected` describes. Any
 * other guard found there is linked back. Returns false when the guard was not removed.
 */
const removeGuardIf = async ({
  path,
  expected,
  suffix,
}: {
  path: string;
  expected: (moved: GuardStamp | null) => boolean;
  suffix: string;
}): Promise<boolean> => {
  const aside = `${path}.${randomUUID()}.${suffix}`;
  try {
    await rename(path, aside);
  } catch (error) {
    if (hasErrorCode({ error, code: "ENOENT" })) {
      return true;
    }
    if (hasErrorCode({ error, code: "EACCES" }) || hasErrorCode({ error, code: "EPERM" })) {
      return false;
    }
    throw error;
  }
  const moved = await readGuardStamp({ path: aside });
  if (!expected(moved)) {
    try {
      await link(aside, path);
    } catch (error) {
      if (!hasErrorCode({ error, code: "EEXIST" })) {
        throw error;
      }
    }
    await removeFile({ path: aside });
    return false;
  }
  await removeFile({ path: aside });
  return true;
};

/**
 * One exclusive-create attempt on the guard file. A guard older than `staleMs` is treated
 * as abandoned by a crashed holder and reclaimed.
 */
export const tryAcquireGuard = async ({
  path,
  key,
  staleMs = GUARD_STALE_MS,
}: {
  path: string;
  key: string;
  staleMs?: number;
}): Promise<SlotGuard | null> => {
  await mkdir(dirname(path), { recursive: true });
  const payload: GuardPayload = {
    key,
    lockedAt: new Date().toISOString(),
    pid: process.pid,
    nonce: randomUUID(),
  };

  const writeGuard = async (): Promise<SlotGuard | null> => {
    try {
      await writeFile(path, JSON.stringify(payload, null, 2), { encoding: "utf-8", flag: "wx" });
    } catch (error) {
      if (hasErrorCode({ error, code: "EEXIST" })) {
        return null;
      }
      throw error;
    }
    return {
      // A guard reclaimed as stale and taken by someone else is left alone.
      release: async () => {
        await removeGuardIf({ path, suffix: "release", expected: (moved) => moved?.nonce === payload.nonce });
      },
    };
  };

  const first = await writeGuard();
  if (first) {
    return first;
  }

  const observed = await readGuardStamp({ path });
  const stale = observed === null || Date.now() - observed.lockedAtMs > staleMs;
  if (!stale) {
    return null;
  }
  const reclaimed =
    observed === null ||
    (await removeGuardIf({ path, suffix: "stale", expected: (moved) => sameStamp(moved, observed) }));
  if (!reclaimed) {
    return null;
  }
  return writeGuard();
};

/** Polls the guard until it is free or `waitMs` has elapsed. */
export const acquireGuard = async ({
  path,
  key,
  waitMs,
  staleMs,
  pollMs = GUARD_POLL_MS,
}: {
  path: string;
  key: string;
  waitMs: number;
  staleMs?: number;
  pollMs?: number;
}): Promise<SlotGuard | null> => {
  const deadline = Date.now() + waitMs;
  for (;;) {
    const guard = await tryAcquireGuard({ path, key, staleMs });
    if (guard || Date.now() >= deadline) {
      return guard;
    }
    await sleep(pollMs);
  }
};
