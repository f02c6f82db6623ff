import { readFile } from "node:fs/promises";
import { hasErrorCode } from "./atomic-file.js";
import type { LockstepEvent } from "./events.js";
import { isEventKind } from "./events.js";
import { isRecord, readOptionalRecord, readOptionalString, readString } from "./records.js";

export const parseEventLine = ({ line }: { line: string }): LockstepEvent | null => {
  let value: unknown;
  try {
    value = JSON.parse(line) as unknown;
  } catch {
    return null;
  }
  if (!isRecord(value) || !isEventKind(value.kind)) {
    return null;
  }
  const ts = readString({ record: value, key: "ts" });
  if (!ts) {
    return null;
  }
  return {
    ts,
    kind: value.kind,
    msg: readOptionalString({ record: value, key: "msg" }) ?? "",
    agentId: readOptionalString({ record: value, key: "agentId" }),
    ticketId: readOptionalString({ record: value, key: "ticketId" }),
    resource: readOptionalString({ record: value, key: "resource" }),
    taskId: readOptionalString({ record: value, key: "taskId" }),
    data: readOptionalRecord({ record: value, key: "data" }),
  };
};

export const readEvents = async ({ eventsLog }: { eventsLog: string }): Promise<LockstepEvent[]> => {
  let raw: string;
  try {
    raw = await readFile(eventsLog, "utf-8");
  } catch (error) {
    if (hasErrorCode({ error, code: "ENOENT" })) {
      return [];
    }
    throw error;
  }
  return raw
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => parseEventLine({ line }))
    .filter((event): event is LockstepEvent => event !== null);
};

export const readRecentEvents = async ({
  eventsLog,
  limit,
}: {
  eventsLog: string;
  limit: number;
}): Promise<LockstepEvent[]> => {
  const events = await readEvents({ eventsLog });
  return events.slice(-limit);
};
