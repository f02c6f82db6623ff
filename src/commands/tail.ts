import { watch } from "node:fs";
import { open, readFile, stat } from "node:fs/promises";
import { errorMessage } from "../errors.js";
import { formatEventLine } from "../format/format-event.js";
import { parseEventLine } from "../state/read-events.js";
import { commandParser, loadCommandContext } from "./context.js";

const formatLines = ({ raw, nowMs }: { raw: string; nowMs: number }): string[] =>
  raw
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => {
      const event = parseEventLine({ line });
      return event ? formatEventLine({ event, nowMs }) : line;
    });

const readRange = async ({ path, start, end }: { path: string; start: number; end: number }): Promise<string> => {
  const handle = await open(path, "r");
  try {
    const buffer = Buffer.alloc(end - start);
    await handle.read(buffer, 0, buffer.length, start);
    return buffer.toString("utf-8");
  } finally {
    await handle.close();
  }
};

export const runTail = async ({ args }: { args: string[] }): Promise<number> => {
  const { paths } = await loadCommandContext();
  const parsed = commandParser({ args, scriptName: "lockstep tail" })
    .option("limit", { type: "number", default: 30 })
    .option("follow", { type: "boolean", default: true })
    .parseSync();
  const limit = parsed.limit;
  if (!Number.isFinite(limit) || limit <= 0) {
    throw new Error("Invalid --limit value");
  }

  const raw = await readFile(paths.eventsLog, "utf-8");
  for (const line of formatLines({ raw, nowMs: Date.now() }).slice(-limit)) {
    process.stdout.write(`${line}\n`);
  }
  if (!parsed.follow) {
    return 0;
  }

  let offset = Buffer.byteLength(raw);
  let reading = false;
  const emitNew = async (): Promise<void> => {
    if (reading) {
      return;
    }
    reading = true;
    try {
      const { size } = await stat(paths.eventsLog);
      if (size < offset) {
        offset = 0;
      }
      if (size > offset) {
        const chunk = await readRange({ path: paths.eventsLog, start: offset, end: size });
        // hold back a trailing partial line until its newline arrives
        const complete = chunk.slice(0, chunk.lastIndexOf("\n") + 1);
        offset += Buffer.byteLength(complete);
        for (const line of formatLines({ raw: complete, nowMs: Date.now() })) {
          process.stdout.write(`${line}\n`);
        }
      }
    } finally {
      reading = false;
    }
  };

  watch(paths.eventsLog, (eventType) => {
    if (eventType !== "change") {
      return;
    }
    emitNew().catch((error: unknown) => {
      console.error(`tail: ${errorMessage(error)}`);
    });
  });
  return 0;
};
