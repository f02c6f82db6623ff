import { normalizeAgentId, processHandleFor } from "../agent-ids.js";
import { acquireWithRetry } from "../state/acquire-retry.js";
import { isLockMode } from "../state/compatibility.js";
import { release, releaseOwned, renew, snapshotLocks } from "../state/lock-store.js";
import {
  commandParser,
  EXIT_REFUSED,
  formatSeconds,
  loadCommandContext,
  positionalValue,
  printJson,
  requireValue,
} from "./context.js";

export const runAcquire = async ({ args }: { args: string[] }): Promise<number> => {
  const { paths, config } = await loadCommandContext();
  const parsed = commandParser({ args, scriptName: "lockstep acquire" })
    .command("$0 <resource>", "acquire a lock", (y) => y.positional("resource", { type: "string" }))
    .option("agent", { type: "string", demandOption: true })
    .option("mode", { type: "string", default: "write" })
    .option("priority", { type: "number", default: 0 })
    .option("ttl", { type: "number" })
    .option("wait", { type: "number", default: 0 })
    .option("keep-wait", { type: "boolean", default: false })
    .option("pid", { type: "number" })
    .option("json", { type: "boolean", default: false })
    .parseSync();
  const resource = requireValue({ value: positionalValue({ argv: parsed, name: "resource" }), label: "resource" });
  const owner = normalizeAgentId({ idRaw: parsed.agent });
  if (!isLockMode(parsed.mode)) {
    throw new Error(`Invalid --mode value: ${parsed.mode} (use read, write or exclusive)`);
  }
  if (!Number.isFinite(parsed.wait) || parsed.wait < 0) {
    throw new Error("Invalid --wait value");
  }
  const outcome = await acquireWithRetry({
    paths,
    config,
    request: {
      resource,
      mode: parsed.mode,
      owner,
      priority: parsed.priority,
      ttlMs: parsed.ttl,
      processHandle: parsed.pid === undefined ? undefined : processHandleFor({ pid: parsed.pid }),
    },
    timeoutMs: parsed.wait,
    keepWait: parsed.keepWait,
  });
  if (parsed.json) {
    printJson({ value: outcome });
    return outcome.status === "granted" ? 0 : EXIT_REFUSED;
  }
  switch (outcome.status) {
    case "granted": {
      console.log(`ticket=${outcome.ticket.id}`);
      console.log(`resource=${outcome.ticket.resource}`);
      console.log(`mode=${outcome.ticket.mode}`);
      console.log(`fence=${outcome.ticket.fencingToken}`);
      console.log(`expiresAt=${outcome.ticket.expiresAt}`);
      return 0;
    }
    case "blocked":
    case "timed_out": {
      console.log(`${outcome.status === "blocked" ? "blocked" : "timed_out"}=${outcome.blocked.reason}`);
      console.log(`holders=${outcome.blocked.holders.map((ticket) => ticket.owner).join(",") || "-"}`);
      return EXIT_REFUSED;
    }
  }
};

export const runRenew = async ({ args }: { args: string[] }): Promise<number> => {
  const { paths, config } = await loadCommandContext();
  const parsed = commandParser({ args, scriptName: "lockstep renew" })
    .command("$0 <ticket>", "extend a ticket", (y) => y.positional("ticket", { type: "string" }))
    .option("ttl", { type: "number" })
    .parseSync();
  const ticketId = requireValue({ value: positionalValue({ argv: parsed, name: "ticket" }), label: "ticket id" });
  const result = await renew({ paths, config, ticketId, ttlMs: parsed.ttl });
  switch (result.status) {
    case "ok": {
      console.log(`expiresAt=${result.ticket.expiresAt}`);
      return 0;
    }
    case "preempted": {
      console.log(`preempted=${result.tombstone.reason}`);
      return EXIT_REFUSED;
    }
    case "not_found": {
      console.log("not_found");
      return EXIT_REFUSED;
    }
  }
};

/** Releasing is idempotent: an absent ticket is reported, not treated as an error. */
export const runRelease = async ({ args }: { args: string[] }): Promise<number> => {
  const { paths, config } = await loadCommandContext();
  const parsed = commandParser({ args, scriptName: "lockstep release" })
    .command("$0 [resource]", "release a lock", (y) => y.positional("resource", { type: "string" }))
    .option("agent", { type: "string" })
    .option("ticket", { type: "string" })
    .parseSync();
  if (parsed.ticket) {
    const result = await release({ paths, config, ticketId: parsed.ticket.trim() });
    console.log(result.status === "ok" ? `released=${result.ticket.id}` : "not_found");
    return 0;
  }
  const resource = requireValue({ value: positionalValue({ argv: parsed, name: "resource" }), label: "resource" });
  const owner = normalizeAgentId({ idRaw: parsed.agent });
  const released = await releaseOwned({ paths, config, resource, owner });
  console.log(`released=${released.length}`);
  return 0;
};

export const runLocks = async ({ args }: { args: string[] }): Promise<number> => {
  const { paths } = await loadCommandContext();
  const parsed = commandParser({ args, scriptName: "lockstep locks" })
    .option("json", { type: "boolean", default: false })
    .parseSync();
  const views = await snapshotLocks({ paths });
  if (parsed.json) {
    printJson({ value: views });
    return 0;
  }
  if (views.length === 0) {
    console.log("locks=0");
    return 0;
  }
  for (const view of views) {
    const { ticket } = view;
    console.log(
      [
        ticket.resource,
        ticket.mode,
        `owner=${ticket.owner}`,
        `priority=${ticket.priority}`,
        `held=${formatSeconds({ ms: view.heldMs })}`,
        `ttl=${formatSeconds({ ms: view.ttlRemainingMs })}`,
        `ticket=${ticket.id}`,
      ].join(" "),
    );
  }
  return 0;
};
