import type { PeriodicErrorHandler } from "../scheduler.js";
import { errorMessage } from "../errors.js";
import { startPeriodicTasks } from "../scheduler.js";
import { assignQueuedTasks } from "../state/assign.js";
import { runDeadlockPass } from "../state/deadlock.js";
import { appendEvent } from "../state/events.js";
import { runReaperPass } from "../state/reaper.js";
import type { CommandContext } from "./context.js";
import { commandParser, loadCommandContext } from "./context.js";

const detectOnce = async ({ paths, config }: CommandContext): Promise<void> => {
  const resolutions = await runDeadlockPass({ paths, config });
  console.log(`deadlocks=${resolutions.length}`);
  for (const resolution of resolutions) {
    console.log(
      `cycle=${resolution.cycle.join("->")} victim=${resolution.victim.owner} ticket=${resolution.victim.id}`,
    );
  }
};

const reapOnce = async ({ paths, config }: CommandContext): Promise<void> => {
  const report = await runReaperPass({ paths, config });
  console.log(`expired=${report.expired.length}`);
  console.log(`reaped=${report.reaped.length}`);
  console.log(`crashed=${report.crashedAgents.join(",") || "-"}`);
  console.log(`requeued=${report.requeued.length}`);
};

const routeOnce = async ({ paths, config }: CommandContext): Promise<void> => {
  const assignments = await assignQueuedTasks({ paths, config });
  console.log(`assigned=${assignments.length}`);
  for (const { claim, rank } of assignments) {
    console.log(`task=${claim.taskId} agent=${claim.agentId} rank=${rank}`);
  }
};

export const runDetect = async ({ args }: { args: string[] }): Promise<number> => {
  commandParser({ args, scriptName: "lockstep detect" }).parseSync();
  await detectOnce(await loadCommandContext());
  return 0;
};

export const runReap = async ({ args }: { args: string[] }): Promise<number> => {
  commandParser({ args, scriptName: "lockstep reap" }).parseSync();
  await reapOnce(await loadCommandContext());
  return 0;
};

export const runRoute = async ({ args }: { args: string[] }): Promise<number> => {
  commandParser({ args, scriptName: "lockstep route" }).parseSync();
  await routeOnce(await loadCommandContext());
  return 0;
};

/** Logs a failed pass. Failing to record it is reported too, never left to stop the loops. */
export const passErrorReporter =
  ({ eventsLog }: { eventsLog: string }): PeriodicErrorHandler =>
  async ({ name, error }) => {
    const message = errorMessage(error);
    console.error(`${name}: ${message}`);
    try {
      await appendEvent({ eventsLog, event: { kind: "error", msg: `${name} pass failed: ${message}` } });
    } catch (logError) {
      console.error(`${name}: unable to record error event: ${errorMessage(logError)}`);
    }
  };

/** Runs detector, reaper and router on their own intervals until SIGINT or SIGTERM. */
export const runDaemon = async ({ args }: { args: string[] }): Promise<number> => {
  commandParser({ args, scriptName: "lockstep daemon" }).parseSync();
  const context = await loadCommandContext();
  const { paths, config } = context;
  const controller = new AbortController();
  const stop = (): void => {
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
  console.log(
    `daemon detector=${config.detectorIntervalMs}ms reaper=${config.reaperIntervalMs}ms router=${config.routerIntervalMs}ms`,
  );
  try {
    await startPeriodicTasks({
      signal: controller.signal,
      tasks: [
        { name: "detector", intervalMs: config.detectorIntervalMs, run: () => detectOnce(context) },
        { name: "reaper", intervalMs: config.reaperIntervalMs, run: () => reapOnce(context) },
        { name: "router", intervalMs: config.routerIntervalMs, run: () => routeOnce(context) },
      ],
      onError: passErrorReporter({ eventsLog: paths.eventsLog }),
    });
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
  }
  return 0;
};
