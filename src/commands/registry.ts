import { runHeartbeat, runRegister } from "./agents.js";
import { runDaemon, runDetect, runReap, runRoute } from "./daemon.js";
import { runInit } from "./init.js";
import { runAcquire, runLocks, runRelease, runRenew } from "./locks.js";
import { runMetrics } from "./metrics.js";
import { runStatus } from "./status.js";
import { runTail } from "./tail.js";
import { runTask } from "./task.js";

export type CommandRunner = (input: { args: string[] }) => Promise<number>;

export const COMMANDS: Record<string, CommandRunner> = {
  init: runInit,
  acquire: runAcquire,
  renew: runRenew,
  release: runRelease,
  locks: runLocks,
  status: runStatus,
  metrics: runMetrics,
  tail: runTail,
  register: runRegister,
  heartbeat: runHeartbeat,
  task: runTask,
  detect: runDetect,
  reap: runReap,
  route: runRoute,
  daemon: runDaemon,
};

export const findCommand = ({ name }: { name: string }): CommandRunner | undefined =>
  Object.prototype.hasOwnProperty.call(COMMANDS, name) ? COMMANDS[name] : undefined;
