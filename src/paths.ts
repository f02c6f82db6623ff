import { join } from "node:path";

export interface LockstepPaths {
  repoRoot: string;
  stateDir: string;
  eventsLog: string;
  configPath: string;
  ticketsDir: string;
  preemptedDir: string;
  waitsDir: string;
  statusDir: string;
  queueDir: string;
  claimsDir: string;
  requeueDir: string;
  failedDir: string;
}

export const getLockstepPaths = ({ repoRoot }: { repoRoot: string }): LockstepPaths => {
  const stateDir = join(repoRoot, ".lockstep");
  const tasksDir = join(stateDir, "tasks");
  return {
    repoRoot,
    stateDir,
    eventsLog: join(stateDir, "events.log"),
    configPath: join(repoRoot, "lockstep.yaml"),
    ticketsDir: join(stateDir, "tickets"),
    preemptedDir: join(stateDir, "preempted"),
    waitsDir: join(stateDir, "waits"),
    statusDir: join(stateDir, "status"),
    queueDir: join(tasksDir, "queue"),
    claimsDir: join(tasksDir, "claims"),
    requeueDir: join(tasksDir, "requeue"),
    failedDir: join(tasksDir, "failed"),
  };
};
