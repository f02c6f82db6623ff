import { setTimeout as sleep } from "node:timers/promises";

export interface PeriodicTask {
  name: string;
  intervalMs: number;
  run: () => Promise<void>;
}

export type PeriodicErrorHandler = (input: { name: string; error: unknown }) => Promise<void>;

const isAbortError = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "name" in error && error.name === "AbortError";

/** Runs `task` every `intervalMs` until `signal` aborts. A failing pass is reported, not fatal. */
export const runPeriodic = async ({
  task,
  signal,
  onError,
}: {
  task: PeriodicTask;
  signal: AbortSignal;
  onError: PeriodicErrorHandler;
}): Promise<void> => {
  while (!signal.aborted) {
    try {
      await task.run();
    } catch (error) {
      await onError({ name: task.name, error });
    }
    try {
      await sleep(task.intervalMs, undefined, { signal });
    } catch (error) {
      if (isAbortError(error)) {
        return;
      }
      throw error;
    }
  }
};

/** Each loop keeps its own cadence, so a slow reaper pass never delays the detector. */
export const startPeriodicTasks = async ({
  tasks,
  signal,
  onError,
}: {
  tasks: PeriodicTask[];
  signal: AbortSignal;
  onError: PeriodicErrorHandler;
}): Promise<void> => {
  await Promise.all(tasks.map((task) => runPeriodic({ task, signal, onError })));
};
