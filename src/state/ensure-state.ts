import { mkdir, writeFile } from "node:fs/promises";
import type { LockstepPaths } from "../paths.js";
import { hasErrorCode } from "./atomic-file.js";

export const ensureStateDirs = async ({ paths }: { paths: LockstepPaths }): Promise<void> => {
  await mkdir(paths.stateDir, { recursive: true });
  await mkdir(paths.ticketsDir, { recursive: true });
  await mkdir(paths.preemptedDir, { recursive: true });
  await mkdir(paths.waitsDir, { recursive: true });
  await mkdir(paths.statusDir, { recursive: true });
  await mkdir(paths.queueDir, { recursive: true });
  await mkdir(paths.claimsDir, { recursive: true });
  await mkdir(paths.requeueDir, { recursive: true });
  await mkdir(paths.failedDir, { recursive: true });
  try {
    await writeFile(paths.eventsLog, "", { encoding: "utf-8", flag: "wx" });
  } catch (error) {
    if (!hasErrorCode({ error, code: "EEXIST" })) {
      throw error;
    }
  }
};
