import { hasErrorCode } from "./atomic-file.js";

export type ProcessAliveCheck = (processHandle: string) => boolean;

/**
 * A handle is a pid. Signal 0 checks the pid without delivering anything: ESRCH means the process
 * is gone, EPERM means it exists under another user. Handles that are not pids cannot be
 * checked and count as alive, leaving them to TTL expiry.
 */
export const isProcessAlive: ProcessAliveCheck = (processHandle) => {
  if (!/^\d+$/.test(processHandle)) {
    return true;
  }
  const pid = Number(processHandle);
  if (!Number.isSafeInteger(pid) || pid <= 0) {
    return true;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    if (hasErrorCode({ error, code: "ESRCH" })) {
      return false;
    }
    if (hasErrorCode({ error, code: "EPERM" })) {
      return true;
    }
    throw error;
  }
};
