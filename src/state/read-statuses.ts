import type { LockstepPaths } from "../paths.js";
import { listJsonFiles, readJsonFile } from "./atomic-file.js";
import type { AgentStatus } from "./heartbeat.js";
import { parseAgentStatus, statusPathFor } from "./heartbeat.js";

export const readStatuses = async ({ paths }: { paths: LockstepPaths }): Promise<AgentStatus[]> => {
  const files = await listJsonFiles({ dir: paths.statusDir });
  const statuses = await Promise.all(
    files.map(async (file) =>
      parseAgentStatus({
        value: await readJsonFile({ path: statusPathFor({ paths, agentId: file.slice(0, -".json".length) }) }),
      }),
    ),
  );
  return statuses.filter((status): status is AgentStatus => status !== null);
};
