import { ensureConfigFile, ensureGitignoreEntry, resolveConfigPath } from "../config.js";
import { getLockstepPaths } from "../paths.js";
import { getRepoRoot } from "../repo-root.js";
import { ensureStateDirs } from "../state/ensure-state.js";
import { commandParser } from "./context.js";

export const runInit = async ({ args }: { args: string[] }): Promise<number> => {
  commandParser({ args, scriptName: "lockstep init" }).parseSync();
  const repoRoot = getRepoRoot();
  const paths = getLockstepPaths({ repoRoot });
  await ensureStateDirs({ paths });
  const configPath = resolveConfigPath({ defaultPath: paths.configPath });
  const created = await ensureConfigFile({ configPath });
  await ensureGitignoreEntry({ repoRoot, entry: ".lockstep/" });
  console.log(`config=${configPath} (${created ? "created" : "exists"})`);
  console.log(`state=${paths.stateDir}`);
  return 0;
};
