import type { Argv } from "yargs";
import yargs from "yargs";
import type { LockstepConfig } from "../config.js";
import { loadConfig, resolveConfigPath } from "../config.js";
import type { LockstepPaths } from "../paths.js";
import { getLockstepPaths } from "../paths.js";
import { getRepoRoot } from "../repo-root.js";
import { ensureStateDirs } from "../state/ensure-state.js";

export interface CommandContext {
  paths: LockstepPaths;
  config: LockstepConfig;
}

/** Exit code for blocked, preempted or crashed outcomes. */
export const EXIT_REFUSED = 2;

export const loadCommandContext = async (): Promise<CommandContext> => {
  const paths = getLockstepPaths({ repoRoot: getRepoRoot() });
  await ensureStateDirs({ paths });
  const config = await loadConfig({ configPath: resolveConfigPath({ defaultPath: paths.configPath }) });
  return { paths, config };
};

export const commandParser = ({ args, scriptName }: { args: string[]; scriptName: string }): Argv =>
  yargs(args)
    .scriptName(scriptName)
    .help(false)
    .version(false)
    .strict()
    .exitProcess(false)
    .fail((message: string, error?: Error) => {
      throw error ?? new Error(message);
    });

export const requireValue = ({ value, label }: { value: string | undefined; label: string }): string => {
  const trimmed = value?.trim() ?? "";
  if (trimmed.length === 0) {
    throw new Error(`Missing ${label}`);
  }
  return trimmed;
};

/** Reads a positional declared on the parser's default command. */
export const positionalValue = ({ argv, name }: { argv: Record<string, unknown>; name: string }): string | undefined => {
  const value = argv[name];
  return typeof value === "string" || typeof value === "number" ? String(value) : undefined;
};

export const printJson = ({ value }: { value: unknown }): void => {
  console.log(JSON.stringify(value, null, 2));
};

export const formatSeconds = ({ ms }: { ms: number }): string => `${Math.round(ms / 1000)}s`;
