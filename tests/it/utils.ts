import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { findCommand } from "../../src/commands/registry.js";
import type { LockstepPaths } from "../../src/paths.js";
import { getLockstepPaths } from "../../src/paths.js";
import { ensureStateDirs } from "../../src/state/ensure-state.js";

export interface CliResult {
  code: number;
  lines: string[];
}

export const makeTmpRepo = async (): Promise<{ root: string; paths: LockstepPaths }> => {
  const root = await mkdtemp(join(tmpdir(), "lockstep-it-"));
  const paths = getLockstepPaths({ repoRoot: root });
  await ensureStateDirs({ paths });
  return { root, paths };
};

export const writeConfig = async ({ root, lines }: { root: string; lines: string[] }): Promise<void> => {
  await writeFile(join(root, "lockstep.yaml"), `${lines.join("\n")}\n`, "utf-8");
};

/**
 * Runs one command in this process against `root`, collecting what it prints. Commands
 * report their exit code instead of setting it, so nothing leaks into the test run.
 */
export const runCli = async ({ root, args }: { root: string; args: string[] }): Promise<CliResult> => {
  const [name = "", ...rest] = args;
  const runner = findCommand({ name });
  if (!runner) {
    throw new Error(`unknown command: ${name}`);
  }
  const lines: string[] = [];
  const capture = (...values: unknown[]): void => {
    lines.push(values.map((value) => String(value)).join(" "));
  };
  const log = jest.spyOn(console, "log").mockImplementation(capture);
  const error = jest.spyOn(console, "error").mockImplementation(capture);
  const previousRoot = process.env.LOCKSTEP_ROOT;
  process.env.LOCKSTEP_ROOT = root;
  try {
    const code = await runner({ args: rest });
    return { code, lines };
  } finally {
    if (previousRoot === undefined) {
      delete process.env.LOCKSTEP_ROOT;
    } else {
      process.env.LOCKSTEP_ROOT = previousRoot;
    }
    log.mockRestore();
    error.mockRestore();
  }
};

export const valueOf = ({ lines, key }: { lines: string[]; key: string }): string => {
  const line = lines.find((entry) => entry.startsWith(`${key}=`));
  if (line === undefined) {
    throw new Error(`missing ${key}= in output:\n${lines.join("\n")}`);
  }
  return line.slice(key.length + 1);
};

export const waitFor = async ({
  label,
  check,
  timeoutMs = 5_000,
}: {
  label: string;
  check: () => Promise<boolean>;
  timeoutMs?: number;
}): Promise<void> => {
  const deadline = Date.now() + timeoutMs;
  while (!(await check())) {
    if (Date.now() > deadline) {
      throw new Error(`timed out waiting for ${label}`);
    }
    await delay(10);
  }
};
