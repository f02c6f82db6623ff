#!/usr/bin/env node

import yargs from "yargs";
import { getCliHelp } from "./cli-help.js";
import { errorMessage } from "./errors.js";
import { findCommand } from "./commands/registry.js";
import { getLockstepPaths } from "./paths.js";
import { getRepoRoot } from "./repo-root.js";
import { setRuntimeOverrides } from "./runtime/overrides.js";
import { appendEvent } from "./state/events.js";

interface CommandSpec {
  name: string;
  args: string[];
}

interface ParsedArgs {
  command: CommandSpec;
  helpRequested: boolean;
  overrides: {
    configPath?: string;
  };
}

const parseArgs = ({ argv }: { argv: string[] }): ParsedArgs => {
  const parsed = yargs(argv)
    .parserConfiguration({ "unknown-options-as-args": true, "halt-at-non-option": true })
    .option("config", { type: "string" })
    .option("help", { type: "boolean", alias: "h", default: false })
    .help(false)
    .version(false)
    .parseSync();
  const [name, ...args] = parsed._.map((value) => String(value));
  return {
    command: {
      name: name ?? "",
      args,
    },
    helpRequested: parsed.help,
    overrides: {
      configPath: parsed.config?.trim() || undefined,
    },
  };
};

const reportFatal = async ({ label, error }: { label: string; error: unknown }): Promise<void> => {
  const message = errorMessage(error);
  const stack =
    typeof error === "object" && error !== null && "stack" in error && typeof error.stack === "string"
      ? error.stack
      : undefined;
  console.error(`${label}: ${message}`);
  if (stack && process.env.LOCKSTEP_DEBUG) {
    console.error(stack);
  }
  try {
    const paths = getLockstepPaths({ repoRoot: getRepoRoot() });
    await appendEvent({
      eventsLog: paths.eventsLog,
      event: {
        kind: "error",
        msg: `${label}: ${message}`,
        data: stack ? { stack } : undefined,
      },
    });
  } catch (logError) {
    console.error(`unable to record error event: ${errorMessage(logError)}`);
  }
};

process.on("uncaughtException", (error) => {
  void reportFatal({ label: "uncaughtException", error }).finally(() => {
    process.exit(1);
  });
});

process.on("unhandledRejection", (error) => {
  void reportFatal({ label: "unhandledRejection", error }).finally(() => {
    process.exit(1);
  });
});

const main = async ({ argv }: { argv: string[] }): Promise<void> => {
  const parsed = parseArgs({ argv });
  const runner = findCommand({ name: parsed.command.name });
  if (parsed.helpRequested || parsed.command.name === "help" || parsed.command.name === "") {
    console.log(getCliHelp());
    return;
  }
  if (!runner) {
    console.error(`Unknown command: ${parsed.command.name}`);
    console.log(getCliHelp());
    process.exitCode = 1;
    return;
  }
  setRuntimeOverrides({ overrides: parsed.overrides });
  process.exitCode = await runner({ args: parsed.command.args });
};

void main({ argv: process.argv.slice(2) }).catch((error) => {
  void reportFatal({ label: "command failed", error }).finally(() => {
    process.exit(1);
  });
});
