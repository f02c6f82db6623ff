import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { parse, stringify } from "yaml";
import { ConfigError } from "./errors.js";
import { getRuntimeOverrides } from "./runtime/overrides.js";
import { hasErrorCode } from "./state/atomic-file.js";
import { isRecord } from "./state/records.js";
import type { SpecializationEntry, SpecializationMatrix } from "./state/specialization.js";

export const DEFAULT_SENTINEL = "default" as const;
type DefaultSentinel = typeof DEFAULT_SENTINEL;

export interface LockstepConfig {
  heartbeatIntervalMs: number;
  crashThresholdMs: number;
  defaultTtlMs: number;
  maxTtlMs: number;
  detectorIntervalMs: number;
  reaperIntervalMs: number;
  routerIntervalMs: number;
  retryCeiling: number;
  agingRatePerMinute: number;
  queueDepthThreshold: number;
  acquireTimeoutMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  waitTtlMs: number;
  claimTimeoutMs: number;
  guardWaitMs: number;
  specialization: SpecializationMatrix;
}

export const DEFAULT_CONFIG = {
  heartbeatIntervalMs: 10_000,
  crashThresholdMs: 30_000,
  defaultTtlMs: 60_000,
  maxTtlMs: 600_000,
  detectorIntervalMs: 15_000,
  reaperIntervalMs: 20_000,
  routerIntervalMs: 5_000,
  retryCeiling: 3,
  agingRatePerMinute: 1,
  queueDepthThreshold: 3,
  acquireTimeoutMs: 120_000,
  backoffBaseMs: 250,
  backoffMaxMs: 5_000,
  waitTtlMs: 30_000,
  claimTimeoutMs: 600_000,
  guardWaitMs: 1_000,
  specialization: {},
} satisfies LockstepConfig;

export const NUMERIC_CONFIG_KEYS = [
  "heartbeatIntervalMs",
  "crashThresholdMs",
  "defaultTtlMs",
  "maxTtlMs",
  "detectorIntervalMs",
  "reaperIntervalMs",
  "routerIntervalMs",
  "retryCeiling",
  "agingRatePerMinute",
  "queueDepthThreshold",
  "acquireTimeoutMs",
  "backoffBaseMs",
  "backoffMaxMs",
  "waitTtlMs",
  "claimTimeoutMs",
  "guardWaitMs",
] as const;

export type NumericConfigKey = (typeof NUMERIC_CONFIG_KEYS)[number];

const CONFIG_COMMENTS: Record<NumericConfigKey, string> = {
  heartbeatIntervalMs: "How often agents must refresh their status record.",
  crashThresholdMs: "Heartbeat age after which an agent is presumed crashed. Must exceed heartbeatIntervalMs.",
  defaultTtlMs: "Ticket TTL when acquire does not name one.",
  maxTtlMs: "Upper bound for any requested TTL.",
  detectorIntervalMs: "Deadlock detector poll interval.",
  reaperIntervalMs: "Reaper poll interval.",
  routerIntervalMs: "Task router poll interval.",
  retryCeiling: "Requeues allowed before a task moves to the failed state.",
  agingRatePerMinute: "Effective priority gained per minute of waiting.",
  queueDepthThreshold: "Queue depth at which a candidate agent counts as saturated.",
  acquireTimeoutMs: "How long a blocking acquire keeps retrying.",
  backoffBaseMs: "First retry delay for a blocked acquire.",
  backoffMaxMs: "Retry delay cap for a blocked acquire.",
  waitTtlMs: "Age after which an unrefreshed wait edge is ignored.",
  claimTimeoutMs: "Age after which an untouched task claim is requeued.",
  guardWaitMs: "How long a mutation waits for a busy resource slot.",
};

const ZERO_ALLOWED_KEYS = new Set<NumericConfigKey>(["retryCeiling", "agingRatePerMinute"]);

const isDefaultSentinel = (value: unknown): value is DefaultSentinel =>
  typeof value === "string" && value.trim().toLowerCase() === DEFAULT_SENTINEL;

const parseNumberValue = ({ value }: { value: unknown }): number | undefined => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string") {
    const trimmed = value.trim().replace(/_/g, "");
    if (trimmed.length === 0) {
      return undefined;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

const resolveConfigNumber = ({
  key,
  value,
  fallback,
}: {
  key: NumericConfigKey;
  value: unknown;
  fallback: number;
}): number => {
  if (value === undefined || value === null || isDefaultSentinel(value)) {
    return fallback;
  }
  const parsed = parseNumberValue({ value });
  if (parsed === undefined) {
    throw new ConfigError(`${key} must be a number (got ${JSON.stringify(value)})`);
  }
  if (parsed < 0) {
    throw new ConfigError(`${key} must not be negative (got ${parsed})`);
  }
  if (parsed === 0 && !ZERO_ALLOWED_KEYS.has(key)) {
    throw new ConfigError(`${key} must be positive (got ${parsed})`);
  }
  return parsed;
};

const parseSpecializationEntry = ({
  type,
  value,
}: {
  type: string;
  value: unknown;
}): SpecializationEntry => {
  const agentsRaw = Array.isArray(value) ? value : isRecord(value) ? value.agents : undefined;
  if (!Array.isArray(agentsRaw)) {
    throw new ConfigError(`specialization.${type} must list agents`);
  }
  const agents = agentsRaw
    .filter((agent): agent is string => typeof agent === "string")
    .map((agent) => agent.trim())
    .filter((agent) => agent.length > 0);
  if (agents.length === 0 || agents.length !== agentsRaw.length) {
    throw new ConfigError(`specialization.${type} must list at least one agent id string`);
  }
  const rationale =
    isRecord(value) && typeof value.rationale === "string" && value.rationale.trim().length > 0
      ? value.rationale.trim()
      : undefined;
  return rationale ? { agents, rationale } : { agents };
};

export const parseSpecialization = ({ value }: { value: unknown }): SpecializationMatrix => {
  if (value === undefined || value === null || isDefaultSentinel(value)) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError("specialization must be a mapping of task type to agents");
  }
  const matrix: SpecializationMatrix = {};
  for (const [type, entry] of Object.entries(value)) {
    matrix[type] = parseSpecializationEntry({ type, value: entry });
  }
  return matrix;
};

export const validateConfig = ({ config }: { config: LockstepConfig }): LockstepConfig => {
  if (config.crashThresholdMs <= config.heartbeatIntervalMs) {
    throw new ConfigError(
      `crashThresholdMs (${config.crashThresholdMs}) must exceed heartbeatIntervalMs (${config.heartbeatIntervalMs})`,
    );
  }
  if (config.defaultTtlMs > config.maxTtlMs) {
    throw new ConfigError(
      `defaultTtlMs (${config.defaultTtlMs}) must not exceed maxTtlMs (${config.maxTtlMs})`,
    );
  }
  if (config.backoffBaseMs > config.backoffMaxMs) {
    throw new ConfigError(
      `backoffBaseMs (${config.backoffBaseMs}) must not exceed backoffMaxMs (${config.backoffMaxMs})`,
    );
  }
  if (!Number.isInteger(config.retryCeiling)) {
    throw new ConfigError(`retryCeiling must be an integer (got ${config.retryCeiling})`);
  }
  return config;
};

export const parseConfigFile = ({ raw }: { raw: string }): Record<string, unknown> | null => {
  if (!raw.trim()) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = parse(raw) as unknown;
  } catch (error) {
    throw new ConfigError("Config file is not valid YAML", error);
  }
  if (parsed === null || parsed === undefined) {
    return null;
  }
  if (!isRecord(parsed)) {
    throw new ConfigError("Config file must be a YAML mapping");
  }
  return parsed;
};

export const buildConfig = ({ parsed }: { parsed: Record<string, unknown> | null }): LockstepConfig => {
  const num = (key: NumericConfigKey): number =>
    resolveConfigNumber({ key, value: parsed?.[key], fallback: DEFAULT_CONFIG[key] });
  return validateConfig({
    config: {
      heartbeatIntervalMs: num("heartbeatIntervalMs"),
      crashThresholdMs: num("crashThresholdMs"),
      defaultTtlMs: num("defaultTtlMs"),
      maxTtlMs: num("maxTtlMs"),
      detectorIntervalMs: num("detectorIntervalMs"),
      reaperIntervalMs: num("reaperIntervalMs"),
      routerIntervalMs: num("routerIntervalMs"),
      retryCeiling: num("retryCeiling"),
      agingRatePerMinute: num("agingRatePerMinute"),
      queueDepthThreshold: num("queueDepthThreshold"),
      acquireTimeoutMs: num("acquireTimeoutMs"),
      backoffBaseMs: num("backoffBaseMs"),
      backoffMaxMs: num("backoffMaxMs"),
      waitTtlMs: num("waitTtlMs"),
      claimTimeoutMs: num("claimTimeoutMs"),
      guardWaitMs: num("guardWaitMs"),
      specialization: parseSpecialization({ value: parsed?.specialization }),
    } satisfies LockstepConfig,
  });
};

const formatSpecialization = ({ matrix }: { matrix: SpecializationMatrix }): string[] => {
  if (Object.keys(matrix).length === 0) {
    return [
      "# Task type -> ranked candidate agents (primary, secondary, tertiary).",
      "# specialization:",
      "#   code_gen:",
      "#     agents: [agent-1, agent-2, agent-3]",
      '#     rationale: "agent-1 owns the generators"',
      "specialization: {}",
    ];
  }
  return [
    "# Task type -> ranked candidate agents (primary, secondary, tertiary).",
    stringify({ specialization: matrix }).trimEnd(),
  ];
};

export const formatConfigTemplate = ({ config }: { config: LockstepConfig }): string => {
  const lines: string[] = [];
  for (const key of NUMERIC_CONFIG_KEYS) {
    lines.push(`# default: ${DEFAULT_CONFIG[key]}. ${CONFIG_COMMENTS[key]}`);
    lines.push(`${key}: ${config[key] === DEFAULT_CONFIG[key] ? DEFAULT_SENTINEL : config[key]}`);
    lines.push("");
  }
  lines.push(...formatSpecialization({ matrix: config.specialization }));
  lines.push("");
  return lines.join("\n");
};

export const resolveConfigPath = ({ defaultPath }: { defaultPath: string }): string =>
  getRuntimeOverrides().configPath ?? defaultPath;

/** Writes the template when no config exists yet. Returns true when a file was created. */
export const ensureConfigFile = async ({ configPath }: { configPath: string }): Promise<boolean> => {
  const template = formatConfigTemplate({ config: DEFAULT_CONFIG });
  try {
    await writeFile(configPath, template, { encoding: "utf-8", flag: "wx" });
    return true;
  } catch (error) {
    if (hasErrorCode({ error, code: "EEXIST" })) {
      return false;
    }
    throw error;
  }
};

export const loadConfig = async ({ configPath }: { configPath: string }): Promise<LockstepConfig> => {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (error) {
    if (hasErrorCode({ error, code: "ENOENT" })) {
      return buildConfig({ parsed: null });
    }
    throw new ConfigError(`Unable to read ${configPath}`, error);
  }
  return buildConfig({ parsed: parseConfigFile({ raw }) });
};

export const ensureGitignoreEntry = async ({
  repoRoot,
  entry,
}: {
  repoRoot: string;
  entry: string;
}): Promise<void> => {
  const gitignorePath = join(repoRoot, ".gitignore");
  let raw = "";
  try {
    raw = await readFile(gitignorePath, "utf-8");
  } catch (error) {
    if (!hasErrorCode({ error, code: "ENOENT" })) {
      throw error;
    }
  }
  const lines = raw.split(/\r?\n/).map((line) => line.trim());
  if (lines.includes(entry)) {
    return;
  }
  const prefix = raw.length > 0 && !raw.endsWith("\n") ? "\n" : "";
  await writeFile(gitignorePath, `${raw}${prefix}${entry}\n`, "utf-8");
};
