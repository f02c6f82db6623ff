import { isSafeId } from "./state/records.js";

export const normalizeAgentId = ({ idRaw }: { idRaw?: string }): string => {
  const trimmed = idRaw?.trim() ?? "";
  if (trimmed.length === 0) {
    throw new Error("Missing agent id");
  }
  if (!isSafeId(trimmed)) {
    throw new Error(`Invalid agent id: ${trimmed} (use letters, digits, ".", "_" or "-")`);
  }
  return trimmed;
};

export const processHandleFor = ({ pid }: { pid: number }): string => `${pid}`;
