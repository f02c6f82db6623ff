export interface SpecializationEntry {
  /** Ranked candidates: primary first, then secondary, tertiary, ... */
  agents: string[];
  rationale?: string;
}

export type SpecializationMatrix = Record<string, SpecializationEntry>;

export const candidatesFor = ({
  matrix,
  type,
}: {
  matrix: SpecializationMatrix;
  type: string;
}): string[] => {
  const entry = Object.prototype.hasOwnProperty.call(matrix, type) ? matrix[type] : undefined;
  return entry ? [...entry.agents] : [];
};

/**
 * An agent may take a task when the matrix lists it for the task type. Types without a
 * matrix entry fall back to the capabilities the agent advertises ("*" takes anything).
 */
export const isEligible = ({
  matrix,
  type,
  agentId,
  capabilities,
}: {
  matrix: SpecializationMatrix;
  type: string;
  agentId: string;
  capabilities: string[];
}): boolean => {
  const candidates = candidatesFor({ matrix, type });
  if (candidates.length > 0) {
    return candidates.includes(agentId);
  }
  return capabilities.includes(type) || capabilities.includes("*");
};

export const rankOf = ({
  matrix,
  type,
  agentId,
}: {
  matrix: SpecializationMatrix;
  type: string;
  agentId: string;
}): number | null => {
  const index = candidatesFor({ matrix, type }).indexOf(agentId);
  return index >= 0 ? index : null;
};
