export const LOCK_MODES = ["read", "write", "exclusive"] as const;

export type LockMode = (typeof LOCK_MODES)[number];

export const isLockMode = (value: unknown): value is LockMode =>
  typeof value === "string" && LOCK_MODES.some((mode) => mode === value);

/** Only shared reads coexist. Every pairing involving write or exclusive is denied. */
export const areModesCompatible = ({
  held,
  requested,
}: {
  held: LockMode;
  requested: LockMode;
}): boolean => held === "read" && requested === "read";

const MODE_STRENGTH: Record<LockMode, number> = {
  read: 0,
  write: 1,
  exclusive: 2,
};

/** True when a ticket held in `held` already grants everything `requested` asks for. */
export const modeCovers = ({ held, requested }: { held: LockMode; requested: LockMode }): boolean =>
  MODE_STRENGTH[held] >= MODE_STRENGTH[requested];

export const normalizeResource = ({ value }: { value: string }): string => {
  return value.trim().replace(/\\/g, "/").replace(/^(\.\/)+/, "").replace(/\/{2,}/g, "/").replace(/\/+$/, "");
};
