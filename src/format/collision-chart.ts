const QUIET = "_";
const LEVELS = [".", ":", "-", "=", "+", "*", "#"] as const;

/**
 * One character per time bucket of blocked acquires, scaled to the busiest bucket. Any
 * bucket with a collision gets at least the lowest mark; only empty buckets read as quiet.
 */
export const collisionChart = ({ counts, width = counts.length }: { counts: number[]; width?: number }): string => {
  const window = width > 0 ? counts.slice(-width) : [];
  const peak = window.reduce((max, count) => Math.max(max, count), 0);
  return window
    .map((count) => {
      if (count <= 0 || peak <= 0) {
        return QUIET;
      }
      const level = Math.ceil((count / peak) * LEVELS.length) - 1;
      return LEVELS[Math.min(LEVELS.length - 1, Math.max(0, level))] ?? QUIET;
    })
    .join("");
};
