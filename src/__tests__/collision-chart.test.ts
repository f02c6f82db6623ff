import { collisionChart } from "../format/collision-chart.js";

describe("collisionChart", () => {
  test("is empty without buckets", () => {
    expect(collisionChart({ counts: [] })).toBe("");
  });

  test("scales to the busiest bucket and never hides a single collision", () => {
    expect(collisionChart({ counts: [0, 1, 7, 14] })).toBe("_.=#");
  });

  test("keeps only the most recent buckets when narrowed", () => {
    expect(collisionChart({ counts: [5, 0, 0, 2], width: 2 })).toBe("_#");
  });
});
