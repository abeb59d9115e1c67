import { describe, it, expect } from "vitest";
import { join, joinAll, meet, VIEW_ZERO } from "../../../src/core/view/view";

describe("views", () => {
  it("join is max and meet is min", () => {
    expect(join(3, 5)).toBe(5);
    expect(join(5, 3)).toBe(5);
    expect(meet(3, 5)).toBe(3);
    expect(meet(4, Infinity)).toBe(4);
  });

  it("joinAll starts from zero", () => {
    expect(joinAll([])).toBe(VIEW_ZERO);
    expect(joinAll([2, 7, 1])).toBe(7);
    expect(joinAll(new Set([4, 4, 0]))).toBe(4);
  });
});
