import { describe, it, expect } from "vitest";
import { QueueFrontier, StackFrontier, makeFrontier } from "../../../src/core/explore/frontier";

function drain<T>(f: { pop(): T | undefined }): T[] {
  const out: T[] = [];
  for (;;) {
    const x = f.pop();
    if (x === undefined) return out;
    out.push(x);
  }
}

describe("frontiers", () => {
  it("dfs pops the newest state first", () => {
    const f = makeFrontier<number>("dfs");
    [1, 2, 3].forEach((x) => f.push(x));
    expect(f).toBeInstanceOf(StackFrontier);
    expect(drain(f)).toEqual([3, 2, 1]);
  });

  it("bfs pops in arrival order", () => {
    const f = makeFrontier<number>("bfs");
    [1, 2, 3].forEach((x) => f.push(x));
    expect(f).toBeInstanceOf(QueueFrontier);
    expect(f.pop()).toBe(1);
    expect(f.size()).toBe(2);
    expect(drain(f)).toEqual([2, 3]);
  });

  it("keeps order across compaction", () => {
    const f = new QueueFrontier<number>();
    for (let i = 0; i < 3000; i++) f.push(i);
    for (let i = 0; i < 2000; i++) expect(f.pop()).toBe(i);
    f.push(3000);
    expect(f.size()).toBe(1001);
    expect(drain(f)[1000]).toBe(3000);
  });
});
