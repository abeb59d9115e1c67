import { describe, it, expect } from "vitest";
import { TranslationCache } from "../../../src/core/mmu/tlb";
import type { TlbContext } from "../../../src/core/mmu/pagetable";

const global5: TlbContext = { level: 3, vaPrefix: 5n };
const asid1: TlbContext = { level: 3, vaPrefix: 5n, asid: 1n };
const block: TlbContext = { level: 2, vaPrefix: 0n };

const ENTRY = [0x2003n, 0x3003n, 0x4003n, 0x8003n];
const OTHER = [0x2003n, 0x3003n, 0x4003n, 0x9003n];

describe("TranslationCache", () => {
  it("starts empty", () => {
    const tlb = TranslationCache.empty();
    expect(tlb.size()).toBe(0);
    expect(tlb.get(global5)).toEqual([]);
  });

  it("keys entries by level, prefix and ASID", () => {
    const tlb = TranslationCache.empty().add(global5, ENTRY);
    expect(tlb.get(global5)).toEqual([ENTRY]);
    expect(tlb.get(asid1)).toEqual([]);
    expect(tlb.get({ level: 2, vaPrefix: 5n })).toEqual([]);
  });

  it("holds a set of entries per context", () => {
    const tlb = TranslationCache.empty().add(global5, ENTRY).add(global5, ENTRY).add(global5, OTHER);
    expect(tlb.size()).toBe(2);
    expect(tlb.get(global5)).toEqual([ENTRY, OTHER]);
  });

  it("unions level-wise and context-wise", () => {
    const a = TranslationCache.empty().add(global5, ENTRY);
    const b = TranslationCache.empty().add(global5, OTHER).add(block, [0x2003n, 0x3003n, 0x20_0001n]);
    const u = a.union(b);
    expect(u.get(global5)).toEqual([ENTRY, OTHER]);
    expect(u.get(block)).toEqual([[0x2003n, 0x3003n, 0x20_0001n]]);
    expect(a.size()).toBe(1);
  });

  it("invalidates the contexts a maintenance affects", () => {
    const tlb = TranslationCache.empty().add(global5, ENTRY).add(asid1, OTHER);
    expect(tlb.invalidate({ scope: "Asid", asid: 1n }).describe()).toEqual(["3:5/*:2003,3003,4003,8003"]);
    expect(tlb.invalidate({ scope: "All" }).size()).toBe(0);
  });

  it("describes entries in a stable order", () => {
    const tlb = TranslationCache.empty().add(asid1, OTHER).add(global5, ENTRY);
    expect(tlb.describe()).toEqual(["3:5/*:2003,3003,4003,8003", "3:5/1:2003,3003,4003,9003"]);
  });

  it("rejects levels outside 0..3", () => {
    expect(() => TranslationCache.empty().add({ level: 4, vaPrefix: 0n }, ENTRY)).toThrow(
      "Invalid translation level: 4"
    );
  });
});
