import { describe, it, expect } from "vitest";
import { affects, tlbiEquals, toDescriptor } from "../../../src/core/mmu/tlbi";
import type { TlbContext } from "../../../src/core/mmu/pagetable";

const page5: TlbContext = { level: 3, vaPrefix: 5n };
const page5Asid1: TlbContext = { level: 3, vaPrefix: 5n, asid: 1n };
const page5Asid2: TlbContext = { level: 3, vaPrefix: 5n, asid: 2n };

describe("TLBI descriptors", () => {
  it("builds descriptors for broadcast EL1&0 maintenance", () => {
    expect(toDescriptor({ regime: "EL10", shareability: "ISH", scope: "All" })).toEqual({ scope: "All" });
    expect(toDescriptor({ regime: "EL10", shareability: "OSH", scope: "Asid", asid: 3n })).toEqual({
      scope: "Asid",
      asid: 3n,
    });
    expect(
      toDescriptor({ regime: "EL10", shareability: "ISH", scope: "Va", asid: 1n, va: 0x5000n, lastLevel: true })
    ).toEqual({ scope: "Va", asid: 1n, va: 0x5000n, lastLevel: true });
    expect(toDescriptor({ regime: "EL10", shareability: "ISH", scope: "VaAllAsid", va: 0x5000n })).toEqual({
      scope: "VaAllAsid",
      va: 0x5000n,
      lastLevel: false,
    });
  });

  it("rejects other regimes and non-shareable maintenance", () => {
    expect(() => toDescriptor({ regime: "EL10", shareability: "NSH", scope: "All" })).toThrow(
      "TLB maintenance unsupported: EL10 NSH"
    );
    expect(() => toDescriptor({ regime: "EL2", shareability: "ISH", scope: "All" })).toThrow(
      "TLB maintenance unsupported: EL2 ISH"
    );
  });

  it("requires the operands of its scope", () => {
    expect(() => toDescriptor({ regime: "EL10", shareability: "ISH", scope: "Asid" })).toThrow(
      "TLB maintenance by Asid requires asid"
    );
    expect(() => toDescriptor({ regime: "EL10", shareability: "ISH", scope: "VaAllAsid" })).toThrow(
      "TLB maintenance by VaAllAsid requires va"
    );
  });

  it("compares descriptors field by field", () => {
    expect(tlbiEquals({ scope: "Asid", asid: 1n }, { scope: "Asid", asid: 1n })).toBe(true);
    expect(tlbiEquals({ scope: "Asid", asid: 1n }, { scope: "Asid", asid: 2n })).toBe(false);
    expect(tlbiEquals({ scope: "All" }, { scope: "Asid", asid: 1n })).toBe(false);
    expect(
      tlbiEquals(
        { scope: "Va", asid: 1n, va: 0x5000n, lastLevel: false },
        { scope: "Va", asid: 1n, va: 0x5000n, lastLevel: true }
      )
    ).toBe(false);
  });

  describe("affects", () => {
    it("All invalidates everything", () => {
      expect(affects({ scope: "All" }, page5)).toBe(true);
      expect(affects({ scope: "All" }, page5Asid2)).toBe(true);
    });

    it("by ASID leaves global entries alone", () => {
      const t = { scope: "Asid", asid: 1n } as const;
      expect(affects(t, page5Asid1)).toBe(true);
      expect(affects(t, page5Asid2)).toBe(false);
      expect(affects(t, page5)).toBe(false);
    });

    it("by VA matches the page and the ASID or global entries", () => {
      const t = { scope: "Va", asid: 1n, va: 0x5fffn, lastLevel: false } as const;
      expect(affects(t, page5Asid1)).toBe(true);
      expect(affects(t, page5)).toBe(true);
      expect(affects(t, page5Asid2)).toBe(false);
      expect(affects({ ...t, va: 0x6000n }, page5Asid1)).toBe(false);
    });

    it("by VA for all ASIDs ignores the ASID", () => {
      const t = { scope: "VaAllAsid", va: 0x5000n, lastLevel: false } as const;
      expect(affects(t, page5Asid2)).toBe(true);
      expect(affects(t, { level: 2, vaPrefix: 0n })).toBe(true);
      expect(affects(t, { level: 2, vaPrefix: 1n })).toBe(false);
    });
  });
});
