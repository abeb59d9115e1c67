// src/core/mmu/tlbi.ts
// TLB maintenance requests and the descriptors recorded in memory.

import { ModelError } from "../../outcome/errors";
import { contextFor, type TlbContext } from "./pagetable";

export type TlbiRegime = "EL10" | "EL2" | "EL3";
export type Shareability = "NSH" | "ISH" | "OSH";
export type TlbiScope = "All" | "Asid" | "Va" | "VaAllAsid";

/** A TLBI instruction as the instruction semantics describes it. */
export type TlbiRequest = Readonly<{
  regime: TlbiRegime;
  shareability: Shareability;
  scope: TlbiScope;
  asid?: bigint;
  va?: bigint;
  /** Only invalidate last-level (leaf) entries. */
  lastLevel?: boolean;
}>;

export type TlbiDescriptor =
  | Readonly<{ scope: "All" }>
  | Readonly<{ scope: "Asid"; asid: bigint }>
  | Readonly<{ scope: "Va"; asid: bigint; va: bigint; lastLevel: boolean }>
  | Readonly<{ scope: "VaAllAsid"; va: bigint; lastLevel: boolean }>;

function required(value: bigint | undefined, scope: TlbiScope, field: string): bigint {
  if (value === undefined) throw new ModelError("E0212", { scope, field });
  return value;
}

/**
 * Only broadcast maintenance at the EL1&0 regime is modelled; anything else
 * is reported as unsupported rather than ignored.
 */
export function toDescriptor(req: TlbiRequest): TlbiDescriptor {
  if (req.regime !== "EL10" || req.shareability === "NSH") {
    throw new ModelError("E0103", { regime: req.regime, shareability: req.shareability });
  }
  const lastLevel = req.lastLevel ?? false;
  switch (req.scope) {
    case "All":
      return { scope: "All" };
    case "Asid":
      return { scope: "Asid", asid: required(req.asid, req.scope, "asid") };
    case "Va":
      return { scope: "Va", asid: required(req.asid, req.scope, "asid"), va: required(req.va, req.scope, "va"), lastLevel };
    case "VaAllAsid":
      return { scope: "VaAllAsid", va: required(req.va, req.scope, "va"), lastLevel };
  }
}

export function tlbiEquals(a: TlbiDescriptor, b: TlbiDescriptor): boolean {
  switch (a.scope) {
    case "All":
      return b.scope === "All";
    case "Asid":
      return b.scope === "Asid" && a.asid === b.asid;
    case "Va":
      return b.scope === "Va" && a.asid === b.asid && a.va === b.va && a.lastLevel === b.lastLevel;
    case "VaAllAsid":
      return b.scope === "VaAllAsid" && a.va === b.va && a.lastLevel === b.lastLevel;
  }
}

function vaMatches(va: bigint, ctx: TlbContext): boolean {
  return contextFor(ctx.level, va).vaPrefix === ctx.vaPrefix;
}

/**
 * Whether a maintenance invalidates the leaf entry of `ctx`. A context without
 * ASID is global: ASID-scoped maintenance leaves it alone.
 */
export function affects(tlbi: TlbiDescriptor, ctx: TlbContext): boolean {
  switch (tlbi.scope) {
    case "All":
      return true;
    case "Asid":
      return ctx.asid !== undefined && ctx.asid === tlbi.asid;
    case "Va":
      return vaMatches(tlbi.va, ctx) && (ctx.asid === undefined || ctx.asid === tlbi.asid);
    case "VaAllAsid":
      return vaMatches(tlbi.va, ctx);
  }
}
