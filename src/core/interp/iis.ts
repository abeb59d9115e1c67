// src/core/interp/iis.ts
// Instruction scratch state: views accumulated across one instruction's
// effects and the table walks it has in flight.

import { ModelError } from "../../outcome/errors";
import type { Timestamp } from "../memory/memory";
import type { TlbContext, WalkStep } from "../mmu/pagetable";
import type { TlbEntry } from "../mmu/tlb";
import { join, VIEW_ZERO, type View } from "../view/view";

export type WalkRecord = Readonly<{
  /** Memory time the walk was taken at. */
  time: Timestamp;
  remaining: readonly WalkStep[];
  /** Last timestamp at which the walk is still valid. */
  bound: number;
  entry: TlbEntry;
  /** Context the walk fills when it completes; absent for faults. */
  ctx?: TlbContext;
}>;

export type IIS = Readonly<{
  regView: View;
  strict: View;
  readViews: readonly View[];
  walks: ReadonlyMap<bigint, WalkRecord>;
  bound: number;
}>;

export function iisInit(): IIS {
  return { regView: VIEW_ZERO, strict: VIEW_ZERO, readViews: [], walks: new Map(), bound: Infinity };
}

export function addRegRead(iis: IIS, view: View): IIS {
  return { ...iis, regView: join(iis.regView, view) };
}

export function addStrict(iis: IIS, view: View): IIS {
  return { ...iis, strict: join(iis.strict, view) };
}

/** Record a memory read's post-view; later effects are ordered after it. */
export function addRead(iis: IIS, view: View): IIS {
  return { ...addStrict(iis, view), readViews: [...iis.readViews, view] };
}

export function readView(iis: IIS, index: number): View {
  const v = iis.readViews[index];
  if (v === undefined) throw new ModelError("E0204", { index });
  return v;
}

export function startWalk(iis: IIS, prefix: bigint, record: WalkRecord): IIS {
  const walks = new Map(iis.walks);
  walks.set(prefix, record);
  return {
    ...addStrict(iis, record.time),
    walks,
    bound: Math.min(iis.bound, record.bound),
  };
}

/** Consume the next descriptor of the walk for `prefix`, which must live at `pa`. */
export function nextWalkStep(iis: IIS, prefix: bigint, va: bigint, pa: bigint): [IIS, WalkStep, WalkRecord] {
  const record = iis.walks.get(prefix);
  if (!record) throw new ModelError("E0206", { va });
  const [step, ...remaining] = record.remaining;
  if (step === undefined || step.pa !== pa) throw new ModelError("E0207", { pa });
  const walks = new Map(iis.walks);
  walks.set(prefix, { ...record, remaining });
  return [{ ...iis, walks }, step, record];
}

export function endWalk(iis: IIS, prefix: bigint, va: bigint): [IIS, WalkRecord] {
  const record = iis.walks.get(prefix);
  if (!record) throw new ModelError("E0206", { va });
  if (record.remaining.length > 0) {
    throw new ModelError("E0208", { va, count: record.remaining.length });
  }
  const walks = new Map(iis.walks);
  walks.delete(prefix);
  return [{ ...iis, walks }, record];
}
