// src/core/thread/threadState.ts
// Per-thread promising state. Every operation returns a new record.

import { ModelError } from "../../outcome/errors";
import type { Location, ThreadId } from "../memory/event";
import type { Timestamp } from "../memory/memory";
import { TranslationCache } from "../mmu/tlb";
import { join, VIEW_ZERO, type View } from "../view/view";
import { isSystemRegister, type RegName } from "./registers";

export type RegValue = Readonly<{ value: bigint; view: View }>;

export type SregWrite = Readonly<{ reg: RegName; value: bigint; view: View }>;

/** Most recent own write a thread may forward from. */
export type FwdItem = Readonly<{ time: Timestamp; view: View; exclusive: boolean }>;

/** Outstanding exclusive load: the location it monitors and the write it read. */
export type XclbItem = Readonly<{ loc: Location; time: Timestamp; view: View }>;

/**
 * Monotone view counters:
 * vrd/vwr reads and writes, vdmbst/vdmb/vdsb barriers, vspec speculative
 * operands, vcse context synchronization, vtlbi TLB maintenance,
 * vmsr system-register writes, vacq/vrel acquire and release accesses.
 */
export type ViewCounter =
  | "vrd"
  | "vwr"
  | "vdmbst"
  | "vdmb"
  | "vdsb"
  | "vspec"
  | "vcse"
  | "vtlbi"
  | "vmsr"
  | "vacq"
  | "vrel";

export type ViewCounters = Readonly<Record<ViewCounter, View>>;

export type ThreadState = Readonly<{
  tid: ThreadId;
  promises: readonly Timestamp[];
  regs: ReadonlyMap<RegName, RegValue>;
  initRegs: ReadonlyMap<RegName, bigint>;
  sregs: readonly SregWrite[];
  /** History length at the last context synchronization. */
  sregCursor: number;
  coh: ReadonlyMap<Location, View>;
  views: ViewCounters;
  fwdb: ReadonlyMap<Location, FwdItem>;
  xclb?: XclbItem;
  /** TLBI timestamp -> system-register cursor in force when it was issued. */
  tlbiCursors: ReadonlyMap<Timestamp, number>;
  tlb: TranslationCache;
}>;

const ZERO_VIEWS: ViewCounters = {
  vrd: VIEW_ZERO,
  vwr: VIEW_ZERO,
  vdmbst: VIEW_ZERO,
  vdmb: VIEW_ZERO,
  vdsb: VIEW_ZERO,
  vspec: VIEW_ZERO,
  vcse: VIEW_ZERO,
  vtlbi: VIEW_ZERO,
  vmsr: VIEW_ZERO,
  vacq: VIEW_ZERO,
  vrel: VIEW_ZERO,
};

export function initThreadState(tid: ThreadId, initRegs: ReadonlyMap<RegName, bigint>): ThreadState {
  return {
    tid,
    promises: [],
    regs: new Map(),
    initRegs,
    sregs: [],
    sregCursor: 0,
    coh: new Map(),
    views: ZERO_VIEWS,
    fwdb: new Map(),
    tlbiCursors: new Map(),
    tlb: TranslationCache.empty(),
  };
}

// ─────────────────────────────────────────────────────────────────
// Field updates
// ─────────────────────────────────────────────────────────────────

/** Raise a counter to at least `view`. */
export function update(ts: ThreadState, counter: ViewCounter, view: View): ThreadState {
  if (ts.views[counter] >= view) return ts;
  return { ...ts, views: { ...ts.views, [counter]: view } };
}

export function setReg(ts: ThreadState, reg: RegName, value: bigint, view: View): ThreadState {
  const regs = new Map(ts.regs);
  regs.set(reg, { value, view });
  return { ...ts, regs };
}

export function cohOf(ts: ThreadState, loc: Location): View {
  return ts.coh.get(loc) ?? VIEW_ZERO;
}

/** Raise the coherence view of `loc`. */
export function setCoh(ts: ThreadState, loc: Location, view: View): ThreadState {
  const coh = new Map(ts.coh);
  coh.set(loc, join(cohOf(ts, loc), view));
  return { ...ts, coh };
}

export function setFwd(ts: ThreadState, loc: Location, item: FwdItem): ThreadState {
  const fwdb = new Map(ts.fwdb);
  fwdb.set(loc, item);
  return { ...ts, fwdb };
}

export function setXclb(ts: ThreadState, item: XclbItem): ThreadState {
  return { ...ts, xclb: item };
}

export function clearXclb(ts: ThreadState): ThreadState {
  const { xclb: _dropped, ...rest } = ts;
  return rest;
}

export function pushPromise(ts: ThreadState, t: Timestamp): ThreadState {
  return { ...ts, promises: [...ts.promises, t] };
}

export function removePromise(ts: ThreadState, t: Timestamp): ThreadState {
  return { ...ts, promises: ts.promises.filter((p) => p !== t) };
}

export function setTlb(ts: ThreadState, tlb: TranslationCache): ThreadState {
  return { ...ts, tlb };
}

export function hasNoPromises(ts: ThreadState): boolean {
  return ts.promises.length === 0;
}

// ─────────────────────────────────────────────────────────────────
// Registers
// ─────────────────────────────────────────────────────────────────

function initialValue(ts: ThreadState, reg: RegName): RegValue {
  const value = ts.initRegs.get(reg);
  if (value === undefined) throw new ModelError("E0202", { reg });
  return { value, view: VIEW_ZERO };
}

/** Application register; untouched registers come from the initial snapshot. */
export function readReg(ts: ThreadState, reg: RegName): RegValue {
  return ts.regs.get(reg) ?? initialValue(ts, reg);
}

/** Last write to `reg` at history positions before `s`, else the initial value. */
export function readSregLast(ts: ThreadState, reg: RegName, s: number): RegValue {
  for (let i = Math.min(s, ts.sregs.length) - 1; i >= 0; i--) {
    const w = ts.sregs[i];
    if (w.reg === reg) return { value: w.value, view: w.view };
  }
  return initialValue(ts, reg);
}

/** The value visible at `s` plus every later write to `reg`. */
export function readSregAll(ts: ThreadState, reg: RegName, s: number): RegValue[] {
  const out = [readSregLast(ts, reg, s)];
  for (const w of ts.sregs.slice(Math.max(0, s))) {
    if (w.reg === reg) out.push({ value: w.value, view: w.view });
  }
  return out;
}

/** Newest value in program order, for direct reads. */
export function readSregCurrent(ts: ThreadState, reg: RegName): RegValue {
  return readSregLast(ts, reg, ts.sregs.length);
}

export function writeSreg(ts: ThreadState, reg: RegName, value: bigint, view: View): ThreadState {
  const next = { ...ts, sregs: [...ts.sregs, { reg, value, view }] };
  return update(next, "vmsr", view);
}

/** Current view of any register, without recording a read. */
export function regView(ts: ThreadState, reg: RegName): View {
  return isSystemRegister(reg) ? readSregCurrent(ts, reg).view : readReg(ts, reg).view;
}

// ─────────────────────────────────────────────────────────────────
// Context synchronization and TLB bookkeeping
// ─────────────────────────────────────────────────────────────────

/** Make all prior system-register writes visible and raise vcse. */
export function contextSync(ts: ThreadState): ThreadState {
  const v = ts.views;
  const vcse = Math.max(v.vcse, v.vspec, v.vdsb, v.vmsr);
  return { ...update(ts, "vcse", vcse), sregCursor: ts.sregs.length };
}

export function recordTlbi(ts: ThreadState, t: Timestamp): ThreadState {
  const tlbiCursors = new Map(ts.tlbiCursors);
  tlbiCursors.set(t, ts.sregCursor);
  return { ...ts, tlbiCursors };
}

/** View-stripped register file: initial values overlaid with every write. */
export function plainRegs(ts: ThreadState): Map<RegName, bigint> {
  const out = new Map(ts.initRegs);
  for (const [reg, { value }] of ts.regs) out.set(reg, value);
  for (const { reg, value } of ts.sregs) out.set(reg, value);
  return out;
}
