// src/core/interp/interpreter.ts
// One effect against (scratch state, thread state, memory).
//
// Each rule computes a pre-view from the thread's counters and the
// instruction's scratch state, checks it against the timestamp it is
// assigned or reads from, and returns the updated context plus the
// continuation fed with the effect's result.

import { chooseAmong, chooseBits, discard, done, failWith } from "../../outcome/constructors";
import { ModelError } from "../../outcome/errors";
import { guard } from "../../outcome/matchers";
import type { Outcome } from "../../outcome/outcome";
import type {
  Barrier,
  Deps,
  Effect,
  MemReadRequest,
  MemWriteRequest,
  Sem,
  TlbiEffect,
  TranslationEndEffect,
  TranslationStartEffect,
} from "../effects/types";
import { checkLocation, type Event, type Location } from "../memory/event";
import type { Memory, Timestamp } from "../memory/memory";
import {
  MAX_LEVEL,
  contextFor,
  leafContext,
  pagePrefix,
  replay,
  walk,
  type TlbContext,
  type WalkResult,
} from "../mmu/pagetable";
import { affects, toDescriptor } from "../mmu/tlbi";
import { TTBR, isSystemRegister, ttbrAsid, ttbrBase, type RegName } from "../thread/registers";
import {
  clearXclb,
  cohOf,
  contextSync,
  pushPromise,
  readReg,
  readSregAll,
  readSregCurrent,
  recordTlbi,
  regView,
  removePromise,
  setCoh,
  setFwd,
  setReg,
  setTlb,
  setXclb,
  update,
  writeSreg,
  type ThreadState,
} from "../thread/threadState";
import { join, joinAll, VIEW_ZERO, type View } from "../view/view";
import { addRead, addRegRead, addStrict, endWalk, nextWalkStep, readView, startWalk, type IIS } from "./iis";

export type Ctx = Readonly<{ iis: IIS; ts: ThreadState; mem: Memory }>;

/** The context after an effect and the rest of the instruction. */
export type Stepped = Readonly<{ ctx: Ctx; next: Sem }>;

/**
 * Run a single effect. Model errors raised on the way become `Fail`;
 * rule violations become `Discard`.
 */
export function runEffect(effect: Effect, ctx: Ctx): Outcome<Stepped> {
  return guard(() => dispatch(effect, ctx));
}

function dispatch(e: Effect, ctx: Ctx): Outcome<Stepped> {
  switch (e.op) {
    case "RegRead": {
      const [c, value] = readRegister(ctx, e.reg);
      return done({ ctx: c, next: e.next(value) });
    }
    case "RegWrite":
      return done({ ctx: writeRegister(ctx, e.reg, e.value, e.deps), next: e.next() });
    case "RegReadIndirect":
      return failWith("E0105", { reg: e.base });
    case "MemRead":
      return readMemory(ctx, e.req, e.next);
    case "MemWrite":
      return writeMemory(ctx, e.req, e.next);
    case "MemAtomic":
      return failWith("E0101");
    case "Barrier":
      return done({ ctx: runBarrier(ctx, e.barrier), next: e.next() });
    case "Tlbi":
      return runTlbi(ctx, e);
    case "BranchAnnounce":
      return done({ ctx: { ...ctx, ts: update(ctx.ts, "vspec", depsView(ctx, e.deps)) }, next: e.next() });
    case "TranslationStart":
      return translationStart(ctx, e);
    case "TranslationEnd":
      return done({ ctx: translationEnd(ctx, e), next: e.next() });
    case "ExceptionReturn":
    case "Halt":
      return done({ ctx: synchronizeContext(ctx), next: e.next() });
    case "Choose":
      return chooseBits(e.bits, (value) => done({ ctx, next: e.next(value) }));
    case "Discard":
      return discard("instruction-discard");
  }
}

// ─────────────────────────────────────────────────────────────────
// Dependencies and registers
// ─────────────────────────────────────────────────────────────────

export function depsView(ctx: Ctx, deps: Deps): View {
  if (deps.tag === "ImplicitAll") {
    return join(ctx.iis.regView, joinAll(ctx.iis.readViews));
  }
  return joinAll([
    ...deps.reads.map((i) => readView(ctx.iis, i)),
    ...deps.regs.map((r) => regView(ctx.ts, r)),
  ]);
}

function readRegister(ctx: Ctx, reg: RegName): [Ctx, bigint] {
  const rv = isSystemRegister(reg) ? readSregCurrent(ctx.ts, reg) : readReg(ctx.ts, reg);
  return [{ ...ctx, iis: addRegRead(ctx.iis, rv.view) }, rv.value];
}

function writeRegister(ctx: Ctx, reg: RegName, value: bigint, deps: Deps): Ctx {
  const view = depsView(ctx, deps);
  const ts = isSystemRegister(reg) ? writeSreg(ctx.ts, reg, value, view) : setReg(ctx.ts, reg, value, view);
  return { ...ctx, ts };
}

// ─────────────────────────────────────────────────────────────────
// Memory reads
// ─────────────────────────────────────────────────────────────────

function readMemory(ctx: Ctx, req: MemReadRequest, next: (value: bigint) => Sem): Outcome<Stepped> {
  if (req.kind === "ifetch") {
    return done({ ctx, next: next(fetchInstruction(ctx, req)) });
  }
  if (req.size !== 8) throw new ModelError("E0104", { size: req.size, kind: req.kind });
  if (req.kind === "ttw") {
    const [c, value] = readTableEntry(ctx, req);
    return done({ ctx: c, next: next(value) });
  }
  return readExplicit(ctx, req, next);
}

function readExplicit(ctx: Ctx, req: MemReadRequest, next: (value: bigint) => Sem): Outcome<Stepped> {
  const { ts, iis, mem } = ctx;
  const loc = checkLocation(req.pa);
  const v = ts.views;

  const vaddr = depsView(ctx, req.deps);
  const vbob = joinAll([v.vdmb, v.vdsb, v.vcse, v.vacq, req.kind === "acquire" ? v.vrel : VIEW_ZERO]);
  const vpre = joinAll([vaddr, vbob, iis.strict]);
  const vread = join(vpre, cohOf(ts, loc));

  // A thread never reads its own outstanding promise.
  const candidates = mem.read(loc, vread).filter((c) => !ts.promises.includes(c.time));

  return chooseAmong(candidates, (c) => {
    const fwd = ts.fwdb.get(loc);
    let contribution: View = c.time;
    if (fwd !== undefined && fwd.time === c.time) {
      const strong = req.kind !== "plain" || req.exclusive;
      contribution = fwd.exclusive && strong ? fwd.time : fwd.view;
    }
    const vpost = join(vpre, contribution);
    if (vpost > iis.bound) return discard("invalidated-translation", `read of 0x${loc.toString(16)}`);

    let nextTs = setCoh(ts, loc, c.time);
    nextTs = update(nextTs, "vrd", vpost);
    if (req.kind !== "plain") nextTs = update(nextTs, "vacq", vpost);
    nextTs = update(nextTs, "vspec", vaddr);
    if (req.exclusive) nextTs = setXclb(nextTs, { loc, time: c.time, view: vpost });

    return done({ ctx: { mem, ts: nextTs, iis: addRead(iis, vpost) }, next: next(c.value) });
  });
}

/** A descriptor read of the walk in progress for `req.va`. */
function readTableEntry(ctx: Ctx, req: MemReadRequest): [Ctx, bigint] {
  if (req.va === undefined) throw new ModelError("E0205", { pa: req.pa });
  const [iis, step, record] = nextWalkStep(ctx.iis, pagePrefix(req.va), req.va, req.pa);
  return [{ ...ctx, iis: addRead(iis, record.time) }, step.descriptor];
}

/** 4-byte fetch: half of the enclosing cell, as of the last context synchronization. */
function fetchInstruction(ctx: Ctx, req: MemReadRequest): bigint {
  if (req.size !== 4) throw new ModelError("E0104", { size: req.size, kind: req.kind });
  if (req.pa % 4n !== 0n) throw new ModelError("E0201", { pa: req.pa });
  const cell = ctx.mem.readAt(req.pa & ~7n, ctx.ts.views.vcse).value;
  return (req.pa & 4n) !== 0n ? cell >> 32n : cell & 0xffff_ffffn;
}

// ─────────────────────────────────────────────────────────────────
// Memory writes
// ─────────────────────────────────────────────────────────────────

/** Fulfill one of the thread's promises holding `event`, else append it. */
function fulfillOrPromise(ctx: Ctx, event: Event): { mem: Memory; t: Timestamp; fulfilled: boolean } {
  const t = ctx.mem.fulfill(event, ctx.ts.promises);
  if (t !== undefined) return { mem: ctx.mem, t, fulfilled: true };
  const [mem, fresh] = ctx.mem.promise(event);
  return { mem, t: fresh, fulfilled: false };
}

function writeMemory(ctx: Ctx, req: MemWriteRequest, next: (success: boolean) => Sem): Outcome<Stepped> {
  if (req.size !== 8) throw new ModelError("E0104", { size: req.size, kind: req.kind });
  const loc = checkLocation(req.pa);
  if (!req.exclusive) return storeValue(ctx, req, loc, next);

  // A store-exclusive may always fail without writing.
  return chooseAmong(["store", "fail"] as const, (pick) =>
    pick === "store"
      ? storeValue(ctx, req, loc, next)
      : done({ ctx: { ...ctx, ts: clearXclb(ctx.ts) }, next: next(false) })
  );
}

function storeValue(
  ctx: Ctx,
  req: MemWriteRequest,
  loc: Location,
  next: (success: boolean) => Sem
): Outcome<Stepped> {
  const { ts, iis } = ctx;
  const v = ts.views;
  const release = req.kind === "release";

  const vaddr = depsView(ctx, req.addrDeps);
  const vdata = depsView(ctx, req.dataDeps);
  const vbob = joinAll([v.vdmbst, v.vdmb, v.vdsb, v.vcse, v.vacq, release ? join(v.vrd, v.vwr) : VIEW_ZERO]);
  const vpre = joinAll([vaddr, vdata, v.vspec, vbob, iis.strict]);

  const { mem, t, fulfilled } = fulfillOrPromise(ctx, { tag: "Write", tid: ts.tid, loc, value: req.value });

  if (join(vpre, cohOf(ts, loc)) >= t) return discard("write-order", `write of 0x${loc.toString(16)} at ${t}`);
  if (t > iis.bound) return discard("invalidated-translation", `write of 0x${loc.toString(16)}`);

  let nextTs = ts;
  if (req.exclusive) {
    if (ts.xclb === undefined) return discard("exclusive-no-load");
    if (ts.xclb.loc !== loc) return discard("exclusive-no-load", `no load-exclusive of 0x${loc.toString(16)}`);
    if (!mem.cut(t).exclusive(loc, ts.tid, ts.xclb.time)) return discard("exclusive-lost");
    nextTs = clearXclb(nextTs);
  }

  if (fulfilled) nextTs = removePromise(nextTs, t);
  nextTs = setCoh(nextTs, loc, t);
  nextTs = update(nextTs, "vwr", t);
  if (release) nextTs = update(nextTs, "vrel", t);
  nextTs = setFwd(nextTs, loc, { time: t, view: join(vaddr, vdata), exclusive: req.exclusive });

  return done({ ctx: { iis: addStrict(iis, t), mem, ts: nextTs }, next: next(true) });
}

/**
 * Promise a write ahead of program order. The thread must later fulfill it
 * with a matching program-order write.
 */
export function promiseWrite(ctx: Ctx, loc: Location, value: bigint): [Ctx, Timestamp] {
  const [mem, t] = ctx.mem.promise({ tag: "Write", tid: ctx.ts.tid, loc: checkLocation(loc), value });
  return [{ ...ctx, mem, ts: pushPromise(ctx.ts, t) }, t];
}

// ─────────────────────────────────────────────────────────────────
// Barriers and context synchronization
// ─────────────────────────────────────────────────────────────────

function describeBarrier(b: Barrier): string {
  return b.tag === "Isb" ? "ISB" : `${b.tag.toUpperCase()} ${b.kind} ${b.domain}`;
}

function runBarrier(ctx: Ctx, b: Barrier): Ctx {
  if (b.tag === "Isb") return synchronizeContext(ctx);
  if (b.domain === "NSH") throw new ModelError("E0102", { barrier: describeBarrier(b) });

  const { vrd, vwr, vcse, vdsb, vtlbi } = ctx.ts.views;
  let ts = ctx.ts;
  if (b.tag === "Dmb") {
    switch (b.kind) {
      case "SY":
        ts = update(ts, "vdmb", joinAll([vrd, vwr, vcse, vdsb]));
        break;
      case "LD":
        ts = update(ts, "vdmb", joinAll([vrd, vcse, vdsb]));
        break;
      case "ST":
        ts = update(ts, "vdmbst", joinAll([vwr, vcse, vdsb]));
        break;
    }
  } else {
    switch (b.kind) {
      case "SY":
        ts = update(ts, "vdsb", joinAll([vrd, vwr, vtlbi, vcse]));
        break;
      case "LD":
        ts = update(ts, "vdsb", join(vrd, vcse));
        break;
      case "ST":
        ts = update(ts, "vdsb", joinAll([vwr, vtlbi, vcse]));
        break;
    }
  }
  return { ...ctx, ts };
}

/**
 * Context synchronization: raise vcse, then drop cached translations that
 * the TLB maintenance now behind vcse invalidates.
 */
export function synchronizeContext(ctx: Ctx): Ctx {
  const before = ctx.ts.views.vcse;
  const synced = contextSync(ctx.ts);
  let tlb = synced.tlb;
  for (const [, e] of ctx.mem.cut(synced.views.vcse).after(before).entries()) {
    if (e.tag === "Tlbi") tlb = tlb.invalidate(e.tlbi);
  }
  return { ...ctx, ts: setTlb(synced, tlb) };
}

// ─────────────────────────────────────────────────────────────────
// TLB maintenance
// ─────────────────────────────────────────────────────────────────

function runTlbi(ctx: Ctx, e: TlbiEffect): Outcome<Stepped> {
  const tlbi = toDescriptor(e.req);
  const { ts, iis } = ctx;
  const vpre = joinAll([ts.views.vcse, ts.views.vdsb, iis.strict, depsView(ctx, e.deps)]);
  const { mem, t, fulfilled } = fulfillOrPromise(ctx, { tag: "Tlbi", tid: ts.tid, tlbi });

  if (vpre >= t) return discard("tlbi-order", `TLBI at ${t}`);

  let nextTs = fulfilled ? removePromise(ts, t) : ts;
  nextTs = update(nextTs, "vtlbi", t);
  nextTs = recordTlbi(nextTs, t);
  return done({ ctx: { iis: addStrict(iis, t), mem, ts: nextTs }, next: e.next() });
}

// ─────────────────────────────────────────────────────────────────
// Translation
// ─────────────────────────────────────────────────────────────────

type WalkCandidate = Readonly<{
  time: Timestamp;
  tableBase: bigint;
  asid: bigint;
  result: WalkResult;
  bound: number;
  ctx?: TlbContext;
}>;

/** One less than the first later TLBI that invalidates `ctx`. */
function validUntil(mem: Memory, from: Timestamp, ctx: TlbContext): number {
  for (const [t, e] of mem.after(from).entries()) {
    if (e.tag === "Tlbi" && affects(e.tlbi, ctx)) return t - 1;
  }
  return Infinity;
}

function candidateFor(mem: Memory, va: bigint, time: Timestamp, tableBase: bigint, asid: bigint, result: WalkResult): WalkCandidate {
  const leaf = leafContext(va, result, asid);
  const limit = leaf ?? contextFor(result.outcome.level, va, asid);
  const bound = validUntil(mem, time, limit);
  return leaf === undefined
    ? { time, tableBase, asid, result, bound }
    : { time, tableBase, asid, result, bound, ctx: leaf };
}

function candidateKey(c: WalkCandidate): string {
  const steps = c.result.steps.map((s) => `${s.pa.toString(16)}=${s.descriptor.toString(16)}`).join(",");
  return `${c.asid.toString(16)}|${c.bound}|${steps}`;
}

/** Cached walks for `va`, replayed at the last context synchronization. */
function cachedCandidates(ctx: Ctx, va: bigint, tableBase: bigint, asid: bigint): WalkCandidate[] {
  const time = ctx.ts.views.vcse;
  const out: WalkCandidate[] = [];
  for (let level = 1; level <= MAX_LEVEL; level++) {
    for (const tlbCtx of [contextFor(level, va, asid), contextFor(level, va)]) {
      for (const entry of ctx.ts.tlb.get(tlbCtx)) {
        const result = replay(va, tableBase, entry);
        const leaf = leafContext(va, result, asid);
        if (leaf === undefined || leaf.level !== tlbCtx.level || leaf.asid !== tlbCtx.asid) continue;
        out.push(candidateFor(ctx.mem, va, time, tableBase, asid, result));
      }
    }
  }
  return out;
}

function translationStart(ctx: Ctx, e: TranslationStartEffect): Outcome<Stepped> {
  const { ts, mem } = ctx;
  const va = e.va;
  const found = new Map<string, WalkCandidate>();
  const keep = (c: WalkCandidate) => {
    const key = candidateKey(c);
    if (!found.has(key)) found.set(key, c);
  };

  for (const ttbr of readSregAll(ts, TTBR, ts.sregCursor)) {
    const tableBase = ttbrBase(ttbr.value);
    const asid = ttbrAsid(ttbr.value);
    cachedCandidates(ctx, va, tableBase, asid).forEach(keep);
    for (let t = ts.views.vcse; t <= mem.length; t++) {
      const result = walk(va, tableBase, (pa) => mem.readAt(pa, t).value);
      keep(candidateFor(mem, va, t, tableBase, asid, result));
    }
  }

  return chooseAmong(Array.from(found.values()), (c) => {
    const iis = startWalk(ctx.iis, pagePrefix(va), {
      time: c.time,
      remaining: c.result.steps,
      bound: c.bound,
      entry: c.result.steps.map((s) => s.descriptor),
      ...(c.ctx === undefined ? {} : { ctx: c.ctx }),
    });
    return done({ ctx: { ...ctx, iis }, next: e.next({ tableBase: c.tableBase, asid: c.asid }) });
  });
}

function translationEnd(ctx: Ctx, e: TranslationEndEffect): Ctx {
  const [iis, record] = endWalk(ctx.iis, pagePrefix(e.va), e.va);
  // Walks with a pending invalidation stay out of the cache.
  const ts =
    record.ctx !== undefined && record.bound === Infinity
      ? setTlb(ctx.ts, ctx.ts.tlb.add(record.ctx, record.entry))
      : ctx.ts;
  return { ...ctx, iis, ts };
}
