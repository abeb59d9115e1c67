// src/core/explore/runner.ts
// Exhaustive exploration of a litmus program.
//
// A move runs one whole instruction of one thread, or promises one of a
// thread's promisable writes. Choice points inside an instruction are
// enumerated eagerly, so every state on the frontier sits on an
// instruction boundary.

import { sha256JSON, type Hash } from "../artifacts/hash";
import { ModelFailureError } from "../../outcome/errors";
import { wrapFailure } from "../../outcome/failure";
import { makeDiagnostic } from "../../outcome/codes";
import type { ChoiceSpace, Outcome } from "../../outcome/outcome";
import { imageFromCells } from "../memory/bytes";
import { Memory } from "../memory/memory";
import { iisInit } from "../interp/iis";
import { runInstruction } from "../interp/instruction";
import { promiseWrite } from "../interp/interpreter";
import { hasNoPromises, initThreadState, plainRegs, type ThreadState } from "../thread/threadState";
import { makeFrontier } from "./frontier";
import {
  DEFAULT_EXPLORE_OPTIONS,
  ExplorationBudgetExceeded,
  type ExploreOptions,
  type ExploreResult,
  type ExploreStats,
  type FinalState,
  type LitmusProgram,
} from "./types";

type ThreadSlot = Readonly<{
  ts: ThreadState;
  pc: number;
  /** Indices of promisable writes already promised. */
  promised: readonly number[];
}>;

type GlobalState = Readonly<{ mem: Memory; threads: readonly ThreadSlot[] }>;

function noop(_msg: string, _data?: unknown): void {}

// ─────────────────────────────────────────────────────────────────
// Choice enumeration
// ─────────────────────────────────────────────────────────────────

function picks(space: ChoiceSpace, maxChooseBits: number): bigint[] {
  const count =
    space.tag === "Options"
      ? BigInt(space.count)
      : space.bits <= maxChooseBits
        ? 1n << BigInt(space.bits)
        : undefined;
  if (count === undefined) throw new ExplorationBudgetExceeded("maxChooseBits", maxChooseBits);
  const out: bigint[] = [];
  for (let i = 0n; i < count; i++) out.push(i);
  return out;
}

/** Every resolved outcome reachable by picking through choice points. */
function* leaves<A>(o: Outcome<A>, maxChooseBits: number): Generator<Exclude<Outcome<A>, { tag: "Choice" }>> {
  if (o.tag !== "Choice") {
    yield o;
    return;
  }
  for (const pick of picks(o.space, maxChooseBits)) {
    yield* leaves(o.resume(pick), maxChooseBits);
  }
}

// ─────────────────────────────────────────────────────────────────
// Digests
// ─────────────────────────────────────────────────────────────────

function sortedEntries<K extends bigint | number | string, V>(m: ReadonlyMap<K, V>): [K, V][] {
  return Array.from(m.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

function describeThread(slot: ThreadSlot): unknown {
  const { ts } = slot;
  return {
    pc: slot.pc,
    promised: slot.promised,
    promises: ts.promises,
    regs: sortedEntries(ts.regs),
    sregs: ts.sregs,
    sregCursor: ts.sregCursor,
    coh: sortedEntries(ts.coh),
    views: ts.views,
    fwdb: sortedEntries(ts.fwdb),
    xclb: ts.xclb ?? null,
    tlbiCursors: sortedEntries(ts.tlbiCursors),
    tlb: ts.tlb.describe(),
  };
}

function stateDigest(s: GlobalState): Hash {
  return sha256JSON({ events: s.mem.list(), threads: s.threads.map(describeThread) });
}

function finalDigest(f: FinalState): Hash {
  return sha256JSON({ memory: sortedEntries(f.memory), regs: f.regs.map(sortedEntries) });
}

// ─────────────────────────────────────────────────────────────────
// Exploration
// ─────────────────────────────────────────────────────────────────

function initialState(program: LitmusProgram): GlobalState {
  const mem = Memory.empty(imageFromCells(program.memory ?? new Map()));
  const threads = program.threads.map((t, tid) => ({
    ts: initThreadState(tid, new Map(Object.entries(t.regs ?? {}))),
    pc: 0,
    promised: [],
  }));
  return { mem, threads };
}

function withThread(s: GlobalState, tid: number, slot: ThreadSlot, mem: Memory): GlobalState {
  return { mem, threads: s.threads.map((t, i) => (i === tid ? slot : t)) };
}

/**
 * Enumerate every final state of `program`: all threads past their last
 * instruction with every promise fulfilled.
 */
export function explore(program: LitmusProgram, options: Partial<ExploreOptions> = {}): ExploreResult {
  const opts: ExploreOptions = { ...DEFAULT_EXPLORE_OPTIONS, ...options };
  const log = opts.log ?? noop;
  const frontier = makeFrontier<GlobalState>(opts.frontier);
  const seen = new Set<Hash>();
  const finals = new Map<Hash, FinalState>();
  const stats: ExploreStats = { jobs: 0, steps: 0, discards: 0, duplicates: 0, stuck: 0 };

  const push = (s: GlobalState) => {
    const digest = stateDigest(s);
    if (seen.has(digest)) {
      stats.duplicates++;
      return;
    }
    seen.add(digest);
    stats.jobs++;
    if (stats.jobs > opts.maxJobs) throw new ExplorationBudgetExceeded("maxJobs", opts.maxJobs);
    frontier.push(s);
  };

  log("explore: start", { name: program.name, threads: program.threads.length, frontier: opts.frontier });
  push(initialState(program));

  for (;;) {
    const s = frontier.pop();
    if (s === undefined) break;
    const running = s.threads.filter((slot, tid) => slot.pc < program.threads[tid].instructions.length);

    if (running.length === 0) {
      const pending = s.threads.filter((slot) => !hasNoPromises(slot.ts));
      if (pending.length > 0) {
        stats.stuck++;
        for (const slot of pending) {
          const diag = makeDiagnostic("W0001", { tid: slot.ts.tid, count: slot.ts.promises.length });
          log(diag.message, diag.data);
        }
        continue;
      }
      const final: FinalState = { memory: s.mem.snapshot(), regs: s.threads.map((slot) => plainRegs(slot.ts)) };
      finals.set(finalDigest(final), final);
      continue;
    }

    s.threads.forEach((slot, tid) => {
      const thread = program.threads[tid];
      const sem = thread.instructions[slot.pc];
      if (sem === undefined) return;

      stats.steps++;
      if (stats.steps > opts.maxSteps) throw new ExplorationBudgetExceeded("maxSteps", opts.maxSteps);

      for (const leaf of leaves(runInstruction(sem, slot.ts, s.mem), opts.maxChooseBits)) {
        switch (leaf.tag) {
          case "Done":
            push(withThread(s, tid, { ...slot, ts: leaf.value.ts, pc: slot.pc + 1 }, leaf.value.mem));
            break;
          case "Discard":
            stats.discards++;
            log(`explore: thread ${tid} pc ${slot.pc} discarded`, { reason: leaf.reason, detail: leaf.detail });
            break;
          case "Fail":
            throw new ModelFailureError(
              wrapFailure(leaf.failure, `Thread ${tid} instruction ${slot.pc}: ${leaf.failure.message}`, {
                tid,
                pc: slot.pc,
                program: program.name,
              })
            );
        }
      }

      (thread.promisable ?? []).forEach((w, index) => {
        if (slot.promised.includes(index)) return;
        const [ctx, t] = promiseWrite({ iis: iisInit(), ts: slot.ts, mem: s.mem }, w.loc, w.value);
        log(`explore: thread ${tid} promised write at ${t}`, { loc: w.loc, value: w.value });
        push(withThread(s, tid, { ...slot, ts: ctx.ts, promised: [...slot.promised, index] }, ctx.mem));
      });
    });
  }

  log("explore: done", { finals: finals.size, ...stats });
  return { finals: Array.from(finals.values()), stats };
}
