// src/core/effects/types.ts
// The effect protocol: an instruction is a pure, multi-shot tree of effects.
// Each node carries the continuation that receives the effect's result.

import type { Level } from "../mmu/pagetable";
import type { Shareability, TlbiRequest } from "../mmu/tlbi";
import type { RegName } from "../thread/registers";

/**
 * What an effect depends on. `Explicit` names registers by their current
 * value and earlier reads of the same instruction by occurrence index.
 */
export type Deps =
  | { tag: "Explicit"; regs: readonly RegName[]; reads: readonly number[] }
  | { tag: "ImplicitAll" };

export type ReadKind = "plain" | "acquire" | "acquirePC" | "ttw" | "ifetch";
export type WriteKind = "plain" | "release";

export type BarrierKind = "SY" | "LD" | "ST";

export type Barrier =
  | { tag: "Dmb"; kind: BarrierKind; domain: Shareability }
  | { tag: "Dsb"; kind: BarrierKind; domain: Shareability }
  | { tag: "Isb" };

/** Root table chosen for a translation, with the ASID it was tagged with. */
export type TranslationStarted = { tableBase: bigint; asid: bigint };

export type MemReadRequest = {
  pa: bigint;
  size: number;
  kind: ReadKind;
  exclusive: boolean;
  /** Address dependencies. */
  deps: Deps;
  /** Virtual address, required for translation-table-walk reads. */
  va?: bigint;
};

export type MemWriteRequest = {
  pa: bigint;
  size: number;
  value: bigint;
  kind: WriteKind;
  exclusive: boolean;
  addrDeps: Deps;
  dataDeps: Deps;
};

export type Ret = { op: "Ret" };

export type RegReadEffect = { op: "RegRead"; reg: RegName; next: (value: bigint) => Sem };
export type RegWriteEffect = { op: "RegWrite"; reg: RegName; value: bigint; deps: Deps; next: () => Sem };
export type RegReadIndirectEffect = { op: "RegReadIndirect"; base: RegName; index: number; next: (value: bigint) => Sem };
export type MemReadEffect = { op: "MemRead"; req: MemReadRequest; next: (value: bigint) => Sem };
export type MemWriteEffect = { op: "MemWrite"; req: MemWriteRequest; next: (success: boolean) => Sem };
export type MemAtomicEffect = { op: "MemAtomic"; pa: bigint; size: number; operation: string; next: (value: bigint) => Sem };
export type BarrierEffect = { op: "Barrier"; barrier: Barrier; next: () => Sem };
export type TlbiEffect = { op: "Tlbi"; req: TlbiRequest; deps: Deps; next: () => Sem };
export type BranchAnnounceEffect = { op: "BranchAnnounce"; target: bigint; deps: Deps; next: () => Sem };
export type TranslationStartEffect = { op: "TranslationStart"; va: bigint; next: (started: TranslationStarted) => Sem };
export type TranslationEndEffect = { op: "TranslationEnd"; va: bigint; next: () => Sem };
export type ExceptionReturnEffect = { op: "ExceptionReturn"; next: () => Sem };
export type HaltEffect = { op: "Halt"; next: () => Sem };
export type ChooseEffect = { op: "Choose"; bits: number; next: (value: bigint) => Sem };
export type DiscardEffect = { op: "Discard" };

export type Effect =
  | RegReadEffect
  | RegWriteEffect
  | RegReadIndirectEffect
  | MemReadEffect
  | MemWriteEffect
  | MemAtomicEffect
  | BarrierEffect
  | TlbiEffect
  | BranchAnnounceEffect
  | TranslationStartEffect
  | TranslationEndEffect
  | ExceptionReturnEffect
  | HaltEffect
  | ChooseEffect
  | DiscardEffect;

export type Sem = Ret | Effect;

/** Result of a walk as seen by instruction semantics. */
export type TranslationResult =
  | { tag: "Mapped"; pa: bigint; level: Level }
  | { tag: "Fault"; level: Level };
