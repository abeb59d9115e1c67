// src/core/effects/builder.ts
// Constructors for effect trees, and a few instruction shapes built from them.

import { decode, descriptorAddress } from "../mmu/pagetable";
import type { TlbiRequest } from "../mmu/tlbi";
import type { RegName } from "../thread/registers";
import type {
  Barrier,
  BarrierKind,
  Deps,
  MemReadRequest,
  MemWriteRequest,
  Sem,
  TranslationResult,
  TranslationStarted,
} from "./types";

// ─────────────────────────────────────────────────────────────────
// Dependencies
// ─────────────────────────────────────────────────────────────────

export const IMPLICIT: Deps = { tag: "ImplicitAll" };

export const NO_DEPS: Deps = { tag: "Explicit", regs: [], reads: [] };

export function explicit(regs: readonly RegName[] = [], reads: readonly number[] = []): Deps {
  return { tag: "Explicit", regs, reads };
}

// ─────────────────────────────────────────────────────────────────
// Effects
// ─────────────────────────────────────────────────────────────────

const RET: Sem = { op: "Ret" };

export function ret(): Sem {
  return RET;
}

export function regRead(reg: RegName, next: (value: bigint) => Sem): Sem {
  return { op: "RegRead", reg, next };
}

export function regWrite(reg: RegName, value: bigint, deps: Deps, next: () => Sem = ret): Sem {
  return { op: "RegWrite", reg, value, deps, next };
}

export function memRead(
  req: Partial<MemReadRequest> & Pick<MemReadRequest, "pa">,
  next: (value: bigint) => Sem
): Sem {
  return {
    op: "MemRead",
    req: { size: 8, kind: "plain", exclusive: false, deps: NO_DEPS, ...req },
    next,
  };
}

export function memWrite(
  req: Partial<MemWriteRequest> & Pick<MemWriteRequest, "pa" | "value">,
  next: (success: boolean) => Sem = ret
): Sem {
  return {
    op: "MemWrite",
    req: { size: 8, kind: "plain", exclusive: false, addrDeps: NO_DEPS, dataDeps: NO_DEPS, ...req },
    next,
  };
}

export function barrier(b: Barrier, next: () => Sem = ret): Sem {
  return { op: "Barrier", barrier: b, next };
}

export function dmb(kind: BarrierKind = "SY", next: () => Sem = ret): Sem {
  return barrier({ tag: "Dmb", kind, domain: "ISH" }, next);
}

export function dsb(kind: BarrierKind = "SY", next: () => Sem = ret): Sem {
  return barrier({ tag: "Dsb", kind, domain: "ISH" }, next);
}

export function isb(next: () => Sem = ret): Sem {
  return barrier({ tag: "Isb" }, next);
}

export function tlbi(req: TlbiRequest, deps: Deps = NO_DEPS, next: () => Sem = ret): Sem {
  return { op: "Tlbi", req, deps, next };
}

export function branchAnnounce(target: bigint, deps: Deps, next: () => Sem = ret): Sem {
  return { op: "BranchAnnounce", target, deps, next };
}

export function translationStart(va: bigint, next: (started: TranslationStarted) => Sem): Sem {
  return { op: "TranslationStart", va, next };
}

export function translationEnd(va: bigint, next: () => Sem = ret): Sem {
  return { op: "TranslationEnd", va, next };
}

export function exceptionReturn(next: () => Sem = ret): Sem {
  return { op: "ExceptionReturn", next };
}

export function halt(next: () => Sem = ret): Sem {
  return { op: "Halt", next };
}

export function choose(bits: number, next: (value: bigint) => Sem): Sem {
  return { op: "Choose", bits, next };
}

export function discard(): Sem {
  return { op: "Discard" };
}

// ─────────────────────────────────────────────────────────────────
// Instruction shapes
// ─────────────────────────────────────────────────────────────────

/**
 * Full stage-1 translation of `va`: start, one table-walk read per level,
 * end. `next` receives where the walk landed.
 */
export function translate(va: bigint, next: (result: TranslationResult) => Sem): Sem {
  const step = (level: number, table: bigint): Sem =>
    memRead({ pa: descriptorAddress(level, table, va), kind: "ttw", va }, (descriptor) => {
      const d = decode(level, va, descriptor);
      if (d.tag === "Table") return step(level + 1, d.table);
      const result: TranslationResult =
        d.tag === "Mapped" ? { tag: "Mapped", pa: d.pa, level: d.level } : { tag: "Fault", level: d.level };
      return translationEnd(va, () => next(result));
    });
  return translationStart(va, ({ tableBase }) => step(0, tableBase));
}

/** `mov dst, #value` */
export function movImm(dst: RegName, value: bigint): Sem {
  return regWrite(dst, value, NO_DEPS);
}

export type LoadOptions = { kind?: "plain" | "acquire" | "acquirePC"; exclusive?: boolean };

/** `ldr dst, [addr]` on a physical address held in `addr`. */
export function load(dst: RegName, addr: RegName, opts: LoadOptions = {}): Sem {
  return regRead(addr, (pa) =>
    memRead({ pa, kind: opts.kind ?? "plain", exclusive: opts.exclusive ?? false, deps: explicit([addr]) }, (value) =>
      regWrite(dst, value, explicit([], [0]))
    )
  );
}

export type StoreOptions = { kind?: "plain" | "release" };

/** `str src, [addr]` */
export function store(src: RegName, addr: RegName, opts: StoreOptions = {}): Sem {
  return regRead(addr, (pa) =>
    regRead(src, (value) =>
      memWrite({ pa, value, kind: opts.kind ?? "plain", addrDeps: explicit([addr]), dataDeps: explicit([src]) })
    )
  );
}

/** `stxr status, src, [addr]`: status is 0 on success, 1 on failure. */
export function storeExclusive(status: RegName, src: RegName, addr: RegName, opts: StoreOptions = {}): Sem {
  return regRead(addr, (pa) =>
    regRead(src, (value) =>
      memWrite(
        { pa, value, kind: opts.kind ?? "plain", exclusive: true, addrDeps: explicit([addr]), dataDeps: explicit([src]) },
        (ok) => regWrite(status, ok ? 0n : 1n, NO_DEPS)
      )
    )
  );
}

/** `ldr dst, [va]` through the MMU. A faulting walk discards the path. */
export function loadVirtual(dst: RegName, addr: RegName): Sem {
  return regRead(addr, (va) =>
    translate(va, (r) =>
      r.tag === "Fault"
        ? discard()
        : memRead({ pa: r.pa, deps: explicit([addr]) }, (value) => regWrite(dst, value, explicit([], [r.level + 1])))
    )
  );
}

/** Conditional branch on `reg`. Only the announce is modelled. */
export function branchOn(reg: RegName, target: bigint): Sem {
  return regRead(reg, () => branchAnnounce(target, explicit([reg])));
}
