// src/core/mmu/pagetable.ts
// Stage-1 translation table walk: 4 KiB granule, 48-bit VA, levels 0..3.
// One loop over a runtime level index replaces a per-level walk definition.

import { ModelError } from "../../outcome/errors";

export type Level = number;

export const MAX_LEVEL: Level = 3;

const PA_BITS = 48n;
const PA_LIMIT = 1n << PA_BITS;
const VA_MASK = PA_LIMIT - 1n;
/** Output address bits [47:12] of a descriptor. */
const OA_MASK = VA_MASK & ~0xfffn;
const NON_GLOBAL = 1n << 11n;

export type WalkStep = Readonly<{ level: Level; pa: bigint; descriptor: bigint }>;

export type WalkOutcome =
  | { tag: "Mapped"; pa: bigint; level: Level; global: boolean }
  | { tag: "Fault"; level: Level };

export type WalkResult = Readonly<{ steps: readonly WalkStep[]; outcome: WalkOutcome }>;

/**
 * A TLB context: the VA bits that select an entry at `level`, and the ASID
 * for non-global entries.
 */
export type TlbContext = Readonly<{ level: Level; vaPrefix: bigint; asid?: bigint }>;

export function checkLevel(level: Level): Level {
  if (!Number.isInteger(level) || level < 0 || level > MAX_LEVEL) {
    throw new ModelError("E0210", { level });
  }
  return level;
}

/** Bit position of the lowest VA bit indexing the table at `level`. */
function indexShift(level: Level): bigint {
  return BigInt(12 + 9 * (MAX_LEVEL - checkLevel(level)));
}

export function tableIndex(level: Level, va: bigint): bigint {
  return ((va & VA_MASK) >> indexShift(level)) & 0x1ffn;
}

export function contextFor(level: Level, va: bigint, asid?: bigint): TlbContext {
  const vaPrefix = (va & VA_MASK) >> indexShift(level);
  return asid === undefined ? { level, vaPrefix } : { level, vaPrefix, asid };
}

/** Key identifying the 4 KiB page of a VA. */
export function pagePrefix(va: bigint): bigint {
  return (va & VA_MASK) >> 12n;
}

function checkPa(pa: bigint): bigint {
  if (pa < 0n || pa >= PA_LIMIT) throw new ModelError("E0203", { pa });
  return pa;
}

/** One decoded descriptor: descend into the next table, or finish the walk. */
export type Decoded = { tag: "Table"; table: bigint } | WalkOutcome;

/** Address of the descriptor for `va` in the table at `table`. */
export function descriptorAddress(level: Level, table: bigint, va: bigint): bigint {
  return checkPa((checkPa(table) & OA_MASK) + tableIndex(level, va) * 8n);
}

export function decode(level: Level, va: bigint, descriptor: bigint): Decoded {
  if ((descriptor & 1n) === 0n) return { tag: "Fault", level };
  const isTable = (descriptor & 2n) !== 0n;
  const global = (descriptor & NON_GLOBAL) === 0n;

  if (checkLevel(level) === MAX_LEVEL) {
    // Level 3 encodes pages with 0b11; 0b01 is reserved.
    if (!isTable) return { tag: "Fault", level };
    return { tag: "Mapped", pa: (descriptor & OA_MASK) | (va & 0xfffn), level, global };
  }
  if (isTable) return { tag: "Table", table: descriptor & OA_MASK };
  if (level === 0) return { tag: "Fault", level };
  const offsetMask = (1n << indexShift(level)) - 1n;
  return { tag: "Mapped", pa: (descriptor & OA_MASK & ~offsetMask) | (va & offsetMask), level, global };
}

/**
 * Walk the tables rooted at `tableBase` for `va`, reading each descriptor
 * through `readDescriptor`. Terminates after at most MAX_LEVEL + 1 reads.
 */
export function walk(va: bigint, tableBase: bigint, readDescriptor: (pa: bigint) => bigint): WalkResult {
  const steps: WalkStep[] = [];
  let table = tableBase;

  for (let level = 0; level <= MAX_LEVEL; level++) {
    const pa = descriptorAddress(level, table, va);
    const descriptor = readDescriptor(pa);
    steps.push({ level, pa, descriptor });

    const decoded = decode(level, va, descriptor);
    if (decoded.tag !== "Table") return { steps, outcome: decoded };
    table = decoded.table;
  }
  throw new Error("walk: level bound exceeded");
}

/** Re-run a walk whose descriptors were cached, in level order. */
export function replay(va: bigint, tableBase: bigint, descriptors: readonly bigint[]): WalkResult {
  let next = 0;
  return walk(va, tableBase, () => {
    const d = descriptors[next];
    next += 1;
    // A cached entry shorter than its walk behaves as an invalid descriptor.
    return d === undefined ? 0n : d;
  });
}

/** The TLB context a finished walk fills. Faulting walks fill nothing. */
export function leafContext(va: bigint, result: WalkResult, asid: bigint): TlbContext | undefined {
  if (result.outcome.tag !== "Mapped") return undefined;
  return contextFor(result.outcome.level, va, result.outcome.global ? undefined : asid);
}
