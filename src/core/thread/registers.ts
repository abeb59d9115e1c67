// src/core/thread/registers.ts
// Register names and the split between application and system registers.

export type RegName = string;

/** System registers whose writes go through the synchronization history. */
export const SYSTEM_REGISTERS: ReadonlySet<RegName> = new Set([
  "TTBR0_EL1",
  "TTBR1_EL1",
  "TCR_EL1",
  "MAIR_EL1",
  "SCTLR_EL1",
  "CONTEXTIDR_EL1",
  "VBAR_EL1",
  "ELR_EL1",
  "SPSR_EL1",
  "ESR_EL1",
  "FAR_EL1",
]);

export function isSystemRegister(reg: RegName): boolean {
  return SYSTEM_REGISTERS.has(reg);
}

/** Holds the table base and, in bits [63:48], the ASID. */
export const TTBR = "TTBR0_EL1";

const BADDR_MASK = 0x0000_ffff_ffff_fffen;

export function ttbrBase(ttbr: bigint): bigint {
  return ttbr & BADDR_MASK;
}

export function ttbrAsid(ttbr: bigint): bigint {
  return (ttbr >> 48n) & 0xffffn;
}
