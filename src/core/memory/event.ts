// src/core/memory/event.ts
// Events stored in memory. Immutable once created.

import { ModelError } from "../../outcome/errors";
import { tlbiEquals, type TlbiDescriptor } from "../mmu/tlbi";

/** Physical address of an 8-byte cell. */
export type Location = bigint;

export type ThreadId = number;

export type WriteEvent = Readonly<{ tag: "Write"; tid: ThreadId; loc: Location; value: bigint }>;

export type TlbiEvent = Readonly<{ tag: "Tlbi"; tid: ThreadId; tlbi: TlbiDescriptor }>;

export type Event = WriteEvent | TlbiEvent;

export function eventEquals(a: Event, b: Event): boolean {
  if (a.tag === "Write") {
    return b.tag === "Write" && a.tid === b.tid && a.loc === b.loc && a.value === b.value;
  }
  return b.tag === "Tlbi" && a.tid === b.tid && tlbiEquals(a.tlbi, b.tlbi);
}

export function isWriteTo(e: Event | undefined, loc: Location): e is WriteEvent {
  return e !== undefined && e.tag === "Write" && e.loc === loc;
}

/** Only 8-byte aligned cells are addressable. */
export function checkLocation(pa: bigint): Location {
  if ((pa & 7n) !== 0n) throw new ModelError("E0201", { pa });
  return pa;
}
