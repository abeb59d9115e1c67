import type { Failure } from "./failure";

/**
 * Why a path was pruned. Discards are normal exploration results, not errors.
 */
export type DiscardReason =
  | "write-order"
  | "tlbi-order"
  | "exclusive-no-load"
  | "exclusive-lost"
  | "invalidated-translation"
  | "no-candidate"
  | "instruction-discard";

export interface Done<A> {
  readonly tag: "Done";
  readonly value: A;
}

export interface Fail {
  readonly tag: "Fail";
  readonly failure: Failure;
}

export interface Discard {
  readonly tag: "Discard";
  readonly reason: DiscardReason;
  readonly detail?: string;
}

/**
 * The set a nondeterministic pick ranges over.
 * Options: indices 0..count-1. Bits: every value of the given width.
 */
export type ChoiceSpace =
  | { tag: "Options"; count: number }
  | { tag: "Bits"; bits: number };

/**
 * A nondeterministic point. The caller picks a value from `space` and
 * continues with `resume`; resumption is multi-shot and pure.
 */
export interface Choice<A> {
  readonly tag: "Choice";
  readonly space: ChoiceSpace;
  readonly resume: (pick: bigint) => Outcome<A>;
}

export type Outcome<A> = Done<A> | Fail | Discard | Choice<A>;

export function isDone<A>(o: Outcome<A>): o is Done<A> {
  return o.tag === "Done";
}

export function isFail<A>(o: Outcome<A>): o is Fail {
  return o.tag === "Fail";
}

export function isDiscard<A>(o: Outcome<A>): o is Discard {
  return o.tag === "Discard";
}

export function isChoice<A>(o: Outcome<A>): o is Choice<A> {
  return o.tag === "Choice";
}
