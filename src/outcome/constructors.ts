import type { Choice, ChoiceSpace, Discard, DiscardReason, Done, Fail, Outcome } from "./outcome";
import type { Failure } from "./failure";
import type { DiagnosticCode } from "./codes";
import { ModelError } from "./errors";

export function done<A>(value: A): Done<A> {
  return { tag: "Done", value };
}

export function fail(f: Failure): Fail {
  return { tag: "Fail", failure: f };
}

export function discard(reason: DiscardReason, detail?: string): Discard {
  return detail === undefined ? { tag: "Discard", reason } : { tag: "Discard", reason, detail };
}

export function choice<A>(space: ChoiceSpace, resume: (pick: bigint) => Outcome<A>): Choice<A> {
  return { tag: "Choice", space, resume };
}

/** Fail with the failure described by a diagnostic code. */
export function failWith(code: DiagnosticCode, params?: Record<string, string | number | bigint>): Fail {
  return fail(new ModelError(code, params).toFailure());
}

/**
 * Pick one of finitely many options. A single option needs no choice point;
 * an empty list prunes the path.
 */
export function chooseAmong<T, A>(options: readonly T[], k: (option: T) => Outcome<A>): Outcome<A> {
  if (options.length === 0) return discard("no-candidate");
  if (options.length === 1) return k(options[0]);
  return choice({ tag: "Options", count: options.length }, (pick) => {
    const option = pick >= 0n && pick < BigInt(options.length) ? options[Number(pick)] : undefined;
    if (option === undefined) return failWith("E0209", { pick });
    return k(option);
  });
}

/** Pick any value of the given bit width. */
export function chooseBits<A>(bits: number, k: (value: bigint) => Outcome<A>): Outcome<A> {
  return choice({ tag: "Bits", bits }, (pick) => {
    if (pick < 0n || pick >= 1n << BigInt(bits)) return failWith("E0209", { pick });
    return k(pick);
  });
}
