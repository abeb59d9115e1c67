import type { Choice, Discard, Done, Fail, Outcome } from "./outcome";
import { isDone, isFail } from "./outcome";
import { ModelError } from "./errors";
import { fail } from "./constructors";

export function match<A, R>(
  outcome: Outcome<A>,
  handlers: {
    done: (d: Done<A>) => R;
    fail: (f: Fail) => R;
    discard: (d: Discard) => R;
    choice: (c: Choice<A>) => R;
  }
): R {
  switch (outcome.tag) {
    case "Done":
      return handlers.done(outcome);
    case "Fail":
      return handlers.fail(outcome);
    case "Discard":
      return handlers.discard(outcome);
    case "Choice":
      return handlers.choice(outcome);
  }
}

/** Map over every successful leaf, including those behind choice points. */
export function mapOutcome<A, B>(o: Outcome<A>, fn: (a: A) => B): Outcome<B> {
  switch (o.tag) {
    case "Done":
      return { tag: "Done", value: fn(o.value) };
    case "Choice":
      return { tag: "Choice", space: o.space, resume: (pick) => mapOutcome(o.resume(pick), fn) };
    default:
      return o;
  }
}

export function flatMapOutcome<A, B>(o: Outcome<A>, fn: (a: A) => Outcome<B>): Outcome<B> {
  switch (o.tag) {
    case "Done":
      return fn(o.value);
    case "Choice":
      return { tag: "Choice", space: o.space, resume: (pick) => flatMapOutcome(o.resume(pick), fn) };
    default:
      return o;
  }
}

/**
 * Run `body`, turning a thrown ModelError into a Fail outcome, both now and
 * when a choice point it returned is later resumed.
 */
export function guard<A>(body: () => Outcome<A>): Outcome<A> {
  let o: Outcome<A>;
  try {
    o = body();
  } catch (e) {
    if (e instanceof ModelError) return fail(e.toFailure());
    throw e;
  }
  if (o.tag !== "Choice") return o;
  const resume = o.resume;
  return { tag: "Choice", space: o.space, resume: (pick) => guard(() => resume(pick)) };
}

export function unwrap<A>(o: Outcome<A>): A {
  if (isDone(o)) {
    return o.value;
  }
  if (isFail(o)) {
    throw new Error(o.failure.message);
  }
  if (o.tag === "Discard") {
    throw new Error(`Cannot unwrap discarded outcome (${o.reason})`);
  }
  throw new Error("Cannot unwrap unresolved choice");
}
