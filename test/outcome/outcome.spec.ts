import { describe, it, expect } from "vitest";
import { isChoice, isDiscard, isDone, isFail, type Outcome } from "../../src/outcome/outcome";
import { allDiagnostics, failure, isFailureReason, wrapFailure } from "../../src/outcome/failure";
import { DIAGNOSTIC_CODES, makeDiagnostic, reasonFor } from "../../src/outcome/codes";
import { chooseAmong, chooseBits, discard, done, fail, failWith } from "../../src/outcome/constructors";
import { ModelError } from "../../src/outcome/errors";
import { flatMapOutcome, guard, mapOutcome, match, unwrap } from "../../src/outcome/matchers";

function resumeWith<A>(o: Outcome<A>, pick: bigint): Outcome<A> {
  if (!isChoice(o)) throw new Error(`expected a choice, got ${o.tag}`);
  return o.resume(pick);
}

describe("Outcome ADT", () => {
  it("constructs the four outcome kinds", () => {
    expect(done(1)).toEqual({ tag: "Done", value: 1 });
    expect(discard("write-order")).toEqual({ tag: "Discard", reason: "write-order" });
    expect(discard("exclusive-lost", "loc 0x100")).toEqual({
      tag: "Discard",
      reason: "exclusive-lost",
      detail: "loc 0x100",
    });
    const f = failure("unsupported", "nope");
    expect(fail(f)).toEqual({ tag: "Fail", failure: f });
    expect(isDone(done(0))).toBe(true);
    expect(isFail(fail(f))).toBe(true);
    expect(isDiscard(discard("no-candidate"))).toBe(true);
  });

  it("match dispatches on the tag", () => {
    const summarize = (o: Outcome<number>) =>
      match(o, {
        done: (d) => `done ${d.value}`,
        fail: (f) => `fail ${f.failure.reason}`,
        discard: (d) => `discard ${d.reason}`,
        choice: (c) => `choice ${c.space.tag}`,
      });
    expect(summarize(done(3))).toBe("done 3");
    expect(summarize(failWith("E0101"))).toBe("fail unsupported");
    expect(summarize(discard("tlbi-order"))).toBe("discard tlbi-order");
    expect(summarize(chooseBits(1, () => done(0)))).toBe("choice Bits");
  });
});

describe("choice points", () => {
  it("chooseAmong discards on no options and skips the choice for one", () => {
    expect(chooseAmong([], done)).toEqual({ tag: "Discard", reason: "no-candidate" });
    expect(chooseAmong(["only"], done)).toEqual({ tag: "Done", value: "only" });
  });

  it("chooseAmong resumes with the picked option", () => {
    const o = chooseAmong(["a", "b", "c"], done);
    expect(isChoice(o) && o.space).toEqual({ tag: "Options", count: 3 });
    expect(resumeWith(o, 1n)).toEqual({ tag: "Done", value: "b" });
    expect(resumeWith(o, 2n)).toEqual({ tag: "Done", value: "c" });
  });

  it("rejects picks outside the space", () => {
    const o = resumeWith(chooseAmong(["a", "b"], done), 2n);
    expect(isFail(o) && o.failure.message).toBe("Choice 0x2 outside its space");
    const bits = resumeWith(chooseBits(2, done), 4n);
    expect(isFail(bits) && bits.failure.reason).toBe("malformed");
  });

  it("chooseBits ranges over every value of the width", () => {
    const o = chooseBits(2, done);
    expect(isChoice(o) && o.space).toEqual({ tag: "Bits", bits: 2 });
    expect(resumeWith(o, 3n)).toEqual({ tag: "Done", value: 3n });
  });

  it("mapOutcome and flatMapOutcome reach leaves behind choices", () => {
    const o = chooseAmong([1, 2], done);
    expect(resumeWith(mapOutcome(o, (x) => x * 10), 1n)).toEqual({ tag: "Done", value: 20 });
    const chained = flatMapOutcome(o, (x) => (x === 1 ? discard("write-order") : done(x)));
    expect(resumeWith(chained, 0n)).toEqual({ tag: "Discard", reason: "write-order" });
    expect(resumeWith(chained, 1n)).toEqual({ tag: "Done", value: 2 });
  });
});

describe("guard", () => {
  it("turns a thrown ModelError into Fail", () => {
    const o = guard(() => {
      throw new ModelError("E0202", { reg: "X9" });
    });
    expect(isFail(o) && o.failure.message).toBe("Unknown register: X9");
    expect(isFail(o) && o.failure.reason).toBe("malformed");
  });

  it("guards resumptions of the choices it returns", () => {
    const o = guard(() =>
      chooseAmong([0x1000n, 0x1003n], (pa) => {
        if ((pa & 7n) !== 0n) throw new ModelError("E0201", { pa });
        return done(pa);
      })
    );
    expect(resumeWith(o, 0n)).toEqual({ tag: "Done", value: 0x1000n });
    const bad = resumeWith(o, 1n);
    expect(isFail(bad) && bad.failure.message).toBe("Misaligned address: 0x1003");
  });

  it("rethrows other errors", () => {
    expect(() =>
      guard(() => {
        throw new TypeError("boom");
      })
    ).toThrow("boom");
  });
});

describe("unwrap", () => {
  it("returns Done values and throws otherwise", () => {
    expect(unwrap(done(7))).toBe(7);
    expect(() => unwrap(discard("write-order"))).toThrow("Cannot unwrap discarded outcome (write-order)");
    expect(() => unwrap(failWith("E0101"))).toThrow("Atomic read-modify-write unsupported");
    expect(() => unwrap(chooseBits(1, done))).toThrow("Cannot unwrap unresolved choice");
  });
});

describe("failures and diagnostics", () => {
  it("fills message templates", () => {
    expect(makeDiagnostic("E0104", { size: 4, kind: "plain" })).toEqual({
      code: "E0104",
      severity: "error",
      message: "Access size 4 unsupported for plain access",
      data: { size: 4, kind: "plain" },
    });
    expect(makeDiagnostic("W0001", { tid: 1, count: 2 }).message).toBe("Thread 1 finished with 2 pending promises");
  });

  it("maps code categories to failure reasons", () => {
    expect(reasonFor("E0101")).toBe("unsupported");
    expect(reasonFor("E0210")).toBe("malformed");
    expect(reasonFor("W0001")).toBe("invariant-violated");
  });

  it("every code's key matches its code field", () => {
    for (const [key, def] of Object.entries(DIAGNOSTIC_CODES)) {
      expect(def.code).toBe(key);
    }
  });

  it("ModelError carries its diagnostic into the failure", () => {
    const f = new ModelError("E0103", { regime: "EL2", shareability: "ISH" }).toFailure();
    expect(f.reason).toBe("unsupported");
    expect(f.message).toBe("TLB maintenance unsupported: EL2 ISH");
    expect(f.diagnostics.map((d) => d.code)).toEqual(["E0103"]);
    expect(f.context).toEqual({ regime: "EL2", shareability: "ISH" });
    expect(f.recoverable).toBe(false);
  });

  it("wrapFailure keeps the cause and its diagnostics", () => {
    const inner = new ModelError("E0105", { reg: "X0" }).toFailure();
    const outer = wrapFailure(inner, "Thread 0 instruction 2", { tid: 0 });
    expect(outer.message).toBe("Thread 0 instruction 2");
    expect(outer.cause).toBe(inner);
    expect(outer.context).toEqual({ reg: "X0", tid: 0 });
    expect(isFailureReason(outer, "unsupported")).toBe(true);
    expect(allDiagnostics(outer).map((d) => d.code)).toEqual(["E0105"]);
  });
});
