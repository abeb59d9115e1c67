import { describe, it, expect } from "vitest";
import { isSystemRegister, ttbrAsid, ttbrBase } from "../../../src/core/thread/registers";
import {
  clearXclb,
  cohOf,
  contextSync,
  hasNoPromises,
  initThreadState,
  plainRegs,
  pushPromise,
  readReg,
  readSregAll,
  readSregCurrent,
  readSregLast,
  recordTlbi,
  regView,
  removePromise,
  setCoh,
  setFwd,
  setReg,
  setXclb,
  update,
  writeSreg,
} from "../../../src/core/thread/threadState";

const TTBR = "TTBR0_EL1";
const X = 0x100n;

const fresh = () =>
  initThreadState(
    0,
    new Map([
      ["X0", 5n],
      [TTBR, 0x1000n],
    ])
  );

describe("registers", () => {
  it("classifies system registers", () => {
    expect(isSystemRegister(TTBR)).toBe(true);
    expect(isSystemRegister("SCTLR_EL1")).toBe(true);
    expect(isSystemRegister("X0")).toBe(false);
  });

  it("splits a TTBR into table base and ASID", () => {
    expect(ttbrBase(0x0005_0000_0008_1001n)).toBe(0x8_1000n);
    expect(ttbrAsid(0x0005_0000_0008_1001n)).toBe(5n);
  });
});

describe("ThreadState", () => {
  it("reads untouched registers from the initial snapshot", () => {
    expect(readReg(fresh(), "X0")).toEqual({ value: 5n, view: 0 });
  });

  it("fails on registers it has never heard of", () => {
    expect(() => readReg(fresh(), "X7")).toThrow("Unknown register: X7");
  });

  it("setReg records value and view without touching the original", () => {
    const ts = fresh();
    const next = setReg(ts, "X0", 9n, 3);
    expect(readReg(next, "X0")).toEqual({ value: 9n, view: 3 });
    expect(readReg(ts, "X0")).toEqual({ value: 5n, view: 0 });
  });

  it("update only raises counters", () => {
    const raised = update(fresh(), "vrd", 4);
    expect(raised.views.vrd).toBe(4);
    expect(update(raised, "vrd", 2)).toBe(raised);
    expect(update(raised, "vwr", 1).views).toMatchObject({ vrd: 4, vwr: 1 });
  });

  it("coherence views join", () => {
    const ts = setCoh(setCoh(fresh(), X, 5), X, 3);
    expect(cohOf(ts, X)).toBe(5);
    expect(cohOf(ts, 0x108n)).toBe(0);
  });

  it("tracks promises in order", () => {
    const ts = removePromise(pushPromise(pushPromise(fresh(), 3), 5), 3);
    expect(ts.promises).toEqual([5]);
    expect(hasNoPromises(ts)).toBe(false);
    expect(hasNoPromises(removePromise(ts, 5))).toBe(true);
  });

  it("sets and clears the exclusive marker", () => {
    const ts = setXclb(fresh(), { loc: X, time: 2, view: 4 });
    expect(ts.xclb).toEqual({ loc: X, time: 2, view: 4 });
    expect(clearXclb(ts).xclb).toBeUndefined();
  });

  it("keeps one forwarding entry per location", () => {
    const ts = setFwd(setFwd(fresh(), X, { time: 1, view: 0, exclusive: false }), X, {
      time: 3,
      view: 2,
      exclusive: true,
    });
    expect(ts.fwdb.get(X)).toEqual({ time: 3, view: 2, exclusive: true });
  });

  describe("system registers", () => {
    const written = () => writeSreg(writeSreg(fresh(), TTBR, 0x2000n, 2), TTBR, 0x3000n, 4);

    it("appends to the history and raises vmsr", () => {
      const ts = written();
      expect(ts.sregs).toEqual([
        { reg: TTBR, value: 0x2000n, view: 2 },
        { reg: TTBR, value: 0x3000n, view: 4 },
      ]);
      expect(ts.views.vmsr).toBe(4);
    });

    it("readSregLast only sees positions before s", () => {
      const ts = written();
      expect(readSregLast(ts, TTBR, 0)).toEqual({ value: 0x1000n, view: 0 });
      expect(readSregLast(ts, TTBR, 1)).toEqual({ value: 0x2000n, view: 2 });
      expect(readSregCurrent(ts, TTBR)).toEqual({ value: 0x3000n, view: 4 });
      expect(regView(ts, TTBR)).toBe(4);
    });

    it("readSregAll adds every later write", () => {
      const ts = written();
      expect(readSregAll(ts, TTBR, 0)).toEqual([
        { value: 0x1000n, view: 0 },
        { value: 0x2000n, view: 2 },
        { value: 0x3000n, view: 4 },
      ]);
      expect(readSregAll(ts, TTBR, 1)).toEqual([
        { value: 0x2000n, view: 2 },
        { value: 0x3000n, view: 4 },
      ]);
      expect(readSregAll(ts, TTBR, 2)).toEqual([{ value: 0x3000n, view: 4 }]);
    });

    it("contextSync moves the cursor and raises vcse", () => {
      const ts = contextSync(update(update(written(), "vspec", 3), "vdsb", 1));
      expect(ts.sregCursor).toBe(2);
      expect(ts.views.vcse).toBe(4);
    });

    it("recordTlbi remembers the cursor in force", () => {
      const ts = recordTlbi(contextSync(written()), 7);
      expect(ts.tlbiCursors.get(7)).toBe(2);
    });
  });

  it("plainRegs strips views and overlays every write", () => {
    const ts = writeSreg(setReg(fresh(), "X1", 9n, 3), TTBR, 0x3000n, 1);
    expect(Object.fromEntries(plainRegs(ts))).toEqual({ X0: 5n, X1: 9n, [TTBR]: 0x3000n });
  });
});
