// src/core/interp/instruction.ts
// Drive one instruction's effect tree to completion with fresh scratch state.

import { done } from "../../outcome/constructors";
import { flatMapOutcome } from "../../outcome/matchers";
import type { Outcome } from "../../outcome/outcome";
import type { Sem } from "../effects/types";
import type { Memory } from "../memory/memory";
import type { ThreadState } from "../thread/threadState";
import { iisInit } from "./iis";
import { runEffect, type Ctx } from "./interpreter";

export type InstructionResult = Readonly<{ ts: ThreadState; mem: Memory }>;

/**
 * Every path through the instruction: deterministic effects run inline,
 * choice points are handed back to the caller unresolved.
 */
export function runInstruction(sem: Sem, ts: ThreadState, mem: Memory): Outcome<InstructionResult> {
  return continueFrom({ iis: iisInit(), ts, mem }, sem);
}

function continueFrom(start: Ctx, sem: Sem): Outcome<InstructionResult> {
  let ctx = start;
  let current = sem;
  for (;;) {
    if (current.op === "Ret") return done({ ts: ctx.ts, mem: ctx.mem });
    const o = runEffect(current, ctx);
    if (o.tag !== "Done") return flatMapOutcome(o, (s) => continueFrom(s.ctx, s.next));
    ctx = o.value.ctx;
    current = o.value.next;
  }
}
