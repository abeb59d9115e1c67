// src/outcome/failure.ts
// Named fatal failures. A Fail outcome means the model cannot continue,
// never that an execution is architecturally illegal (that is a Discard).

import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  /** The effect is outside what the model covers. */
  | "unsupported"
  /** The effect stream or its inputs are structurally wrong. */
  | "malformed"
  | "invariant-violated";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  /** The failure this one wraps, innermost last. */
  cause?: Failure;
  recoverable: boolean;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts: Partial<Omit<Failure, "reason" | "message">> = {}
): Failure {
  const base: Failure = { reason, message, diagnostics: opts.diagnostics ?? [], recoverable: opts.recoverable ?? false };
  if (opts.context !== undefined) base.context = opts.context;
  if (opts.cause !== undefined) base.cause = opts.cause;
  return base;
}

/** Re-describe a failure with more context, keeping the original as cause. */
export function wrapFailure(inner: Failure, message: string, context: Record<string, unknown> = {}): Failure {
  return { ...inner, message, context: { ...inner.context, ...context }, cause: inner };
}

export function isFailureReason(f: Failure, reason: FailureReason): boolean {
  return f.reason === reason;
}

/** Diagnostics along the cause chain, each reported once. */
export function allDiagnostics(f: Failure): Diagnostic[] {
  const seen = new Set<Diagnostic>();
  const out: Diagnostic[] = [];
  for (let cur: Failure | undefined = f; cur !== undefined; cur = cur.cause) {
    for (const d of cur.diagnostics) {
      if (seen.has(d)) continue;
      seen.add(d);
      out.push(d);
    }
  }
  return out;
}
