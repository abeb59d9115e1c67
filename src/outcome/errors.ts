import { makeDiagnostic, reasonFor, type DiagnosticCode } from "./codes";
import { failure, type Failure } from "./failure";

/**
 * Thrown by the pure model helpers (memory, thread state, walks) on input
 * the model cannot represent. The interpreter turns it into a Fail outcome.
 */
export class ModelError extends Error {
  constructor(
    public readonly code: DiagnosticCode,
    public readonly params: Record<string, string | number | bigint> = {}
  ) {
    super(makeDiagnostic(code, params).message);
    this.name = "ModelError";
  }

  toFailure(): Failure {
    const diag = makeDiagnostic(this.code, this.params);
    return failure(reasonFor(this.code), diag.message, {
      diagnostics: [diag],
      context: { ...this.params },
    });
  }
}

/** A fatal outcome reached the exploration harness. */
export class ModelFailureError extends Error {
  constructor(public readonly failure: Failure) {
    super(failure.message);
    this.name = "ModelFailureError";
  }
}
