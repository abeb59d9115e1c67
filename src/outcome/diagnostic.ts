// src/outcome/diagnostic.ts
// Structured diagnostics attached to failures and warnings.

export type DiagnosticSeverity = "error" | "warning";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  /** Template parameters the message was filled from. */
  data?: Record<string, unknown>;
}
