import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";
import type { FailureReason } from "./failure";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: "Unsupported" | "Structure" | "Exploration";
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0100: { code: "E0100", severity: "error", category: "Unsupported", template: "Unsupported effect: {effect}" },
  E0101: { code: "E0101", severity: "error", category: "Unsupported", template: "Atomic read-modify-write unsupported" },
  E0102: { code: "E0102", severity: "error", category: "Unsupported", template: "Non-shareable barrier unsupported: {barrier}" },
  E0103: { code: "E0103", severity: "error", category: "Unsupported", template: "TLB maintenance unsupported: {regime} {shareability}" },
  E0104: { code: "E0104", severity: "error", category: "Unsupported", template: "Access size {size} unsupported for {kind} access" },
  E0105: { code: "E0105", severity: "error", category: "Unsupported", template: "Indirect register access unsupported: {reg}" },

  E0201: { code: "E0201", severity: "error", category: "Structure", template: "Misaligned address: {pa}" },
  E0202: { code: "E0202", severity: "error", category: "Structure", template: "Unknown register: {reg}" },
  E0203: { code: "E0203", severity: "error", category: "Structure", template: "Physical address outside translation scheme: {pa}" },
  E0204: { code: "E0204", severity: "error", category: "Structure", template: "Memory read index out of range: {index}" },
  E0205: { code: "E0205", severity: "error", category: "Structure", template: "Translation read without virtual address at {pa}" },
  E0206: { code: "E0206", severity: "error", category: "Structure", template: "No translation in progress for {va}" },
  E0207: { code: "E0207", severity: "error", category: "Structure", template: "Translation read at {pa} does not follow the walk" },
  E0208: { code: "E0208", severity: "error", category: "Structure", template: "Translation for {va} ended with {count} unread descriptors" },
  E0209: { code: "E0209", severity: "error", category: "Structure", template: "Choice {pick} outside its space" },
  E0210: { code: "E0210", severity: "error", category: "Structure", template: "Invalid translation level: {level}" },
  E0211: { code: "E0211", severity: "error", category: "Structure", template: "Promise on a truncated memory view" },
  E0212: { code: "E0212", severity: "error", category: "Structure", template: "TLB maintenance by {scope} requires {field}" },

  W0001: { code: "W0001", severity: "warning", category: "Exploration", template: "Thread {tid} finished with {count} pending promises" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number | bigint>
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, typeof value === "bigint" ? `0x${value.toString(16)}` : String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    data: params,
  };
}

/** Failure reason implied by a code's category. */
export function reasonFor(code: DiagnosticCode): FailureReason {
  switch (DIAGNOSTIC_CODES[code].category) {
    case "Unsupported":
      return "unsupported";
    case "Structure":
      return "malformed";
    case "Exploration":
      return "invariant-violated";
  }
}
