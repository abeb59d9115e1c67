// src/index.ts
// promising-vmsa - Public API
//
// Promising-semantics execution engine with stage-1 translation, and a
// bounded explorer for litmus programs built on it.

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export type { Outcome, Done, Fail, Discard, DiscardReason, Choice, ChoiceSpace } from "./outcome/outcome";
export { isDone, isFail, isDiscard, isChoice } from "./outcome/outcome";
export type { Failure, FailureReason } from "./outcome/failure";
export { allDiagnostics } from "./outcome/failure";
export type { Diagnostic, DiagnosticSeverity } from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";
export { ModelError, ModelFailureError } from "./outcome/errors";
export { match, mapOutcome, flatMapOutcome, unwrap } from "./outcome/matchers";

// ═══════════════════════════════════════════════════════════════════════════════
// MODEL STATE
// ═══════════════════════════════════════════════════════════════════════════════

export { VIEW_ZERO, join, meet, joinAll, type View } from "./core/view/view";
export type { Event, Location, ThreadId } from "./core/memory/event";
export { Memory, type Timestamp, type ReadResult } from "./core/memory/memory";
export { imageFromCells, readCell, type ByteImage } from "./core/memory/bytes";
export {
  initThreadState,
  hasNoPromises,
  plainRegs,
  type ThreadState,
  type ViewCounter,
} from "./core/thread/threadState";
export { SYSTEM_REGISTERS, isSystemRegister, type RegName } from "./core/thread/registers";

// ═══════════════════════════════════════════════════════════════════════════════
// MMU
// ═══════════════════════════════════════════════════════════════════════════════

export { walk, contextFor, type TlbContext, type WalkResult } from "./core/mmu/pagetable";
export { TranslationCache, type TlbEntry } from "./core/mmu/tlb";
export { toDescriptor, affects, type TlbiDescriptor, type TlbiRequest } from "./core/mmu/tlbi";

// ═══════════════════════════════════════════════════════════════════════════════
// EFFECTS & INTERPRETER
// ═══════════════════════════════════════════════════════════════════════════════

export type { Sem, Effect, Deps, Barrier, TranslationResult } from "./core/effects/types";
export * as sem from "./core/effects/builder";
export { iisInit, type IIS } from "./core/interp/iis";
export { runEffect, promiseWrite, type Ctx, type Stepped } from "./core/interp/interpreter";
export { runInstruction, type InstructionResult } from "./core/interp/instruction";

// ═══════════════════════════════════════════════════════════════════════════════
// EXPLORATION & CONFIG
// ═══════════════════════════════════════════════════════════════════════════════

export { explore } from "./core/explore/runner";
export {
  ExplorationBudgetExceeded,
  type ExploreOptions,
  type ExploreResult,
  type FinalState,
  type LitmusProgram,
  type ThreadProgram,
} from "./core/explore/types";
export * from "./core/config";
