// src/core/explore/types.ts
// Litmus programs, exploration options and results.

import { DEFAULT_EXPLORATION_CONFIG } from "../config/config";
import type { Sem } from "../effects/types";
import type { ByteImage } from "../memory/bytes";
import type { Location } from "../memory/event";
import type { RegName } from "../thread/registers";

export type PromisableWrite = Readonly<{ loc: Location; value: bigint }>;

export type ThreadProgram = Readonly<{
  instructions: readonly Sem[];
  /** Initial value of every register the thread reads before writing. */
  regs?: Readonly<Record<RegName, bigint>>;
  /** Writes the thread may promise ahead of program order. */
  promisable?: readonly PromisableWrite[];
}>;

export type LitmusProgram = Readonly<{
  name?: string;
  /** Initial 8-byte cells; everything else reads as zero. */
  memory?: ReadonlyMap<Location, bigint>;
  threads: readonly ThreadProgram[];
}>;

export type FrontierKind = "dfs" | "bfs";

export type ExploreOptions = {
  frontier: FrontierKind;
  /** Maximum number of states ever pushed. */
  maxJobs: number;
  /** Maximum number of instructions run across all paths. */
  maxSteps: number;
  /** Widest `Choose` the explorer enumerates. */
  maxChooseBits: number;
  log?: (msg: string, data?: unknown) => void;
};

export const DEFAULT_EXPLORE_OPTIONS: ExploreOptions = { ...DEFAULT_EXPLORATION_CONFIG };

export type FinalState = Readonly<{
  memory: ByteImage;
  /** Plain register file per thread. */
  regs: readonly ReadonlyMap<RegName, bigint>[];
}>;

export type ExploreStats = {
  /** States pushed onto the frontier. */
  jobs: number;
  /** Instructions run. */
  steps: number;
  /** Paths pruned by the model. */
  discards: number;
  /** States skipped as already seen. */
  duplicates: number;
  /** Finished paths left with unfulfilled promises. */
  stuck: number;
};

export type ExploreResult = {
  finals: FinalState[];
  stats: ExploreStats;
};

export class ExplorationBudgetExceeded extends Error {
  constructor(
    public readonly kind: "maxJobs" | "maxSteps" | "maxChooseBits",
    public readonly limit: number
  ) {
    super(`ExplorationBudgetExceeded: ${kind} limit (${limit}) exceeded`);
    this.name = "ExplorationBudgetExceeded";
  }
}
