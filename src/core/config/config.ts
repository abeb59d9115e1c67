// src/core/config/config.ts
// Configuration for exploration runs: defaults, environment, plain objects.

import type { ExploreOptions, FrontierKind } from "../explore/types";

// =========================================================================
// Configuration Types
// =========================================================================

export type ExplorationConfig = {
  /** Pending-state budget */
  maxJobs: number;
  /** Instruction budget across all paths */
  maxSteps: number;
  /** Frontier order: dfs or bfs */
  frontier: FrontierKind;
  /** Widest Choose enumerated */
  maxChooseBits: number;
};

export type TraceConfig = {
  /** Log exploration progress to the console */
  enabled: boolean;
};

export type PromisingConfig = {
  exploration: ExplorationConfig;
  trace: TraceConfig;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_EXPLORATION_CONFIG: ExplorationConfig = {
  maxJobs: 100_000,
  maxSteps: 1_000_000,
  frontier: "dfs",
  maxChooseBits: 2,
};

export const DEFAULT_TRACE_CONFIG: TraceConfig = {
  enabled: false,
};

export const DEFAULT_CONFIG: PromisingConfig = {
  exploration: DEFAULT_EXPLORATION_CONFIG,
  trace: DEFAULT_TRACE_CONFIG,
};

// =========================================================================
// Configuration Loading
// =========================================================================

function parseFrontier(value: unknown): FrontierKind | undefined {
  return value === "dfs" || value === "bfs" ? value : undefined;
}

function parseCount(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isInteger(value) ? value : undefined;
  if (typeof value !== "string" || !/^\d+$/.test(value.trim())) return undefined;
  return parseInt(value, 10);
}

function parseFlag(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  return undefined;
}

function record(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null ? Object.fromEntries(Object.entries(value)) : {};
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "PROMISING", env: NodeJS.ProcessEnv = process.env): PromisingConfig {
  return {
    exploration: {
      maxJobs: parseCount(env[`${prefix}_MAX_JOBS`]) ?? DEFAULT_EXPLORATION_CONFIG.maxJobs,
      maxSteps: parseCount(env[`${prefix}_MAX_STEPS`]) ?? DEFAULT_EXPLORATION_CONFIG.maxSteps,
      frontier: parseFrontier(env[`${prefix}_FRONTIER`]) ?? DEFAULT_EXPLORATION_CONFIG.frontier,
      maxChooseBits: parseCount(env[`${prefix}_MAX_CHOOSE_BITS`]) ?? DEFAULT_EXPLORATION_CONFIG.maxChooseBits,
    },
    trace: {
      enabled: parseFlag(env[`${prefix}_TRACE`]) ?? DEFAULT_TRACE_CONFIG.enabled,
    },
  };
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON).
 */
export function configFromObject(data: Record<string, unknown>): PromisingConfig {
  const exploration = record(data.exploration);
  const trace = record(data.trace);

  return {
    exploration: {
      maxJobs: parseCount(exploration.maxJobs ?? exploration.max_jobs) ?? DEFAULT_EXPLORATION_CONFIG.maxJobs,
      maxSteps: parseCount(exploration.maxSteps ?? exploration.max_steps) ?? DEFAULT_EXPLORATION_CONFIG.maxSteps,
      frontier: parseFrontier(exploration.frontier) ?? DEFAULT_EXPLORATION_CONFIG.frontier,
      maxChooseBits:
        parseCount(exploration.maxChooseBits ?? exploration.max_choose_bits) ?? DEFAULT_EXPLORATION_CONFIG.maxChooseBits,
    },
    trace: {
      enabled: parseFlag(trace.enabled) ?? DEFAULT_TRACE_CONFIG.enabled,
    },
  };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: Partial<PromisingConfig>[]): PromisingConfig {
  let result = { ...DEFAULT_CONFIG };

  for (const cfg of configs) {
    if (cfg.exploration) {
      result = { ...result, exploration: { ...result.exploration, ...cfg.exploration } };
    }
    if (cfg.trace) {
      result = { ...result, trace: { ...result.trace, ...cfg.trace } };
    }
  }

  return result;
}

/**
 * Explorer options for a configuration. Tracing logs through `log`.
 */
export function exploreOptionsFromConfig(
  config: PromisingConfig,
  log: (msg: string, data?: unknown) => void = console.log
): ExploreOptions {
  const opts: ExploreOptions = { ...config.exploration };
  return config.trace.enabled ? { ...opts, log } : opts;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: PromisingConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { maxJobs, maxSteps, maxChooseBits } = config.exploration;

  if (maxJobs < 1) {
    errors.push("maxJobs must be at least 1");
  }
  if (maxSteps < 1) {
    errors.push("maxSteps must be at least 1");
  }
  if (maxChooseBits > 16) {
    warnings.push(`maxChooseBits ${maxChooseBits} enumerates ${2 ** maxChooseBits} values per Choose`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
