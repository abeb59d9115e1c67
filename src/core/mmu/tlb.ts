// src/core/mmu/tlb.ts
// Per-thread translation cache. Each context maps to a *set* of descriptor
// vectors: a thread may still observe several not-yet-invalidated walks.

import { MAX_LEVEL, checkLevel, type TlbContext } from "./pagetable";
import { affects, type TlbiDescriptor } from "./tlbi";

/** Descriptor values read by a walk, from level 0 down to its leaf. */
export type TlbEntry = readonly bigint[];

type Slot = Readonly<{ ctx: TlbContext; entries: ReadonlyMap<string, TlbEntry> }>;
type LevelMap = ReadonlyMap<string, Slot>;

function contextKey(ctx: TlbContext): string {
  return `${ctx.vaPrefix.toString(16)}/${ctx.asid === undefined ? "*" : ctx.asid.toString(16)}`;
}

function entryKey(entry: TlbEntry): string {
  return entry.map((d) => d.toString(16)).join(",");
}

export class TranslationCache {
  private constructor(private readonly levels: readonly LevelMap[]) {}

  static empty(): TranslationCache {
    const levels: LevelMap[] = [];
    for (let level = 0; level <= MAX_LEVEL; level++) levels.push(new Map());
    return new TranslationCache(levels);
  }

  private level(level: number): LevelMap {
    return this.levels[checkLevel(level)];
  }

  get(ctx: TlbContext): TlbEntry[] {
    const slot = this.level(ctx.level).get(contextKey(ctx));
    return slot ? Array.from(slot.entries.values()) : [];
  }

  /** Level-wise, context-wise set union. */
  union(other: TranslationCache): TranslationCache {
    const levels = this.levels.map((mine, i) => {
      const merged = new Map(mine);
      for (const [key, slot] of other.levels[i]) {
        const existing = merged.get(key);
        merged.set(key, existing ? { ctx: existing.ctx, entries: new Map([...existing.entries, ...slot.entries]) } : slot);
      }
      return merged;
    });
    return new TranslationCache(levels);
  }

  add(ctx: TlbContext, entry: TlbEntry): TranslationCache {
    const level = checkLevel(ctx.level);
    const single = TranslationCache.empty().levels.map((m, i) =>
      i === level ? new Map([[contextKey(ctx), { ctx, entries: new Map([[entryKey(entry), entry]]) }]]) : m
    );
    return this.union(new TranslationCache(single));
  }

  /** Drop every context the maintenance affects. */
  invalidate(tlbi: TlbiDescriptor): TranslationCache {
    return new TranslationCache(
      this.levels.map((m) => new Map(Array.from(m).filter(([, slot]) => !affects(tlbi, slot.ctx))))
    );
  }

  size(): number {
    let n = 0;
    for (const m of this.levels) for (const slot of m.values()) n += slot.entries.size;
    return n;
  }

  /** Stable plain description, for digests. */
  describe(): string[] {
    const out: string[] = [];
    this.levels.forEach((m, level) => {
      for (const [key, slot] of m) {
        for (const k of slot.entries.keys()) out.push(`${level}:${key}:${k}`);
      }
    });
    return out.sort();
  }
}
