// src/core/view/view.ts
// Logical timestamps ordered by <=, joined by max.

/**
 * A View is a memory timestamp: "happened no earlier than every event up to
 * this one". 0 is the initial memory.
 */
export type View = number;

export const VIEW_ZERO: View = 0;

export function join(a: View, b: View): View {
  return Math.max(a, b);
}

export function meet(a: View, b: View): View {
  return Math.min(a, b);
}

export function joinAll(views: Iterable<View>): View {
  let acc = VIEW_ZERO;
  for (const v of views) acc = join(acc, v);
  return acc;
}
