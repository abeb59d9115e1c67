// src/core/explore/frontier.ts
// Pending exploration states, popped depth-first or breadth-first.

import type { FrontierKind } from "./types";

export interface Frontier<T> {
  push(item: T): void;
  pop(): T | undefined;
  size(): number;
}

/** Depth-first: the newest state is explored next. */
export class StackFrontier<T> implements Frontier<T> {
  private items: T[] = [];
  push(item: T) { this.items.push(item); }
  pop() { return this.items.pop(); }
  size() { return this.items.length; }
}

/** Breadth-first: states are explored in the order they were reached. */
export class QueueFrontier<T> implements Frontier<T> {
  private items: T[] = [];
  private head = 0;
  push(item: T) { this.items.push(item); }
  pop() {
    if (this.head >= this.items.length) return undefined;
    const item = this.items[this.head];
    this.head += 1;
    // drop the consumed prefix once it dominates
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return item;
  }
  size() { return this.items.length - this.head; }
}

export function makeFrontier<T>(kind: FrontierKind): Frontier<T> {
  return kind === "bfs" ? new QueueFrontier<T>() : new StackFrontier<T>();
}
