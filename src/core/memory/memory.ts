// src/core/memory/memory.ts
// Append-only event memory with the promise/fulfill protocol.

import { ModelError } from "../../outcome/errors";
import { readCell, writeCell, type ByteImage } from "./bytes";
import { checkLocation, eventEquals, isWriteTo, type Event, type Location, type ThreadId } from "./event";

export type Timestamp = number;

export type ReadResult = Readonly<{ value: bigint; time: Timestamp }>;

/**
 * Memory is a persistent value: the event at array index i has timestamp
 * i + 1, and timestamp 0 is the initial image. `cut` and `after` are views
 * over the same backing array that keep absolute timestamps.
 */
export class Memory {
  private constructor(
    public readonly initial: ByteImage,
    private readonly events: readonly Event[],
    /** Only timestamps in (lo, hi] are visible. */
    private readonly lo: Timestamp,
    private readonly hi: Timestamp
  ) {}

  static empty(initial: ByteImage = new Map()): Memory {
    return new Memory(initial, [], 0, 0);
  }

  /** Latest visible timestamp. */
  get length(): Timestamp {
    return this.hi;
  }

  at(t: Timestamp): Event | undefined {
    return t > this.lo && t <= this.hi ? this.events[t - 1] : undefined;
  }

  /** Visible events with their timestamps, oldest first. */
  *entries(): IterableIterator<[Timestamp, Event]> {
    for (let t = this.lo + 1; t <= this.hi; t++) yield [t, this.events[t - 1]];
  }

  /** Visible events, oldest first. */
  list(): Event[] {
    return Array.from(this.entries(), ([, e]) => e);
  }

  /** Only the events with timestamp <= v. */
  cut(v: Timestamp): Memory {
    return new Memory(this.initial, this.events, this.lo, Math.max(this.lo, Math.min(this.hi, v)));
  }

  /** Only the events with timestamp > v. */
  after(v: Timestamp): Memory {
    return new Memory(this.initial, this.events, Math.min(this.hi, Math.max(this.lo, v)), this.hi);
  }

  readInitial(loc: Location): bigint {
    return readCell(this.initial, checkLocation(loc));
  }

  /** Nearest write to `loc` scanning back from the newest event. */
  readLast(loc: Location): ReadResult {
    checkLocation(loc);
    for (let t = this.hi; t > this.lo; t--) {
      const e = this.events[t - 1];
      if (isWriteTo(e, loc)) return { value: e.value, time: t };
    }
    return { value: this.readInitial(loc), time: 0 };
  }

  readAt(loc: Location, v: Timestamp): ReadResult {
    return this.cut(v).readLast(loc);
  }

  /**
   * Every value a read of `loc` from view `v` may return: each later write,
   * then the coherent-before-v value as the last element. Never empty.
   */
  read(loc: Location, v: Timestamp): ReadResult[] {
    checkLocation(loc);
    const out: ReadResult[] = [];
    for (const [t, e] of this.after(v).entries()) {
      if (isWriteTo(e, loc)) out.push({ value: e.value, time: t });
    }
    out.push(this.readAt(loc, v));
    return out;
  }

  /** Append `event`; its timestamp is the new length. */
  promise(event: Event): [Memory, Timestamp] {
    if (this.lo !== 0 || this.hi !== this.events.length) throw new ModelError("E0211");
    const events = [...this.events, event];
    return [new Memory(this.initial, events, 0, events.length), events.length];
  }

  /**
   * The oldest of `promises` holding exactly `event`. Matching a newer one
   * would leave the older promise unfulfillable.
   */
  fulfill(event: Event, promises: readonly Timestamp[]): Timestamp | undefined {
    let best: Timestamp | undefined;
    for (const t of promises) {
      const e = this.at(t);
      if (e !== undefined && eventEquals(e, event) && (best === undefined || t < best)) best = t;
    }
    return best;
  }

  /**
   * Atomicity check for exclusive pairs: the event at `v` writes `loc`
   * (timestamp 0 stands for the initial write) and no thread other than
   * `tid` writes `loc` after it.
   */
  exclusive(loc: Location, tid: ThreadId, v: Timestamp): boolean {
    if (v !== 0 && !isWriteTo(this.at(v), loc)) return false;
    for (const [, e] of this.after(v).entries()) {
      if (isWriteTo(e, loc) && e.tid !== tid) return false;
    }
    return true;
  }

  /** Final byte image: every written cell at its last write. */
  snapshot(): ByteImage {
    const image = new Map(this.initial);
    const written = new Set<Location>();
    for (const [, e] of this.entries()) {
      if (e.tag === "Write") written.add(e.loc);
    }
    for (const loc of written) writeCell(image, loc, this.readLast(loc).value);
    return image;
  }
}
