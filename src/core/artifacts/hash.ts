// src/core/artifacts/hash.ts
// Digests of explored states and final outcomes, used as dedup keys.

import { createHash } from "node:crypto";

export type Hash = string;

/** Bigints are written as tagged hex so they never collide with strings. */
function encodeBigints(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? { __bigint__: value.toString(16) } : value;
}

/** SHA-256 of the JSON encoding; callers keep key order stable. */
export function sha256JSON(x: unknown): Hash {
  return createHash("sha256").update(JSON.stringify(x, encodeBigints), "utf8").digest("hex");
}
