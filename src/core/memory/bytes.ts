// src/core/memory/bytes.ts
// Flat byte images. Cells are composed little-endian from 8 bytes.

/** Byte address -> byte value. Missing bytes read as 0. */
export type ByteImage = ReadonlyMap<bigint, number>;

const CELL_BYTES = 8n;

export function readCell(image: ByteImage, loc: bigint): bigint {
  let value = 0n;
  for (let i = CELL_BYTES - 1n; i >= 0n; i--) {
    value = (value << 8n) | BigInt(image.get(loc + i) ?? 0);
  }
  return value;
}

export function writeCell(image: Map<bigint, number>, loc: bigint, value: bigint): void {
  let v = BigInt.asUintN(64, value);
  for (let i = 0n; i < CELL_BYTES; i++) {
    image.set(loc + i, Number(v & 0xffn));
    v >>= 8n;
  }
}

export function imageFromCells(cells: Iterable<readonly [bigint, bigint]>): ByteImage {
  const image = new Map<bigint, number>();
  for (const [loc, value] of cells) writeCell(image, loc, value);
  return image;
}
