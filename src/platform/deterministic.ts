import { createHash } from "crypto";

export function seedFrom(parts: string[]): Buffer {
  const h = createHash("sha256");
  for (const p of parts) h.update(p).update("|");
  return h.digest();
}

/** Stable value in [min, max) drawn from four bytes of the seed. */
export function floatBetween(seed: Buffer, offset: number, min: number, max: number): number {
  const idx = offset % Math.max(1, seed.byteLength - 4);
  const unit = seed.readUInt32BE(idx) / 0x100000000;
  return min + unit * (max - min);
}

export function shortHash(seed: Buffer, length = 12): string {
  return seed.toString("hex").slice(0, length);
}
