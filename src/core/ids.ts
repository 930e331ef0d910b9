import { ulid } from "ulid";
import { createHash } from "crypto";

export type BatchId = `batch_${string}`;

export function newBatchId(): BatchId {
  return `batch_${ulid()}` as const;
}

export function sha256Prefixed(data: string | Buffer): `sha256:${string}` {
  return `sha256:${createHash("sha256").update(data).digest("hex")}` as const;
}
