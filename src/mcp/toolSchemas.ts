import * as z from "zod/v4";

const ulid26 = "[0-9A-HJKMNP-TV-Z]{26}";

export const zBatchId = z.string().regex(new RegExp(`^batch_${ulid26}$`), "invalid batch_id");

export const zJobStateName = z.enum([
  "pending",
  "uploading",
  "launching",
  "running",
  "downloading",
  "completed",
  "failed",
  "timed_out",
  "cancelled"
]);

export const zAttempts = z.object({
  upload: z.number().int(),
  launch: z.number().int(),
  poll: z.number().int(),
  download: z.number().int()
});

export const zJobRow = z.object({
  sample_id: z.string(),
  state: zJobStateName,
  error: z.string().nullable(),
  analysis_id: z.string().nullable(),
  output_path: z.string().nullable(),
  attempts: zAttempts
});

export const zManifestValidateInput = z.object({
  manifest_text: z.string().min(1).max(1048576)
});

export const zManifestValidateOutput = z.object({
  ok: z.boolean(),
  kind: z.string().nullable(),
  samples: z.array(z.string()),
  issues: z.array(z.string())
});

export const zBatchStartInput = z.object({
  manifest_text: z.string().min(1).max(1048576),
  max_concurrent_jobs: z.number().int().min(1).max(64).optional()
});

export const zBatchStartOutput = z.object({
  batch_id: zBatchId,
  jobs: z.number().int(),
  max_concurrent_jobs: z.number().int(),
  platform: z.string()
});

export const zBatchGetInput = z.object({
  batch_id: zBatchId
});

export const zBatchGetOutput = z.object({
  batch_id: zBatchId,
  status: z.enum(["running", "finished"]),
  source: z.enum(["live", "store"]),
  ok: z.boolean().nullable(),
  started_at: z.string(),
  finished_at: z.string().nullable(),
  states: z.record(z.string(), z.number().int()),
  jobs: z.array(zJobRow)
});

export const zBatchCancelInput = z.object({
  batch_id: zBatchId
});

export const zBatchCancelOutput = z.object({
  batch_id: zBatchId,
  cancelled: z.boolean()
});

export const zBatchListInput = z.object({
  limit: z.number().int().min(1).max(200).default(20)
});

export const zBatchListOutput = z.object({
  batches: z.array(
    z.object({
      batch_id: z.string(),
      platform: z.string(),
      started_at: z.string(),
      finished_at: z.string(),
      total: z.number().int(),
      ok: z.boolean()
    })
  )
});
