import type { Kysely, Selectable } from "kysely";
import * as z from "zod/v4";
import { DIVERSION_STATES, FORWARD_STATES, jobFinishedAt, jobStartedAt } from "../core/job.js";
import type { BatchResult, JobDescriptor, JobState, JobTransition, Stage, TerminalState } from "../core/job.js";
import type { DB } from "../db/types.js";
import type { LogEvent } from "../logging/eventLog.js";

function toIso(value: Date | string): string {
  if (value instanceof Date) return value.toISOString();
  return new Date(value).toISOString();
}

function toIsoOrNull(value: Date | string | null): string | null {
  return value === null ? null : toIso(value);
}

const zJobState = z.enum([...FORWARD_STATES, ...DIVERSION_STATES]);
const zAttempts = z.object({ upload: z.number(), launch: z.number(), poll: z.number(), download: z.number() });
const zCounts = z.object({ completed: z.number(), failed: z.number(), timed_out: z.number(), cancelled: z.number() });
const zHistory = z.object({
  transitions: z.array(z.object({ state: zJobState, at: z.string(), detail: z.string().nullable() }))
});
const zStoredDescriptor = z.object({
  data_folder: z.string(),
  pipeline: z.string(),
  reference: z.string(),
  target_bed: z.string().nullable(),
  custom_params: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()]))
});

export interface BatchMeta {
  platform: string;
  manifestHash?: string | null;
  configHash?: string | null;
}

export interface StoredBatch {
  batchId: string;
  platform: string;
  manifestHash: string | null;
  configHash: string | null;
  startedAt: string;
  finishedAt: string;
  total: number;
  ok: boolean;
  counts: Record<TerminalState, number>;
}

export interface StoredJob {
  sampleId: string;
  position: number;
  state: JobState;
  error: string | null;
  dataRef: string | null;
  analysisId: string | null;
  outputPath: string | null;
  attempts: Record<Stage, number>;
  descriptor: JobDescriptor;
  transitions: JobTransition[];
  startedAt: string | null;
  finishedAt: string | null;
}

export interface StoredBatchDetail extends StoredBatch {
  jobs: StoredJob[];
}

export interface StoredEvent {
  ts: string;
  kind: string;
  message: string | null;
  data: Record<string, unknown> | null;
}

/** Batch history in Postgres: one row per batch, one per job, plus the batch's event log. */
export class PostgresStore {
  constructor(private readonly db: Kysely<DB>) {}

  async saveBatchResult(result: BatchResult, events: readonly LogEvent[], meta: BatchMeta): Promise<void> {
    await this.db
      .insertInto("batches")
      .values({
        batch_id: result.batchId,
        platform: meta.platform,
        manifest_hash: meta.manifestHash ?? null,
        config_hash: meta.configHash ?? null,
        started_at: result.startedAt,
        finished_at: result.finishedAt,
        total: result.records.length,
        ok: result.ok,
        counts: { ...result.counts }
      })
      .onConflict((oc) => oc.column("batch_id").doNothing())
      .execute();

    if (result.records.length) {
      await this.db
        .insertInto("jobs")
        .values(
          result.records.map((r, position) => ({
            batch_id: result.batchId,
            sample_id: r.descriptor.sampleId,
            position,
            state: r.state,
            error: r.lastError,
            data_ref: r.dataRef,
            analysis_id: r.analysisId,
            output_path: r.outputPath,
            attempts: { ...r.attempts },
            descriptor: {
              data_folder: r.descriptor.dataFolder,
              pipeline: r.descriptor.pipeline,
              reference: r.descriptor.reference,
              target_bed: r.descriptor.targetBed,
              custom_params: { ...r.descriptor.customParams }
            },
            history: { transitions: r.transitions.map((t) => ({ ...t })) },
            started_at: jobStartedAt(r),
            finished_at: jobFinishedAt(r)
          }))
        )
        .onConflict((oc) => oc.columns(["batch_id", "sample_id"]).doNothing())
        .execute();
    }

    if (events.length) {
      await this.db
        .insertInto("job_events")
        .values(
          events.map((e) => ({
            batch_id: result.batchId,
            ts: e.ts,
            kind: e.kind,
            message: e.message,
            data: e.data
          }))
        )
        .execute();
    }
  }

  async getBatch(batchId: string): Promise<StoredBatchDetail | null> {
    const row = await this.db.selectFrom("batches").selectAll().where("batch_id", "=", batchId).executeTakeFirst();
    if (!row) return null;

    const jobs = await this.db
      .selectFrom("jobs")
      .selectAll()
      .where("batch_id", "=", batchId)
      .orderBy("position", "asc")
      .execute();

    return { ...this.mapBatch(row), jobs: jobs.map((j) => this.mapJob(j)) };
  }

  async listBatches(limit = 20): Promise<StoredBatch[]> {
    const rows = await this.db
      .selectFrom("batches")
      .selectAll()
      .orderBy("started_at", "desc")
      .orderBy("batch_id", "desc")
      .limit(limit)
      .execute();
    return rows.map((r) => this.mapBatch(r));
  }

  async listEvents(batchId: string, kind?: string): Promise<StoredEvent[]> {
    let q = this.db.selectFrom("job_events").selectAll().where("batch_id", "=", batchId);
    if (kind !== undefined) q = q.where("kind", "=", kind);

    const rows = await q.orderBy("event_id", "asc").execute();
    return rows.map((r) => ({ ts: toIso(r.ts), kind: r.kind, message: r.message, data: r.data }));
  }

  private mapBatch(row: Selectable<DB["batches"]>): StoredBatch {
    return {
      batchId: row.batch_id,
      platform: row.platform,
      manifestHash: row.manifest_hash,
      configHash: row.config_hash,
      startedAt: toIso(row.started_at),
      finishedAt: toIso(row.finished_at),
      total: row.total,
      ok: row.ok,
      counts: zCounts.parse(row.counts)
    };
  }

  private mapJob(row: Selectable<DB["jobs"]>): StoredJob {
    const d = zStoredDescriptor.parse(row.descriptor);
    return {
      sampleId: row.sample_id,
      position: row.position,
      state: zJobState.parse(row.state),
      error: row.error,
      dataRef: row.data_ref,
      analysisId: row.analysis_id,
      outputPath: row.output_path,
      attempts: zAttempts.parse(row.attempts),
      descriptor: {
        sampleId: row.sample_id,
        dataFolder: d.data_folder,
        pipeline: d.pipeline,
        reference: d.reference,
        targetBed: d.target_bed,
        customParams: d.custom_params
      },
      transitions: zHistory.parse(row.history).transitions,
      startedAt: toIsoOrNull(row.started_at),
      finishedAt: toIsoOrNull(row.finished_at)
    };
  }
}
