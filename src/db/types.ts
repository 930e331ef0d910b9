import type { ColumnType, Generated, JSONColumnType } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type Timestamp = ColumnType<Date | string, string, string>;
type TimestampNullable = ColumnType<Date | string | null, string | null | undefined, string | null>;
type JsonObject = Record<string, unknown>;
type Json = JSONColumnType<JsonObject, JsonObject, JsonObject>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;

export interface BatchesTable {
  batch_id: string;
  platform: string;
  manifest_hash: OptionalNullable<string>;
  config_hash: OptionalNullable<string>;
  started_at: Timestamp;
  finished_at: Timestamp;
  total: number;
  ok: boolean;
  counts: Json;
  created_at: Generated<Date | string>;
}

export interface JobsTable {
  batch_id: string;
  sample_id: string;
  position: number;
  state: string;
  error: OptionalNullable<string>;
  data_ref: OptionalNullable<string>;
  analysis_id: OptionalNullable<string>;
  output_path: OptionalNullable<string>;
  attempts: Json;
  descriptor: Json;
  /** `{ transitions: [...] }`; wrapped because pg sends bare arrays as Postgres arrays */
  history: Json;
  started_at: TimestampNullable;
  finished_at: TimestampNullable;
}

export interface JobEventsTable {
  event_id: Generated<number>;
  batch_id: string;
  ts: Timestamp;
  kind: string;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface DB {
  batches: BatchesTable;
  jobs: JobsTable;
  job_events: JobEventsTable;
}
