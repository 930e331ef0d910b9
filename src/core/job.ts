export type ScalarParam = string | number | boolean;

export interface JobDescriptor {
  readonly sampleId: string;
  readonly dataFolder: string;
  readonly pipeline: string;
  readonly reference: string;
  readonly targetBed: string | null;
  readonly customParams: Readonly<Record<string, ScalarParam>>;
}

/** Forward path of a job; terminal diversions are listed separately. */
export const FORWARD_STATES = ["pending", "uploading", "launching", "running", "downloading", "completed"] as const;
export const DIVERSION_STATES = ["failed", "timed_out", "cancelled"] as const;

export type ForwardState = (typeof FORWARD_STATES)[number];
export type DiversionState = (typeof DIVERSION_STATES)[number];
export type JobState = ForwardState | DiversionState;
export type TerminalState = Extract<JobState, "completed" | DiversionState>;
export type ActiveState = Extract<JobState, "uploading" | "launching" | "running" | "downloading">;

export type Stage = "upload" | "launch" | "poll" | "download";

export interface JobTransition {
  state: JobState;
  at: string;
  detail: string | null;
}

export interface JobRecord {
  descriptor: JobDescriptor;
  state: JobState;
  attempts: Record<Stage, number>;
  transitions: JobTransition[];
  lastError: string | null;
  dataRef: string | null;
  analysisId: string | null;
  outputPath: string | null;
}

export interface BatchResult {
  readonly batchId: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly records: readonly JobRecord[];
  readonly counts: Readonly<Record<TerminalState, number>>;
  /** True only when every job completed. */
  readonly ok: boolean;
}

export function isTerminal(state: JobState): state is TerminalState {
  return state === "completed" || state === "failed" || state === "timed_out" || state === "cancelled";
}

export function isActive(state: JobState): state is ActiveState {
  return state === "uploading" || state === "launching" || state === "running" || state === "downloading";
}

export function nextForwardState(state: JobState): ForwardState | null {
  const idx = FORWARD_STATES.findIndex((s) => s === state);
  if (idx < 0) return null;
  return FORWARD_STATES[idx + 1] ?? null;
}

export function jobStartedAt(record: JobRecord): string | null {
  return record.transitions.find((t) => t.state === "uploading")?.at ?? null;
}

export function jobFinishedAt(record: JobRecord): string | null {
  const last = record.transitions[record.transitions.length - 1];
  return last && isTerminal(last.state) ? last.at : null;
}
