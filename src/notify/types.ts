import type { NotifyEvent } from "../config/batchConfig.js";
import type { JobState, Stage } from "../core/job.js";

export type { NotifyEvent };

export interface JobSummary {
  batchId: string;
  sampleId: string;
  state: JobState;
  detail: string | null;
  analysisId: string | null;
  attempts: Record<Stage, number>;
}

/** Delivery is best-effort: callers log a rejected notify() and carry on. */
export interface Notifier {
  notify(event: NotifyEvent, summary: JobSummary): Promise<void>;
}

export function formatNotification(event: NotifyEvent, summary: JobSummary): string {
  const head = `[seqbatch ${summary.batchId}] ${summary.sampleId}`;
  switch (event) {
    case "start":
      return `${head} started`;
    case "complete":
      return `${head} completed${summary.analysisId ? ` (analysis ${summary.analysisId})` : ""}`;
    case "error":
      return `${head} ${summary.state}${summary.detail ? `: ${summary.detail}` : ""}`;
  }
}
