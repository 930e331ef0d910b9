import { promises as fs } from "fs";
import path from "path";
import { jobFinishedAt, jobStartedAt, type BatchResult, type JobRecord, type Stage, type TerminalState } from "../core/job.js";
import { safeJoin } from "./workspace.js";

export interface JobSummaryRow {
  sample_id: string;
  state: string;
  error: string | null;
  analysis_id: string | null;
  attempts: Record<Stage, number>;
  started_at: string | null;
  finished_at: string | null;
  duration_ms: number | null;
  output_path: string | null;
}

export interface BatchSummaryReport {
  batch_id: string;
  started_at: string;
  finished_at: string;
  total: number;
  counts: Record<TerminalState, number>;
  jobs: JobSummaryRow[];
}

export interface BatchReportPaths {
  dir: string;
  summaryPath: string;
  resultsPath: string;
}

function durationMs(startedAt: string | null, finishedAt: string | null): number | null {
  if (!startedAt || !finishedAt) return null;
  return Math.max(0, Date.parse(finishedAt) - Date.parse(startedAt));
}

function summaryRow(record: JobRecord): JobSummaryRow {
  const startedAt = jobStartedAt(record);
  const finishedAt = jobFinishedAt(record);
  return {
    sample_id: record.descriptor.sampleId,
    state: record.state,
    error: record.state === "completed" ? null : record.lastError,
    analysis_id: record.analysisId,
    attempts: { ...record.attempts },
    started_at: startedAt,
    finished_at: finishedAt,
    duration_ms: durationMs(startedAt, finishedAt),
    output_path: record.outputPath
  };
}

export function buildSummaryReport(result: BatchResult): BatchSummaryReport {
  return {
    batch_id: result.batchId,
    started_at: result.startedAt,
    finished_at: result.finishedAt,
    total: result.records.length,
    counts: { ...result.counts },
    jobs: result.records.map(summaryRow)
  };
}

/** Full per-job history, including every transition and the descriptor it ran with. */
export function buildResultsDocument(result: BatchResult) {
  return {
    batch_id: result.batchId,
    started_at: result.startedAt,
    finished_at: result.finishedAt,
    ok: result.ok,
    jobs: result.records.map((r) => ({
      sample_id: r.descriptor.sampleId,
      descriptor: {
        data_folder: r.descriptor.dataFolder,
        pipeline: r.descriptor.pipeline,
        reference: r.descriptor.reference,
        target_bed: r.descriptor.targetBed,
        custom_params: { ...r.descriptor.customParams }
      },
      state: r.state,
      data_ref: r.dataRef,
      analysis_id: r.analysisId,
      output_path: r.outputPath,
      last_error: r.lastError,
      attempts: { ...r.attempts },
      transitions: r.transitions.map((t) => ({ ...t }))
    }))
  };
}

export async function writeBatchReport(outputDir: string, result: BatchResult): Promise<BatchReportPaths> {
  const dir = safeJoin(path.resolve(outputDir), result.batchId);
  await fs.mkdir(dir, { recursive: true });

  const summaryPath = path.join(dir, "summary.json");
  const resultsPath = path.join(dir, "results.json");
  await fs.writeFile(summaryPath, JSON.stringify(buildSummaryReport(result), null, 2) + "\n", "utf8");
  await fs.writeFile(resultsPath, JSON.stringify(buildResultsDocument(result), null, 2) + "\n", "utf8");
  return { dir, summaryPath, resultsPath };
}

export function exitCodeFor(result: BatchResult): 0 | 1 {
  return result.ok ? 0 : 1;
}

export function formatSummaryLines(result: BatchResult): string[] {
  const { counts } = result;
  const lines = [
    `batch ${result.batchId}: ${counts.completed}/${result.records.length} completed, ` +
      `${counts.failed} failed, ${counts.timed_out} timed out, ${counts.cancelled} cancelled`
  ];
  for (const r of result.records) {
    const detail = r.state === "completed" ? (r.outputPath ?? "") : (r.lastError ?? "");
    lines.push(`  ${r.descriptor.sampleId.padEnd(24)} ${r.state.padEnd(10)} ${detail}`.trimEnd());
  }
  return lines;
}
