import { InvalidTransitionError } from "../core/errors.js";
import {
  isActive,
  isTerminal,
  nextForwardState,
  type BatchResult,
  type JobDescriptor,
  type JobRecord,
  type JobState,
  type Stage,
  type TerminalState
} from "../core/job.js";

export type TrackerClock = () => Date;

function cloneRecord(record: JobRecord): JobRecord {
  return {
    descriptor: record.descriptor,
    state: record.state,
    attempts: { ...record.attempts },
    transitions: record.transitions.map((t) => ({ ...t })),
    lastError: record.lastError,
    dataRef: record.dataRef,
    analysisId: record.analysisId,
    outputPath: record.outputPath
  };
}

/**
 * Owns the JobRecord table for one batch.
 *
 * Every mutation is synchronous, so on the event loop a transition is atomic
 * with respect to snapshot(): readers never see a record half-way between
 * two states. Only the worker driving a job mutates that job's record.
 */
export class JobStateTracker {
  private readonly records = new Map<string, JobRecord>();

  constructor(private readonly clock: TrackerClock = () => new Date()) {}

  register(descriptors: readonly JobDescriptor[]): void {
    for (const descriptor of descriptors) {
      if (this.records.has(descriptor.sampleId)) {
        throw new InvalidTransitionError(descriptor.sampleId, null, "pending", "job already registered");
      }
      this.records.set(descriptor.sampleId, {
        descriptor,
        state: "pending",
        attempts: { upload: 0, launch: 0, poll: 0, download: 0 },
        transitions: [{ state: "pending", at: this.clock().toISOString(), detail: null }],
        lastError: null,
        dataRef: null,
        analysisId: null,
        outputPath: null
      });
    }
  }

  private mustGet(jobId: string, to: JobState): JobRecord {
    const record = this.records.get(jobId);
    if (!record) throw new InvalidTransitionError(jobId, null, to, "unknown job");
    return record;
  }

  transition(jobId: string, newState: JobState, detail: string | null = null): void {
    const record = this.mustGet(jobId, newState);
    const from = record.state;

    if (isTerminal(from)) {
      throw new InvalidTransitionError(jobId, from, newState, "job is terminal");
    }
    const diverting = newState === "failed" || newState === "timed_out" || newState === "cancelled";
    if (!diverting && nextForwardState(from) !== newState) {
      throw new InvalidTransitionError(jobId, from, newState, "out of order");
    }

    record.state = newState;
    record.transitions.push({ state: newState, at: this.clock().toISOString(), detail });
    if (diverting && detail !== null) record.lastError = detail;
  }

  recordAttempt(jobId: string, stage: Stage): number {
    const record = this.mustGet(jobId, "running");
    record.attempts[stage] += 1;
    return record.attempts[stage];
  }

  setLastError(jobId: string, message: string): void {
    this.mustGet(jobId, "failed").lastError = message;
  }

  setDataRef(jobId: string, dataRef: string): void {
    this.mustGet(jobId, "launching").dataRef = dataRef;
  }

  setAnalysisId(jobId: string, analysisId: string): void {
    this.mustGet(jobId, "running").analysisId = analysisId;
  }

  setOutputPath(jobId: string, outputPath: string): void {
    this.mustGet(jobId, "completed").outputPath = outputPath;
  }

  get(jobId: string): JobRecord | null {
    const record = this.records.get(jobId);
    return record ? cloneRecord(record) : null;
  }

  snapshot(): JobRecord[] {
    return [...this.records.values()].map(cloneRecord);
  }

  activeCount(): number {
    let n = 0;
    for (const record of this.records.values()) if (isActive(record.state)) n++;
    return n;
  }

  allTerminal(): boolean {
    for (const record of this.records.values()) if (!isTerminal(record.state)) return false;
    return true;
  }

  summarize(batchId: string, startedAt: string): BatchResult {
    const records = this.snapshot();
    const counts: Record<TerminalState, number> = { completed: 0, failed: 0, timed_out: 0, cancelled: 0 };
    for (const record of records) {
      if (!isTerminal(record.state)) {
        throw new InvalidTransitionError(record.descriptor.sampleId, record.state, record.state, "batch summarized before job finished");
      }
      counts[record.state] += 1;
    }

    return Object.freeze({
      batchId,
      startedAt,
      finishedAt: this.clock().toISOString(),
      records: Object.freeze(records),
      counts: Object.freeze(counts),
      ok: counts.completed === records.length
    });
  }
}
