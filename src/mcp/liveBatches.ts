import type { BatchRun } from "../batch/orchestrator.js";
import { errorMessage } from "../core/errors.js";
import type { BatchResult } from "../core/job.js";
import type { EventLog } from "../logging/eventLog.js";

export interface LiveBatch {
  readonly run: BatchRun;
  readonly log: EventLog;
  readonly result: BatchResult | null;
  /** Set when the run or its persistence threw; the batch is then only visible here. */
  readonly error: string | null;
  readonly finished: boolean;
  readonly settled: Promise<void>;
}

/** Batches started by this gateway process, kept so batch_get can report them while they run. */
export class LiveBatchRegistry {
  private readonly batches = new Map<string, LiveBatch>();

  add(run: BatchRun, log: EventLog, persist: (result: BatchResult) => Promise<void>): LiveBatch {
    const state: { result: BatchResult | null; error: string | null; finished: boolean } = {
      result: null,
      error: null,
      finished: false
    };

    const settled = run.result
      .then(async (result) => {
        state.result = result;
        await persist(result);
      })
      .catch((err: unknown) => {
        state.error = errorMessage(err);
        log.event("batch.persist_failed", `batch ${run.batchId}: ${state.error}`, { batch_id: run.batchId });
        console.error(err);
      })
      .finally(() => {
        state.finished = true;
      });

    const entry: LiveBatch = {
      run,
      log,
      settled,
      get result() {
        return state.result;
      },
      get error() {
        return state.error;
      },
      get finished() {
        return state.finished;
      }
    };
    this.batches.set(run.batchId, entry);
    return entry;
  }

  get(batchId: string): LiveBatch | null {
    return this.batches.get(batchId) ?? null;
  }

  async settled(batchId: string): Promise<void> {
    await this.batches.get(batchId)?.settled;
  }

  async settleAll(): Promise<void> {
    await Promise.all([...this.batches.values()].map((b) => b.settled));
  }

  cancelAll(): void {
    for (const b of this.batches.values()) if (!b.finished) b.run.cancel();
  }
}
