import { promises as fs } from "fs";
import path from "path";
import { validateBatchSettings, type BatchSettings, type NotifyEvent } from "../config/batchConfig.js";
import { CancelledError, InvalidTransitionError, errorMessage, isRetryable } from "../core/errors.js";
import { newBatchId } from "../core/ids.js";
import type { BatchResult, JobDescriptor, JobState, Stage } from "../core/job.js";
import type { EventLog } from "../logging/eventLog.js";
import type { Notifier } from "../notify/types.js";
import type { PlatformClient, PollResult } from "../platform/types.js";
import { backoffDelayMs } from "./backoff.js";
import { systemClock, type Clock } from "./clock.js";
import { buildPipelineParams } from "./pipelineParams.js";
import { JobStateTracker } from "./stateTracker.js";
import { createJobWorkspace, safeJoin, type JobWorkspace } from "./workspace.js";

export interface OrchestratorDeps {
  platform: PlatformClient;
  notifier: Notifier;
  settings: BatchSettings;
  log: EventLog;
  workspaceRootDir: string;
  outputDir: string;
  clock?: Clock;
}

export interface StartOptions {
  batchId?: string;
  signal?: AbortSignal;
}

export interface BatchRun {
  readonly batchId: string;
  readonly startedAt: string;
  readonly tracker: JobStateTracker;
  readonly result: Promise<BatchResult>;
  cancel(): void;
  readonly cancelled: boolean;
}

type RetriedStage = Exclude<Stage, "poll">;

/** A stage gave up; the job goes to failed with this message. */
class StageFailedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StageFailedError";
  }
}

class StageTimedOutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StageTimedOutError";
  }
}

interface JobContext {
  batchId: string;
  tracker: JobStateTracker;
  signal: AbortSignal;
  descriptor: JobDescriptor;
}

const STAGE_OF: Partial<Record<JobState, Stage>> = {
  uploading: "upload",
  launching: "launch",
  running: "poll",
  downloading: "download"
};

/**
 * Drives every job of a batch to a terminal state through a fixed pool of
 * maxConcurrentJobs workers. Each worker owns one job at a time and pulls the
 * next pending job, in manifest order, when it frees up.
 */
export class BatchOrchestrator {
  private readonly settings: BatchSettings;
  private readonly clock: Clock;
  private readonly notifyOn: ReadonlySet<NotifyEvent>;

  constructor(private readonly deps: OrchestratorDeps) {
    this.settings = validateBatchSettings(deps.settings);
    this.clock = deps.clock ?? systemClock;
    this.notifyOn = new Set(this.settings.notifyOn);
  }

  async run(descriptors: readonly JobDescriptor[], opts: StartOptions = {}): Promise<BatchResult> {
    return this.start(descriptors, opts).result;
  }

  start(descriptors: readonly JobDescriptor[], opts: StartOptions = {}): BatchRun {
    const batchId = opts.batchId ?? newBatchId();
    const startedAt = new Date().toISOString();
    const tracker = new JobStateTracker();
    tracker.register(descriptors);

    const controller = new AbortController();
    if (opts.signal) {
      if (opts.signal.aborted) controller.abort();
      else opts.signal.addEventListener("abort", () => controller.abort(), { once: true });
    }

    const result = this.drive(batchId, startedAt, descriptors, tracker, controller.signal);
    return {
      batchId,
      startedAt,
      tracker,
      result,
      cancel: () => controller.abort(),
      get cancelled() {
        return controller.signal.aborted;
      }
    };
  }

  private async drive(
    batchId: string,
    startedAt: string,
    descriptors: readonly JobDescriptor[],
    tracker: JobStateTracker,
    signal: AbortSignal
  ): Promise<BatchResult> {
    const { log } = this.deps;
    log.event("batch.started", `batch ${batchId} with ${descriptors.length} job(s)`, {
      batch_id: batchId,
      jobs: descriptors.length,
      max_concurrent_jobs: this.settings.maxConcurrentJobs,
      platform: this.deps.platform.kind
    });

    let cursor = 0;
    const worker = async (): Promise<void> => {
      for (;;) {
        if (signal.aborted) return;
        const descriptor = descriptors[cursor];
        if (!descriptor) return;
        cursor++;
        await this.driveJob({ batchId, tracker, signal, descriptor });
      }
    };

    const poolSize = Math.min(this.settings.maxConcurrentJobs, descriptors.length);
    await Promise.all(Array.from({ length: poolSize }, () => worker()));

    for (const record of tracker.snapshot()) {
      if (record.state === "pending") {
        this.move({ batchId, tracker, signal, descriptor: record.descriptor }, "cancelled", "cancelled before start");
      }
    }

    const result = tracker.summarize(batchId, startedAt);
    log.event("batch.finished", `batch ${batchId} ${result.ok ? "ok" : "finished with failures"}`, {
      batch_id: batchId,
      ...result.counts,
      ok: result.ok
    });
    return result;
  }

  private move(ctx: JobContext, to: JobState, detail: string | null = null): void {
    const sampleId = ctx.descriptor.sampleId;
    const from = ctx.tracker.get(sampleId)?.state ?? null;
    ctx.tracker.transition(sampleId, to, detail);
    this.deps.log.event("job.transition", `${sampleId}: ${from ?? "?"} -> ${to}`, {
      batch_id: ctx.batchId,
      sample_id: sampleId,
      from,
      to,
      detail
    });
  }

  private async driveJob(ctx: JobContext): Promise<void> {
    const { descriptor, tracker } = ctx;
    const sampleId = descriptor.sampleId;
    let workspace: JobWorkspace | null = null;

    try {
      workspace = await createJobWorkspace(this.deps.workspaceRootDir, ctx.batchId, sampleId);

      this.enterStage(ctx, "uploading");
      await this.notify(ctx, "start");
      const { dataRef } = await this.withRetries(ctx, "upload", () =>
        this.deps.platform.upload(descriptor.dataFolder, { folderName: sampleId, signal: ctx.signal })
      );
      tracker.setDataRef(sampleId, dataRef);

      this.enterStage(ctx, "launching");
      const params = buildPipelineParams(descriptor);
      const paramsFile = workspace.path("params.json");
      await fs.writeFile(paramsFile, JSON.stringify(params, null, 2) + "\n", "utf8");
      const { analysisId } = await this.withRetries(ctx, "launch", () =>
        this.deps.platform.launch(
          {
            pipeline: descriptor.pipeline,
            reference: descriptor.reference,
            params,
            dataRef,
            analysisName: `${sampleId}-${ctx.batchId}`,
            paramsFile
          },
          { signal: ctx.signal }
        )
      );
      tracker.setAnalysisId(sampleId, analysisId);

      this.enterStage(ctx, "running");
      const outcome = await this.pollUntilSettled(ctx, analysisId);
      if (outcome.status === "failed") {
        throw new StageFailedError(outcome.detail ?? "analysis failed on the platform");
      }

      this.enterStage(ctx, "downloading");
      const destination = safeJoin(path.resolve(this.deps.outputDir), sampleId);
      const downloaded = await this.withRetries(ctx, "download", () =>
        this.deps.platform.download(analysisId, destination, { signal: ctx.signal })
      );
      tracker.setOutputPath(sampleId, downloaded.path);

      this.move(ctx, "completed");
      await this.notify(ctx, "complete");
    } catch (err) {
      if (err instanceof InvalidTransitionError) throw err;
      await this.finishWithError(ctx, err);
    } finally {
      if (workspace) await this.release(ctx, workspace);
    }
  }

  private enterStage(ctx: JobContext, state: "uploading" | "launching" | "running" | "downloading"): void {
    if (ctx.signal.aborted) throw new CancelledError();
    this.move(ctx, state);
  }

  private async finishWithError(ctx: JobContext, err: unknown): Promise<void> {
    const current = ctx.tracker.get(ctx.descriptor.sampleId)?.state ?? "pending";
    const stage = STAGE_OF[current] ?? "setup";

    if (err instanceof CancelledError || ctx.signal.aborted) {
      this.move(ctx, "cancelled", current === "pending" ? "cancelled before start" : `cancelled during ${stage}`);
      return;
    }
    if (err instanceof StageTimedOutError) {
      this.move(ctx, "timed_out", err.message);
    } else {
      this.move(ctx, "failed", errorMessage(err));
    }
    await this.notify(ctx, "error");
  }

  private async release(ctx: JobContext, workspace: JobWorkspace): Promise<void> {
    try {
      await workspace.dispose();
    } catch (err) {
      this.deps.log.event("job.cleanup_failed", `${ctx.descriptor.sampleId}: ${errorMessage(err)}`, {
        batch_id: ctx.batchId,
        sample_id: ctx.descriptor.sampleId,
        workspace: workspace.rootDir
      });
    }
  }

  /**
   * Runs one stage call under the retry policy: retryable failures are retried
   * after a backoff until maxRetriesPerStage retries are spent; anything else
   * fails the stage at once.
   */
  private async withRetries<T>(ctx: JobContext, stage: RetriedStage, call: () => Promise<T>): Promise<T> {
    const sampleId = ctx.descriptor.sampleId;
    for (;;) {
      const attempt = ctx.tracker.recordAttempt(sampleId, stage);
      try {
        return await call();
      } catch (err) {
        if (err instanceof CancelledError || ctx.signal.aborted) throw err;
        const message = errorMessage(err);
        ctx.tracker.setLastError(sampleId, message);
        this.deps.log.event("job.attempt_failed", `${sampleId}: ${stage} attempt ${attempt} failed: ${message}`, {
          batch_id: ctx.batchId,
          sample_id: sampleId,
          stage,
          attempt,
          retryable: isRetryable(err)
        });

        if (!isRetryable(err)) throw err;
        if (attempt > this.settings.maxRetriesPerStage) {
          throw new StageFailedError(`${stage} exhausted retries: ${message}`);
        }
        await this.clock.sleep(backoffDelayMs(this.settings.backoff, attempt), ctx.signal);
      }
    }
  }

  /**
   * Polls until the platform reports succeeded/failed. Elapsing
   * perStageTimeoutMs ends the job as timed_out; that is never retried.
   */
  private async pollUntilSettled(ctx: JobContext, analysisId: string): Promise<PollResult> {
    const sampleId = ctx.descriptor.sampleId;
    const timeoutMs = this.settings.perStageTimeoutMs;
    const deadline = this.clock.now() + timeoutMs;
    let failures = 0;

    for (;;) {
      const attempt = ctx.tracker.recordAttempt(sampleId, "poll");
      let waitMs = this.settings.pollIntervalMs;
      try {
        const res = await this.pollBefore(ctx, analysisId, deadline);
        if (res.status !== "running") return res;
      } catch (err) {
        if (err instanceof CancelledError || err instanceof StageTimedOutError || ctx.signal.aborted) throw err;
        const message = errorMessage(err);
        ctx.tracker.setLastError(sampleId, message);
        this.deps.log.event("job.attempt_failed", `${sampleId}: poll attempt ${attempt} failed: ${message}`, {
          batch_id: ctx.batchId,
          sample_id: sampleId,
          stage: "poll",
          attempt,
          retryable: isRetryable(err)
        });
        if (!isRetryable(err)) throw err;
        failures += 1;
        if (failures > this.settings.maxRetriesPerStage) {
          throw new StageFailedError(`poll exhausted retries: ${message}`);
        }
        waitMs = Math.max(waitMs, backoffDelayMs(this.settings.backoff, failures));
      }

      const remaining = deadline - this.clock.now();
      if (remaining <= 0) throw new StageTimedOutError(`poll timed out after ${timeoutMs}ms`);
      await this.clock.sleep(Math.min(waitMs, remaining), ctx.signal);
    }
  }

  /** One poll call, abandoned (and its signal aborted) if it is still pending at the deadline. */
  private async pollBefore(ctx: JobContext, analysisId: string, deadline: number): Promise<PollResult> {
    if (ctx.signal.aborted) throw new CancelledError();
    const timeoutMs = this.settings.perStageTimeoutMs;
    const call = new AbortController();
    const onAbort = () => call.abort();
    ctx.signal.addEventListener("abort", onAbort, { once: true });

    const timer = this.clock.sleep(Math.max(0, deadline - this.clock.now()), call.signal).then((): never => {
      throw new StageTimedOutError(`poll timed out after ${timeoutMs}ms`);
    });
    try {
      return await Promise.race([this.deps.platform.poll(analysisId, { signal: call.signal }), timer]);
    } finally {
      ctx.signal.removeEventListener("abort", onAbort);
      call.abort();
    }
  }

  private async notify(ctx: JobContext, event: NotifyEvent): Promise<void> {
    if (!this.notifyOn.has(event)) return;
    const record = ctx.tracker.get(ctx.descriptor.sampleId);
    if (!record) return;

    try {
      await this.deps.notifier.notify(event, {
        batchId: ctx.batchId,
        sampleId: record.descriptor.sampleId,
        state: record.state,
        detail: record.state === "completed" ? null : record.lastError,
        analysisId: record.analysisId,
        attempts: record.attempts
      });
    } catch (err) {
      this.deps.log.event("notify.failed", `${event} notification for ${record.descriptor.sampleId} failed: ${errorMessage(err)}`, {
        batch_id: ctx.batchId,
        sample_id: record.descriptor.sampleId,
        event
      });
    }
  }
}
