import type { Clock } from "../src/batch/clock.js";
import { JobStateTracker } from "../src/batch/stateTracker.js";
import type { BatchSettings } from "../src/config/batchConfig.js";
import { CancelledError } from "../src/core/errors.js";
import type { BatchResult, JobDescriptor } from "../src/core/job.js";
import type { JobSummary, Notifier, NotifyEvent } from "../src/notify/types.js";
import type {
  CallOptions,
  DownloadResult,
  LaunchRequest,
  LaunchResult,
  PlatformClient,
  PlatformRunStatus,
  PollResult,
  UploadOptions,
  UploadResult
} from "../src/platform/types.js";

interface Timer {
  due: number;
  seq: number;
  resolve: () => void;
}

/**
 * Virtual time. A sleep registers a timer; once the event loop has nothing
 * else queued, the clock jumps to the earliest timer and fires it.
 */
export class ManualClock implements Clock {
  private t = 0;
  private seq = 0;
  private timers: Timer[] = [];
  private scheduled = false;
  /** Delays of the sleeps that ran to completion, in firing order. */
  readonly sleeps: number[] = [];

  now(): number {
    return this.t;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(new CancelledError());

    return new Promise<void>((resolve, reject) => {
      const timer: Timer = { due: this.t + Math.max(0, ms), seq: this.seq++, resolve: () => {} };
      const onAbort = () => {
        this.timers = this.timers.filter((x) => x !== timer);
        reject(new CancelledError());
      };
      timer.resolve = () => {
        this.sleeps.push(ms);
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.timers.push(timer);
      this.schedule();
    });
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    setImmediate(() => {
      this.scheduled = false;
      this.fireNext();
    });
  }

  private fireNext(): void {
    if (!this.timers.length) return;
    this.timers.sort((a, b) => a.due - b.due || a.seq - b.seq);
    const [next, ...rest] = this.timers;
    this.timers = rest;
    if (!next) return;
    this.t = Math.max(this.t, next.due);
    next.resolve();
    if (this.timers.length) this.schedule();
  }
}

export type Step = Error | null;
export type PollStep = PlatformRunStatus | Error;

export interface SampleScript {
  /** Outcome per attempt; attempts past the end succeed. */
  upload?: Step[];
  launch?: Step[];
  /** Status per poll; the last entry repeats. */
  polls?: PollStep[];
  download?: Step[];
}

export type PlatformOp = "upload" | "launch" | "poll" | "download";

export interface PlatformCall {
  op: PlatformOp;
  sampleId: string;
}

/** Scripted PlatformClient keyed by sample id; unscripted samples run one poll then succeed. */
export class FakePlatform implements PlatformClient {
  readonly kind = "fake";
  readonly calls: PlatformCall[] = [];
  readonly launches: LaunchRequest[] = [];
  private readonly counters = new Map<string, number>();
  private readonly samplesByRef = new Map<string, string>();

  constructor(
    private readonly scripts: Record<string, SampleScript> = {},
    private readonly beforeCall?: (call: PlatformCall, signal: AbortSignal | undefined) => Promise<void> | void
  ) {}

  count(op: PlatformOp, sampleId?: string): number {
    return this.calls.filter((c) => c.op === op && (sampleId === undefined || c.sampleId === sampleId)).length;
  }

  private async enter(op: PlatformOp, sampleId: string, signal: AbortSignal | undefined): Promise<number> {
    if (signal?.aborted) throw new CancelledError();
    const call = { op, sampleId };
    this.calls.push(call);
    const key = `${op}:${sampleId}`;
    const n = (this.counters.get(key) ?? 0) + 1;
    this.counters.set(key, n);
    await this.beforeCall?.(call, signal);
    return n;
  }

  private step(steps: Step[] | undefined, attempt: number): void {
    const s = steps?.[attempt - 1];
    if (s) throw s;
  }

  private sampleFor(ref: string): string {
    const sampleId = this.samplesByRef.get(ref);
    if (!sampleId) throw new Error(`fake platform: unknown ref ${ref}`);
    return sampleId;
  }

  async upload(dataFolder: string, opts: UploadOptions): Promise<UploadResult> {
    const attempt = await this.enter("upload", opts.folderName, opts.signal);
    this.step(this.scripts[opts.folderName]?.upload, attempt);
    const dataRef = `ref-${opts.folderName}`;
    this.samplesByRef.set(dataRef, opts.folderName);
    return { dataRef };
  }

  async launch(request: LaunchRequest, opts: CallOptions = {}): Promise<LaunchResult> {
    const sampleId = this.sampleFor(request.dataRef);
    const attempt = await this.enter("launch", sampleId, opts.signal);
    this.step(this.scripts[sampleId]?.launch, attempt);
    this.launches.push(request);
    const analysisId = `ana-${sampleId}`;
    this.samplesByRef.set(analysisId, sampleId);
    return { analysisId };
  }

  async poll(analysisId: string, opts: CallOptions = {}): Promise<PollResult> {
    const sampleId = this.sampleFor(analysisId);
    const attempt = await this.enter("poll", sampleId, opts.signal);
    const polls = this.scripts[sampleId]?.polls ?? ["running", "succeeded"];
    const s = polls[Math.min(attempt, polls.length) - 1] ?? "succeeded";
    if (s instanceof Error) throw s;
    return { status: s, detail: s === "failed" ? "analysis ended with status FAILED" : `status ${s}` };
  }

  async download(analysisId: string, destination: string, opts: CallOptions = {}): Promise<DownloadResult> {
    const sampleId = this.sampleFor(analysisId);
    const attempt = await this.enter("download", sampleId, opts.signal);
    this.step(this.scripts[sampleId]?.download, attempt);
    return { path: destination };
  }
}

export interface Notification {
  event: NotifyEvent;
  sampleId: string;
  state: string;
  detail: string | null;
}

export class RecordingNotifier implements Notifier {
  readonly sent: Notification[] = [];

  constructor(private readonly failWith: Error | null = null) {}

  async notify(event: NotifyEvent, summary: JobSummary): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.sent.push({ event, sampleId: summary.sampleId, state: summary.state, detail: summary.detail });
  }

  count(event: NotifyEvent, sampleId?: string): number {
    return this.sent.filter((n) => n.event === event && (sampleId === undefined || n.sampleId === sampleId)).length;
  }
}

export function descriptor(sampleId: string, overrides: Partial<JobDescriptor> = {}): JobDescriptor {
  return {
    sampleId,
    dataFolder: `/data/${sampleId}`,
    pipeline: "dragen-germline",
    reference: "hg38",
    targetBed: null,
    customParams: {},
    ...overrides
  };
}

export function testSettings(overrides: Partial<BatchSettings> = {}): BatchSettings {
  return {
    maxConcurrentJobs: 2,
    maxRetriesPerStage: 3,
    perStageTimeoutMs: 1_000,
    pollIntervalMs: 10,
    backoff: { baseMs: 1, maxMs: 4, factor: 2 },
    notifyOn: ["start", "complete", "error"],
    ...overrides
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Three settled jobs (completed, failed, cancelled) on a clock that ticks one second per reading. */
export function sampleResult(batchId = "batch_report"): BatchResult {
  let ms = Date.parse("2026-01-01T00:00:00.000Z");
  const tracker = new JobStateTracker(() => new Date((ms += 1000)));
  tracker.register([descriptor("s1"), descriptor("s2"), descriptor("s3")]);

  tracker.transition("s1", "uploading");
  tracker.recordAttempt("s1", "upload");
  tracker.transition("s1", "launching");
  tracker.transition("s1", "running");
  tracker.setAnalysisId("s1", "ana.1");
  tracker.transition("s1", "downloading");
  tracker.setOutputPath("s1", "/out/s1");
  tracker.transition("s1", "completed");

  tracker.transition("s2", "uploading");
  tracker.transition("s2", "failed", "boom");
  tracker.transition("s3", "cancelled", "cancelled before start");

  return tracker.summarize(batchId, "2026-01-01T00:00:00.000Z");
}
