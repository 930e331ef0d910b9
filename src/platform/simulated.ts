import { promises as fs } from "fs";
import path from "path";
import { CancelledError, IoError, ValidationError, errorMessage } from "../core/errors.js";
import { floatBetween, seedFrom, shortHash } from "./deterministic.js";
import type {
  CallOptions,
  DownloadResult,
  LaunchRequest,
  LaunchResult,
  PlatformClient,
  PollResult,
  UploadOptions,
  UploadResult
} from "./types.js";

export interface SimulatedPlatformOptions {
  /** Polls that report "running" before an analysis settles. */
  runningPolls?: number;
  /** Share of analyses (0..1) that end failed, chosen deterministically per sample. */
  failureRate?: number;
}

interface SimulatedAnalysis {
  sampleName: string;
  pipeline: string;
  reference: string;
  polls: number;
  outcome: "succeeded" | "failed";
}

function assertNotAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new CancelledError();
}

/**
 * In-process stand-in for the platform, used for dry runs. Identifiers and
 * outcomes derive from the sample and pipeline names, so a given manifest
 * always plays out the same way.
 */
export class SimulatedPlatformClient implements PlatformClient {
  readonly kind = "simulated" as const;
  private readonly runningPolls: number;
  private readonly failureRate: number;
  private readonly analyses = new Map<string, SimulatedAnalysis>();

  constructor(opts: SimulatedPlatformOptions = {}) {
    this.runningPolls = Math.max(0, opts.runningPolls ?? 2);
    this.failureRate = Math.min(1, Math.max(0, opts.failureRate ?? 0));
  }

  async upload(dataFolder: string, opts: UploadOptions): Promise<UploadResult> {
    assertNotAborted(opts.signal);
    if (!dataFolder.trim()) throw new ValidationError("InvalidParameter", "data folder is empty");
    return { dataRef: `fol.${shortHash(seedFrom(["upload", opts.folderName, dataFolder]))}` };
  }

  async launch(request: LaunchRequest, opts: CallOptions = {}): Promise<LaunchResult> {
    assertNotAborted(opts.signal);
    const seed = seedFrom(["launch", request.analysisName, request.pipeline, request.reference, request.dataRef]);
    const analysisId = `ana.${shortHash(seed)}`;
    this.analyses.set(analysisId, {
      sampleName: request.analysisName,
      pipeline: request.pipeline,
      reference: request.reference,
      polls: 0,
      outcome: floatBetween(seed, 0, 0, 1) < this.failureRate ? "failed" : "succeeded"
    });
    return { analysisId };
  }

  async poll(analysisId: string, opts: CallOptions = {}): Promise<PollResult> {
    assertNotAborted(opts.signal);
    const analysis = this.analyses.get(analysisId);
    if (!analysis) throw new ValidationError("InvalidParameter", `unknown analysis: ${analysisId}`);

    analysis.polls += 1;
    if (analysis.polls <= this.runningPolls) return { status: "running", detail: "status INPROGRESS" };
    if (analysis.outcome === "failed") return { status: "failed", detail: "analysis ended with status FAILED (simulated)" };
    return { status: "succeeded", detail: "status SUCCEEDED" };
  }

  async download(analysisId: string, destination: string, opts: CallOptions = {}): Promise<DownloadResult> {
    assertNotAborted(opts.signal);
    const analysis = this.analyses.get(analysisId);
    if (!analysis) throw new ValidationError("InvalidParameter", `unknown analysis: ${analysisId}`);

    const seed = seedFrom(["qc", analysisId]);
    const report = {
      simulated: true,
      analysis_id: analysisId,
      sample: analysis.sampleName,
      pipeline: analysis.pipeline,
      reference: analysis.reference,
      qc: {
        mapped_pct: Number(floatBetween(seed, 0, 80, 99.9).toFixed(3)),
        duplication_pct: Number(floatBetween(seed, 4, 0, 30).toFixed(3)),
        mean_coverage: Number(floatBetween(seed, 8, 20, 60).toFixed(1))
      }
    };

    const dest = path.resolve(destination);
    try {
      await fs.mkdir(dest, { recursive: true });
      await fs.writeFile(path.join(dest, "analysis_summary.json"), JSON.stringify(report, null, 2) + "\n", "utf8");
    } catch (err) {
      throw new IoError(`cannot write results to ${dest}: ${errorMessage(err)}`);
    }
    return { path: dest };
  }
}
