import type { ScalarParam } from "../core/job.js";

export interface CallOptions {
  signal?: AbortSignal;
}

export interface UploadOptions extends CallOptions {
  /** Folder name on the platform; the orchestrator uses the sample id. */
  folderName: string;
}

export interface UploadResult {
  dataRef: string;
}

export interface LaunchRequest {
  pipeline: string;
  reference: string;
  params: Record<string, ScalarParam>;
  dataRef: string;
  analysisName: string;
  /** params serialized to JSON, for clients that hand a file to the vendor CLI */
  paramsFile: string;
}

export interface LaunchResult {
  analysisId: string;
}

export type PlatformRunStatus = "running" | "succeeded" | "failed";

export interface PollResult {
  status: PlatformRunStatus;
  detail: string | null;
}

export interface DownloadResult {
  path: string;
}

/**
 * The platform operations a batch needs. Implementations throw NetworkError or
 * IoError for transient failures, ValidationError or ResourceError for failures
 * a retry will not fix, and CancelledError when the call's signal is aborted.
 */
export interface PlatformClient {
  readonly kind: string;
  upload(dataFolder: string, opts: UploadOptions): Promise<UploadResult>;
  launch(request: LaunchRequest, opts?: CallOptions): Promise<LaunchResult>;
  poll(analysisId: string, opts?: CallOptions): Promise<PollResult>;
  download(analysisId: string, destination: string, opts?: CallOptions): Promise<DownloadResult>;
}
