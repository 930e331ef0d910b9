import { promises as fs } from "fs";
import path from "path";
import * as z from "zod/v4";
import { IoError, NetworkError, ResourceError, ValidationError, errorMessage } from "../core/errors.js";
import { SpawnProcessRunner, type ProcessRunner } from "./processRunner.js";
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
} from "./types.js";

const zNamed = z.object({ id: z.string().min(1), name: z.string() }).loose();
const zNamedList = z.union([z.array(zNamed), z.object({ items: z.array(zNamed) }).transform((o) => o.items)]);

const zFileEntry = zNamed.extend({ type: z.string().optional() });
const zFileList = z.union([z.array(zFileEntry), z.object({ items: z.array(zFileEntry) }).transform((o) => o.items)]);

const zStarted = z.object({ id: z.string().min(1) }).loose();

const zAnalysis = z
  .object({
    status: z.string(),
    output: z.object({ folder: z.object({ id: z.string() }).loose().nullish() }).loose().nullish()
  })
  .loose();

const SUCCEEDED = new Set(["COMPLETED", "SUCCEEDED"]);
const FAILED = new Set(["FAILED", "ABORTED", "TERMINATED", "CANCELLED"]);
// Rate limits are transient and stay NetworkErrors; only exhausted quota, credits or storage is a ResourceError.
const RESOURCE_HINTS = /quota|(insufficient|not enough) (credits|storage)|storage (limit|is full)/i;

export const DEFAULT_COMMAND_TIMEOUT_MS = 2 * 60 * 60 * 1000;

export function normalizeAnalysisStatus(raw: string): PlatformRunStatus {
  const s = raw.trim().toUpperCase();
  if (SUCCEEDED.has(s)) return "succeeded";
  if (FAILED.has(s)) return "failed";
  return "running";
}

export interface IcaCliOptions {
  projectName: string;
  cliPath?: string;
  /** Upper bound on a single CLI invocation; a hung command is killed and retried as a NetworkError. */
  commandTimeoutMs?: number;
  runner?: ProcessRunner;
}

/**
 * PlatformClient over the vendor's `ica` command-line client.
 *
 * Project and pipeline names are resolved to ids once per client. Output
 * folders reported by `pipelines history` are remembered for download.
 */
export class IcaCliPlatformClient implements PlatformClient {
  readonly kind = "ica_cli" as const;
  private readonly cliPath: string;
  private readonly runner: ProcessRunner;
  private readonly commandTimeoutMs: number;
  private projectId: string | null = null;
  private readonly pipelineIds = new Map<string, string>();
  private readonly outputFolders = new Map<string, string>();

  constructor(private readonly opts: IcaCliOptions) {
    this.cliPath = opts.cliPath ?? "ica";
    this.runner = opts.runner ?? new SpawnProcessRunner();
    this.commandTimeoutMs = opts.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  }

  private async exec(args: string[], signal?: AbortSignal): Promise<string> {
    const res = await this.runner.run([this.cliPath, ...args], { signal, timeoutMs: this.commandTimeoutMs }).catch((err: unknown) => {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        throw new ValidationError("InvalidParameter", `ica CLI not found at ${this.cliPath}`);
      }
      throw err;
    });

    if (res.exitCode !== 0) {
      const stderr = res.stderr.trim();
      const message = `ica ${args.slice(0, 2).join(" ")} failed (exit ${res.exitCode})${stderr ? `: ${stderr}` : ""}`;
      if (RESOURCE_HINTS.test(stderr)) throw new ResourceError(message);
      throw new NetworkError(message);
    }
    return res.stdout;
  }

  private async execJson<T>(args: string[], schema: z.ZodType<T>, signal?: AbortSignal): Promise<T> {
    const stdout = await this.exec(args, signal);
    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch {
      throw new NetworkError(`ica ${args.slice(0, 2).join(" ")} returned non-JSON output`);
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new NetworkError(`ica ${args.slice(0, 2).join(" ")} returned unexpected output: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async resolveProjectId(signal?: AbortSignal): Promise<string> {
    if (this.projectId) return this.projectId;
    const projects = await this.execJson(["projects", "list", "--output", "json"], zNamedList, signal);
    const wanted = this.opts.projectName.toLowerCase();
    const match = projects.find((p) => p.name.toLowerCase() === wanted);
    if (!match) throw new ValidationError("InvalidParameter", `project not found: ${this.opts.projectName}`);
    this.projectId = match.id;
    return match.id;
  }

  private async resolvePipelineId(projectId: string, pipelineName: string, signal?: AbortSignal): Promise<string> {
    const cached = this.pipelineIds.get(pipelineName);
    if (cached) return cached;
    const pipelines = await this.execJson(
      ["pipelines", "list", "--project-id", projectId, "--output", "json"],
      zNamedList,
      signal
    );
    const wanted = pipelineName.toLowerCase();
    const match = pipelines.find((p) => p.name.toLowerCase() === wanted);
    if (!match) throw new ValidationError("InvalidParameter", `pipeline not found in project: ${pipelineName}`);
    this.pipelineIds.set(pipelineName, match.id);
    return match.id;
  }

  async upload(dataFolder: string, opts: UploadOptions): Promise<UploadResult> {
    const folderPath = path.resolve(dataFolder);
    const st = await fs.stat(folderPath).catch(() => null);
    if (!st?.isDirectory()) {
      throw new ValidationError("InvalidParameter", `data folder not found: ${folderPath}`);
    }

    const projectId = await this.resolveProjectId(opts.signal);
    await this.exec(["files", "upload", "--project-id", projectId, "--recursive", folderPath, opts.folderName], opts.signal);

    const files = await this.execJson(["files", "list", "--project-id", projectId, "--output", "json"], zFileList, opts.signal);
    const folder = files.find((f) => f.name === opts.folderName && (f.type ?? "FOLDER").toUpperCase() === "FOLDER");
    if (!folder) throw new NetworkError(`uploaded folder not visible yet: ${opts.folderName}`);
    return { dataRef: folder.id };
  }

  async launch(request: LaunchRequest, opts: CallOptions = {}): Promise<LaunchResult> {
    const projectId = await this.resolveProjectId(opts.signal);
    const pipelineId = await this.resolvePipelineId(projectId, request.pipeline, opts.signal);
    const started = await this.execJson(
      [
        "pipelines",
        "start",
        "--project-id",
        projectId,
        "--pipeline-id",
        pipelineId,
        "--input",
        `folder_id=${request.dataRef}`,
        "--params-file",
        request.paramsFile,
        "--name",
        request.analysisName,
        "--output",
        "json"
      ],
      zStarted,
      opts.signal
    );
    return { analysisId: started.id };
  }

  async poll(analysisId: string, opts: CallOptions = {}): Promise<PollResult> {
    const analysis = await this.execJson(
      ["pipelines", "history", "--analysis-id", analysisId, "--output", "json"],
      zAnalysis,
      opts.signal
    );
    const status = normalizeAnalysisStatus(analysis.status);
    const folderId = analysis.output?.folder?.id;
    if (status === "succeeded" && folderId) this.outputFolders.set(analysisId, folderId);

    if (status === "failed") return { status, detail: `analysis ended with status ${analysis.status}` };
    return { status, detail: `status ${analysis.status}` };
  }

  async download(analysisId: string, destination: string, opts: CallOptions = {}): Promise<DownloadResult> {
    const folderId = this.outputFolders.get(analysisId);
    if (!folderId) throw new ValidationError("InvalidParameter", `no output folder recorded for analysis ${analysisId}`);

    const dest = path.resolve(destination);
    try {
      await fs.mkdir(dest, { recursive: true });
    } catch (err) {
      throw new IoError(`cannot create ${dest}: ${errorMessage(err)}`);
    }

    const projectId = await this.resolveProjectId(opts.signal);
    await this.exec(["files", "download", "--project-id", projectId, "--folder-id", folderId, "--output", dest], opts.signal);
    return { path: dest };
  }
}
