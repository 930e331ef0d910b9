import { spawn } from "child_process";
import { constants } from "os";
import { CancelledError, NetworkError } from "../core/errors.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  startedAt: string;
  finishedAt: string;
}

export interface ProcessRunOptions {
  cwd?: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
  /** Kill the child and fail with NetworkError once it has run this long. */
  timeoutMs?: number;
}

export interface ProcessRunner {
  run(argv: string[], opts?: ProcessRunOptions): Promise<ProcessResult>;
}

function appendLimited(chunks: Buffer[], chunk: Buffer, state: { bytes: number; truncated: boolean }): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  chunks.push(chunk);
  state.bytes = next;
}

/** Shell convention: a child killed by a signal exits 128 + the signal number. */
function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (!signal) return 1;
  const signo = Object.entries(constants.signals).find(([name]) => name === signal)?.[1] ?? 0;
  return 128 + signo;
}

export class SpawnProcessRunner implements ProcessRunner {
  async run(argv: string[], opts: ProcessRunOptions = {}): Promise<ProcessResult> {
    const [command, ...args] = argv;
    if (!command) throw new Error("argv must be non-empty");
    if (opts.signal?.aborted) throw new CancelledError(`cancelled before ${command} started`);
    const startedAt = new Date().toISOString();

    const child = spawn(command, args, {
      cwd: opts.cwd,
      env: { ...process.env, ...opts.env },
      stdio: ["ignore", "pipe", "pipe"] as const
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    const stdoutState = { bytes: 0, truncated: false };
    const stderrState = { bytes: 0, truncated: false };

    child.stdout.on("data", (chunk: Buffer) => appendLimited(stdoutChunks, chunk, stdoutState));
    child.stderr.on("data", (chunk: Buffer) => appendLimited(stderrChunks, chunk, stderrState));

    let aborted = false;
    const onAbort = () => {
      aborted = true;
      child.kill("SIGTERM");
    };
    opts.signal?.addEventListener("abort", onAbort, { once: true });

    let timedOut = false;
    const timer =
      opts.timeoutMs === undefined
        ? null
        : setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, opts.timeoutMs);

    const exitCode = await new Promise<number>((resolve, reject) => {
      child.on("error", reject);
      child.on("close", (code: number | null, signal: NodeJS.Signals | null) => resolve(exitCodeOf(code, signal)));
    }).finally(() => {
      if (timer) clearTimeout(timer);
      opts.signal?.removeEventListener("abort", onAbort);
    });

    if (aborted) throw new CancelledError(`${command} terminated by cancellation`);
    if (timedOut) throw new NetworkError(`${command} timed out after ${opts.timeoutMs}ms`);

    const finishedAt = new Date().toISOString();
    const stdout = Buffer.concat(stdoutChunks).toString("utf8") + (stdoutState.truncated ? "\n[stdout truncated]\n" : "");
    const stderr = Buffer.concat(stderrChunks).toString("utf8") + (stderrState.truncated ? "\n[stderr truncated]\n" : "");

    return { exitCode, stdout, stderr, startedAt, finishedAt };
  }
}
