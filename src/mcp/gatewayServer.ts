import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import path from "path";
import { BatchOrchestrator } from "../batch/orchestrator.js";
import type { Clock } from "../batch/clock.js";
import { writeBatchReport } from "../batch/report.js";
import type { AppConfig } from "../config/batchConfig.js";
import { ConfigError, ValidationError } from "../core/errors.js";
import { newBatchId, sha256Prefixed } from "../core/ids.js";
import { isTerminal, type JobRecord, type JobState } from "../core/job.js";
import { EventLog } from "../logging/eventLog.js";
import { loadManifestText } from "../manifest/manifestStore.js";
import { createNotifier } from "../notify/index.js";
import type { Notifier } from "../notify/types.js";
import type { PlatformClient } from "../platform/types.js";
import type { PostgresStore, StoredJob } from "../store/postgresStore.js";
import { LiveBatchRegistry, type LiveBatch } from "./liveBatches.js";
import {
  zBatchCancelInput,
  zBatchCancelOutput,
  zBatchGetInput,
  zBatchGetOutput,
  zBatchListInput,
  zBatchListOutput,
  zBatchStartInput,
  zBatchStartOutput,
  zManifestValidateInput,
  zManifestValidateOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  store: PostgresStore;
  config: AppConfig;
  platform: PlatformClient;
  batches?: LiveBatchRegistry;
  /** Builds the notifier for one batch; defaults to the configured log/Slack fan-out. */
  notifierFor?: (log: EventLog) => Notifier;
  clock?: Clock;
}

type JobRow = {
  sample_id: string;
  state: JobState;
  error: string | null;
  analysis_id: string | null;
  output_path: string | null;
  attempts: { upload: number; launch: number; poll: number; download: number };
};

function liveJobRow(r: JobRecord): JobRow {
  return {
    sample_id: r.descriptor.sampleId,
    state: r.state,
    error: r.state === "completed" ? null : r.lastError,
    analysis_id: r.analysisId,
    output_path: r.outputPath,
    attempts: { ...r.attempts }
  };
}

function storedJobRow(j: StoredJob): JobRow {
  return {
    sample_id: j.sampleId,
    state: j.state,
    error: j.state === "completed" ? null : j.error,
    analysis_id: j.analysisId,
    output_path: j.outputPath,
    attempts: { ...j.attempts }
  };
}

function countStates(rows: readonly JobRow[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const r of rows) out[r.state] = (out[r.state] ?? 0) + 1;
  return out;
}

function rethrowAsMcp(e: unknown): never {
  if (e instanceof McpError) throw e;
  if (e instanceof ValidationError || e instanceof ConfigError) {
    throw new McpError(ErrorCode.InvalidParams, e.message);
  }
  throw e;
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "seqbatch-gateway",
    version: "0.1.0"
  });

  const batches = deps.batches ?? new LiveBatchRegistry();
  const notifierFor = deps.notifierFor ?? ((log: EventLog) => createNotifier(deps.config, log));

  function liveView(live: LiveBatch) {
    const jobs = live.run.tracker.snapshot().map(liveJobRow);
    const done = live.result !== null || (live.finished && jobs.every((j) => isTerminal(j.state)));
    return {
      batch_id: live.run.batchId,
      status: done ? ("finished" as const) : ("running" as const),
      source: "live" as const,
      ok: live.result ? live.result.ok : null,
      started_at: live.run.startedAt,
      finished_at: live.result ? live.result.finishedAt : null,
      states: countStates(jobs),
      jobs
    };
  }

  mcp.registerTool(
    "manifest_validate",
    {
      description: "Validate a batch manifest (YAML or JSON) without starting anything.",
      inputSchema: zManifestValidateInput,
      outputSchema: zManifestValidateOutput
    },
    async (args) => {
      try {
        const descriptors = loadManifestText(args.manifest_text);
        const structured = { ok: true, kind: null, samples: descriptors.map((d) => d.sampleId), issues: [] };
        return {
          content: [{ type: "text", text: `Manifest ok: ${descriptors.length} sample(s)` }],
          structuredContent: structured
        };
      } catch (e) {
        if (!(e instanceof ValidationError)) throw e;
        const structured = { ok: false, kind: e.kind, samples: [], issues: e.issues };
        return {
          content: [{ type: "text", text: `Manifest invalid (${e.kind}): ${e.message}` }],
          structuredContent: structured
        };
      }
    }
  );

  mcp.registerTool(
    "batch_start",
    {
      description: "Start a batch from a manifest; returns immediately with the batch_id.",
      inputSchema: zBatchStartInput,
      outputSchema: zBatchStartOutput
    },
    async (args) => {
      try {
        const descriptors = loadManifestText(args.manifest_text);
        const { config } = deps;
        const batchId = newBatchId();
        const settings = {
          ...config.batch,
          maxConcurrentJobs: args.max_concurrent_jobs ?? config.batch.maxConcurrentJobs
        };
        const log = new EventLog({ filePath: path.join(config.paths.outputDir, batchId, "batch.log") });
        const orchestrator = new BatchOrchestrator({
          platform: deps.platform,
          notifier: notifierFor(log),
          settings,
          log,
          clock: deps.clock,
          workspaceRootDir: config.paths.workDir,
          outputDir: config.paths.outputDir
        });

        const run = orchestrator.start(descriptors, { batchId });
        batches.add(run, log, async (result) => {
          await writeBatchReport(config.paths.outputDir, result);
          await deps.store.saveBatchResult(result, log.events(), {
            platform: deps.platform.kind,
            manifestHash: sha256Prefixed(args.manifest_text),
            configHash: config.configHash
          });
        });

        const structured = {
          batch_id: batchId,
          jobs: descriptors.length,
          max_concurrent_jobs: settings.maxConcurrentJobs,
          platform: deps.platform.kind
        };
        return {
          content: [{ type: "text", text: `Started ${batchId} (${descriptors.length} job(s))` }],
          structuredContent: structured
        };
      } catch (e) {
        rethrowAsMcp(e);
      }
    }
  );

  mcp.registerTool(
    "batch_get",
    {
      description: "Report a batch: live job states while it runs, stored results afterwards.",
      inputSchema: zBatchGetInput,
      outputSchema: zBatchGetOutput
    },
    async (args) => {
      const live = batches.get(args.batch_id);
      if (live) {
        const view = liveView(live);
        return {
          content: [{ type: "text", text: `${view.batch_id}: ${view.status}` }],
          structuredContent: view
        };
      }

      const stored = await deps.store.getBatch(args.batch_id);
      if (!stored) throw new McpError(ErrorCode.InvalidParams, `unknown batch_id: ${args.batch_id}`);

      const jobs = stored.jobs.map(storedJobRow);
      const structured = {
        batch_id: args.batch_id,
        status: "finished" as const,
        source: "store" as const,
        ok: stored.ok,
        started_at: stored.startedAt,
        finished_at: stored.finishedAt,
        states: countStates(jobs),
        jobs
      };
      return {
        content: [{ type: "text", text: `${args.batch_id}: finished (${stored.ok ? "ok" : "with failures"})` }],
        structuredContent: structured
      };
    }
  );

  mcp.registerTool(
    "batch_cancel",
    {
      description: "Cancel a running batch: pending jobs never start, in-flight jobs stop at their next wait.",
      inputSchema: zBatchCancelInput,
      outputSchema: zBatchCancelOutput
    },
    async (args) => {
      const live = batches.get(args.batch_id);
      if (!live) {
        const stored = await deps.store.getBatch(args.batch_id);
        if (!stored) throw new McpError(ErrorCode.InvalidParams, `unknown batch_id: ${args.batch_id}`);
      }

      const cancelled = live !== null && live.result === null && !live.run.cancelled;
      if (cancelled) live.run.cancel();
      return {
        content: [{ type: "text", text: cancelled ? `Cancelling ${args.batch_id}` : `${args.batch_id} is not running` }],
        structuredContent: { batch_id: args.batch_id, cancelled }
      };
    }
  );

  mcp.registerTool(
    "batch_list",
    {
      description: "List recently finished batches from the store.",
      inputSchema: zBatchListInput,
      outputSchema: zBatchListOutput
    },
    async (args) => {
      const rows = await deps.store.listBatches(args.limit);
      const structured = {
        batches: rows.map((b) => ({
          batch_id: b.batchId,
          platform: b.platform,
          started_at: b.startedAt,
          finished_at: b.finishedAt,
          total: b.total,
          ok: b.ok
        }))
      };
      return {
        content: [{ type: "text", text: `${rows.length} batch(es)` }],
        structuredContent: structured
      };
    }
  );

  return mcp;
}
