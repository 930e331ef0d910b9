#!/usr/bin/env node
import { promises as fs } from "fs";
import path from "path";
import { BatchOrchestrator } from "../src/batch/orchestrator.js";
import { exitCodeFor, formatSummaryLines, writeBatchReport } from "../src/batch/report.js";
import { loadConfigFromFile, type BatchSettings } from "../src/config/batchConfig.js";
import { ValidationError } from "../src/core/errors.js";
import { newBatchId, sha256Prefixed } from "../src/core/ids.js";
import type { BatchResult } from "../src/core/job.js";
import { applySqlFile, createDb, createPgPool } from "../src/db/connection.js";
import { EventLog } from "../src/logging/eventLog.js";
import { loadManifestFile } from "../src/manifest/manifestStore.js";
import { createNotifier } from "../src/notify/index.js";
import { createPlatformClient } from "../src/platform/index.js";
import { PostgresStore } from "../src/store/postgresStore.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/batch_run.ts --manifest <file> [--config <yaml>] [--max-concurrent <n>] [--output-dir <dir>]",
    "                           [--dry-run] [--validate-only] [--verbose]",
    "",
    "  --dry-run        run against the simulated platform (config defaults to config/dry-run.batch.yaml)",
    "  --validate-only  check the manifest and exit",
    "  --manifest       YAML or JSON list of samples, or a .csv sample sheet with a header row",
    "",
    "env:",
    "  BATCH_CONFIG_PATH (optional, default config/default.batch.yaml)",
    "  DATABASE_URL (optional, results are saved to Postgres when set)",
    "  AUTO_SCHEMA (optional, default true: apply db/schema.sql before saving)",
    ""
  ].join("\n");
}

const FLAGS = new Set(["dry-run", "validate-only", "verbose", "help"]);

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (FLAGS.has(key)) {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

function stringArg(args: Record<string, string | boolean>, key: string): string | null {
  const v = args[key];
  return typeof v === "string" ? v : null;
}

async function saveToStore(
  databaseUrl: string,
  result: BatchResult,
  log: EventLog,
  meta: { platform: string; manifestHash: string; configHash: string }
): Promise<void> {
  const pool = createPgPool(databaseUrl);
  try {
    if ((process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false") {
      await applySqlFile(pool, "db/schema.sql");
    }
    const store = new PostgresStore(createDb(pool));
    await store.saveBatchResult(result, log.events(), meta);
  } finally {
    await pool.end();
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }

  const manifestPath = stringArg(args, "manifest");
  if (!manifestPath) throw new Error(`--manifest is required\n\n${usage()}`);

  const dryRun = Boolean(args["dry-run"]);
  const configPath =
    stringArg(args, "config") ??
    (dryRun ? "config/dry-run.batch.yaml" : (process.env.BATCH_CONFIG_PATH ?? "config/default.batch.yaml"));

  const descriptors = await loadManifestFile(manifestPath);
  if (args["validate-only"]) {
    process.stdout.write(`manifest ok: ${descriptors.length} sample(s)\n`);
    for (const d of descriptors) process.stdout.write(`  ${d.sampleId} ${d.pipeline} ${d.reference}\n`);
    return;
  }

  const config = await loadConfigFromFile(configPath);

  const maxConcurrentRaw = stringArg(args, "max-concurrent");
  if (maxConcurrentRaw !== null && !/^[1-9][0-9]*$/.test(maxConcurrentRaw)) {
    throw new Error(`invalid --max-concurrent: ${maxConcurrentRaw}`);
  }
  const settings: BatchSettings = {
    ...config.batch,
    maxConcurrentJobs: maxConcurrentRaw !== null ? Number(maxConcurrentRaw) : config.batch.maxConcurrentJobs
  };

  const platform = createPlatformClient(dryRun ? { ...config.platform, kind: "simulated" } : config.platform);
  const outputDir = stringArg(args, "output-dir") ?? config.paths.outputDir;
  const batchId = newBatchId();
  const log = new EventLog({ filePath: path.join(outputDir, batchId, "batch.log"), echo: Boolean(args.verbose) });

  const orchestrator = new BatchOrchestrator({
    platform,
    notifier: createNotifier(config, log),
    settings,
    log,
    workspaceRootDir: config.paths.workDir,
    outputDir
  });

  console.error(`batch ${batchId}: ${descriptors.length} sample(s) on ${platform.kind}, max ${settings.maxConcurrentJobs} concurrent`);
  const run = orchestrator.start(descriptors, { batchId });
  const onSigint = () => {
    console.error(`cancelling batch ${batchId}`);
    run.cancel();
  };
  process.once("SIGINT", onSigint);

  let result: BatchResult;
  try {
    result = await run.result;
  } finally {
    process.off("SIGINT", onSigint);
  }

  const report = await writeBatchReport(outputDir, result);

  const databaseUrl = process.env.DATABASE_URL;
  if (databaseUrl) {
    await saveToStore(databaseUrl, result, log, {
      platform: platform.kind,
      manifestHash: sha256Prefixed(await fs.readFile(manifestPath)),
      configHash: config.configHash
    });
  }

  for (const line of formatSummaryLines(result)) process.stdout.write(line + "\n");
  process.stdout.write(`report: ${report.summaryPath}\n`);
  process.exitCode = exitCodeFor(result);
}

main().catch((err) => {
  if (err instanceof ValidationError) {
    console.error(`invalid manifest (${err.kind}):`);
    for (const issue of err.issues) console.error(`  ${issue}`);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});
