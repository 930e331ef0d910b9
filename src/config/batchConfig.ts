import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { ConfigError } from "../core/errors.js";
import { sha256Prefixed } from "../core/ids.js";
import { DEFAULT_BACKOFF, type BackoffPolicy } from "../batch/backoff.js";
import { DEFAULT_COMMAND_TIMEOUT_MS } from "../platform/icaCli.js";

export type NotifyEvent = "start" | "complete" | "error";

export interface BatchSettings {
  maxConcurrentJobs: number;
  maxRetriesPerStage: number;
  perStageTimeoutMs: number;
  pollIntervalMs: number;
  backoff: BackoffPolicy;
  notifyOn: readonly NotifyEvent[];
}

export interface PlatformSettings {
  kind: "ica_cli" | "simulated";
  projectName: string | null;
  cliPath: string;
  commandTimeoutMs: number;
  simulatedRunningPolls: number;
}

export interface EmailSettings {
  to: string[];
  from: string;
  smtpHost: string;
  smtpPort: number;
  smtpUser: string | null;
  smtpPass: string | null;
}

export interface AppConfig {
  batch: BatchSettings;
  notify: { slackWebhook: string | null; email: EmailSettings | null };
  platform: PlatformSettings;
  paths: { workDir: string; outputDir: string };
  configHash: `sha256:${string}`;
}

export const DEFAULT_BATCH_SETTINGS: BatchSettings = {
  maxConcurrentJobs: 5,
  maxRetriesPerStage: 3,
  perStageTimeoutMs: 24 * 60 * 60 * 1000,
  pollIntervalMs: 60_000,
  backoff: DEFAULT_BACKOFF,
  notifyOn: ["start", "complete", "error"]
};

const zNotifyEvent = z.enum(["start", "complete", "error"]);

const zConfigFile = z.object({
  version: z.literal(1),
  batch: z
    .object({
      max_concurrent_jobs: z.number().int().min(1).optional(),
      max_retries_per_stage: z.number().int().min(0).optional(),
      per_stage_timeout_seconds: z.number().positive().optional(),
      poll_interval_seconds: z.number().positive().optional(),
      backoff: z
        .object({
          base_seconds: z.number().min(0).optional(),
          max_seconds: z.number().min(0).optional(),
          factor: z.number().min(1).optional()
        })
        .optional()
    })
    .optional(),
  notify: z
    .object({
      on: z.array(zNotifyEvent).optional(),
      slack_webhook: z.string().nullish(),
      email: z
        .object({
          email_to: z.union([z.string(), z.array(z.string())]),
          email_from: z.string().optional(),
          smtp_host: z.string(),
          smtp_port: z.number().int().min(1).max(65535).optional(),
          smtp_user: z.string().nullish(),
          smtp_pass: z.string().nullish()
        })
        .nullish()
    })
    .optional(),
  platform: z
    .object({
      kind: z.enum(["ica_cli", "simulated"]).optional(),
      project_name: z.string().nullish(),
      cli_path: z.string().optional(),
      command_timeout_seconds: z.number().positive().optional(),
      simulated_running_polls: z.number().int().min(0).optional()
    })
    .optional(),
  paths: z
    .object({
      work_dir: z.string().optional(),
      output_dir: z.string().optional()
    })
    .optional()
});

/** `${VAR}` or `$VAR` resolve from the environment; unset or blank resolves to null. */
export function expandEnvToken(value: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (m) {
    const varName = m[1];
    if (!varName) return null;
    const v = env[varName]?.trim();
    return v ? v : null;
  }
  return trimmed ? value : null;
}

function optionalString(value: string | null | undefined, env: NodeJS.ProcessEnv): string | null {
  if (value === null || value === undefined) return null;
  return expandEnvToken(value, env);
}

type EmailFileSection = NonNullable<NonNullable<z.infer<typeof zConfigFile>["notify"]>["email"]>;

/** Email is enabled only when both the recipients and the SMTP host resolve. */
function emailSettings(file: EmailFileSection | null | undefined, env: NodeJS.ProcessEnv): EmailSettings | null {
  if (!file) return null;
  const listed = Array.isArray(file.email_to) ? file.email_to : [file.email_to];
  const to = listed.flatMap((entry) =>
    (expandEnvToken(entry, env) ?? "")
      .split(",")
      .map((addr) => addr.trim())
      .filter(Boolean)
  );
  const smtpHost = expandEnvToken(file.smtp_host, env);
  if (to.length === 0 || !smtpHost) return null;
  return {
    to,
    from: optionalString(file.email_from, env) ?? "seqbatch@localhost",
    smtpHost,
    smtpPort: file.smtp_port ?? 587,
    smtpUser: optionalString(file.smtp_user, env),
    smtpPass: optionalString(file.smtp_pass, env)
  };
}

function secondsToMs(seconds: number | undefined, fallbackMs: number): number {
  return seconds === undefined ? fallbackMs : Math.round(seconds * 1000);
}

export function validateBatchSettings(settings: BatchSettings): BatchSettings {
  const problems: string[] = [];
  if (!Number.isInteger(settings.maxConcurrentJobs) || settings.maxConcurrentJobs < 1) {
    problems.push("maxConcurrentJobs must be an integer >= 1");
  }
  if (!Number.isInteger(settings.maxRetriesPerStage) || settings.maxRetriesPerStage < 0) {
    problems.push("maxRetriesPerStage must be an integer >= 0");
  }
  if (!(settings.perStageTimeoutMs > 0)) problems.push("perStageTimeoutMs must be > 0");
  if (!(settings.pollIntervalMs > 0)) problems.push("pollIntervalMs must be > 0");
  if (!(settings.backoff.factor >= 1)) problems.push("backoff.factor must be >= 1");
  if (!(settings.backoff.baseMs >= 0) || !(settings.backoff.maxMs >= settings.backoff.baseMs)) {
    problems.push("backoff requires 0 <= baseMs <= maxMs");
  }
  if (problems.length) throw new ConfigError(`invalid batch settings: ${problems.join("; ")}`);
  return settings;
}

export function parseAppConfig(raw: unknown, source: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = zConfigFile.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`invalid config at ${source}: ${parsed.error.issues.map((i) => `${i.path.map(String).join(".")}: ${i.message}`).join("; ")}`);
  }
  const file = parsed.data;
  const d = DEFAULT_BATCH_SETTINGS;

  const batch = validateBatchSettings({
    maxConcurrentJobs: file.batch?.max_concurrent_jobs ?? d.maxConcurrentJobs,
    maxRetriesPerStage: file.batch?.max_retries_per_stage ?? d.maxRetriesPerStage,
    perStageTimeoutMs: secondsToMs(file.batch?.per_stage_timeout_seconds, d.perStageTimeoutMs),
    pollIntervalMs: secondsToMs(file.batch?.poll_interval_seconds, d.pollIntervalMs),
    backoff: {
      baseMs: secondsToMs(file.batch?.backoff?.base_seconds, d.backoff.baseMs),
      maxMs: secondsToMs(file.batch?.backoff?.max_seconds, d.backoff.maxMs),
      factor: file.batch?.backoff?.factor ?? d.backoff.factor
    },
    notifyOn: [...new Set(file.notify?.on ?? d.notifyOn)]
  });

  const platform: PlatformSettings = {
    kind: file.platform?.kind ?? "ica_cli",
    projectName: optionalString(file.platform?.project_name, env),
    cliPath: optionalString(file.platform?.cli_path, env) ?? "ica",
    commandTimeoutMs: secondsToMs(file.platform?.command_timeout_seconds, DEFAULT_COMMAND_TIMEOUT_MS),
    simulatedRunningPolls: file.platform?.simulated_running_polls ?? 2
  };

  return {
    batch,
    notify: {
      slackWebhook: optionalString(file.notify?.slack_webhook, env),
      email: emailSettings(file.notify?.email, env)
    },
    platform,
    paths: {
      workDir: optionalString(file.paths?.work_dir, env) ?? "var/work",
      outputDir: optionalString(file.paths?.output_dir, env) ?? "batch_results"
    },
    configHash: sha256Prefixed(JSON.stringify(file))
  };
}

export async function loadConfigFromFile(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const raw = await fs.readFile(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    throw new ConfigError(`config at ${filePath} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseAppConfig(parsed, filePath, env);
}
