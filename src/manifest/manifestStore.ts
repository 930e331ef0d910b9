import { promises as fs } from "fs";
import path from "path";
import { parse as parseCsv } from "csv-parse/sync";
import YAML from "yaml";
import * as z from "zod/v4";
import { requiresTargetBed } from "../batch/pipelineParams.js";
import { ValidationError, errorMessage, type ValidationErrorKind } from "../core/errors.js";
import type { JobDescriptor, ScalarParam } from "../core/job.js";

// sample_id names a workspace directory and a platform folder, so keep it path-safe.
const SAMPLE_ID_RE = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

const REQUIRED_FIELDS = ["sample_id", "data_folder", "pipeline", "reference"] as const;

const zScalar = z.union([z.string(), z.number(), z.boolean()]);

const zManifestEntry = z.object({
  sample_id: z.string().regex(SAMPLE_ID_RE, "sample_id must be 1-128 chars of [A-Za-z0-9._-]"),
  data_folder: z.string().min(1),
  pipeline: z.string().min(1),
  reference: z.string().min(1),
  target_bed: z.string().min(1).nullish(),
  custom_params: z.record(z.string(), zScalar).nullish()
});

type ManifestEntry = z.infer<typeof zManifestEntry>;

interface Issue {
  kind: ValidationErrorKind;
  message: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function entriesOf(manifest: unknown): unknown[] {
  if (Array.isArray(manifest)) return manifest;
  if (isRecord(manifest) && Array.isArray(manifest.samples)) return manifest.samples;
  throw new ValidationError("MalformedManifest", "manifest must be a list of samples (or an object with a samples list)");
}

function missingFields(entry: unknown): string[] {
  if (!isRecord(entry)) return [];
  return REQUIRED_FIELDS.filter((field) => {
    const v = entry[field];
    return v === undefined || v === null || (typeof v === "string" && v.trim().length === 0);
  });
}

function toDescriptor(entry: ManifestEntry): JobDescriptor {
  const customParams: Record<string, ScalarParam> = { ...(entry.custom_params ?? {}) };
  return Object.freeze({
    sampleId: entry.sample_id,
    dataFolder: entry.data_folder,
    pipeline: entry.pipeline,
    reference: entry.reference,
    targetBed: entry.target_bed ?? null,
    customParams: Object.freeze(customParams)
  });
}

/**
 * Validates a parsed manifest into frozen job descriptors.
 *
 * All-or-nothing: every problem in the manifest is collected into a single
 * ValidationError, whose kind is taken from the first problem found.
 */
export function loadManifest(manifest: unknown): JobDescriptor[] {
  const entries = entriesOf(manifest);
  if (!entries.length) {
    throw new ValidationError("MalformedManifest", "manifest contains no samples");
  }

  const issues: Issue[] = [];
  const descriptors: JobDescriptor[] = [];
  const seen = new Map<string, number>();

  entries.forEach((entry, index) => {
    if (!isRecord(entry)) {
      issues.push({ kind: "MalformedManifest", message: `entry ${index}: expected a mapping` });
      return;
    }

    const missing = missingFields(entry);
    if (missing.length) {
      for (const field of missing) {
        issues.push({ kind: "MissingField", message: `entry ${index}: missing required field ${field}` });
      }
      return;
    }

    const parsed = zManifestEntry.safeParse(entry);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        const where = issue.path.length ? issue.path.map(String).join(".") : "(entry)";
        issues.push({ kind: "MalformedManifest", message: `entry ${index}: ${where}: ${issue.message}` });
      }
      return;
    }

    if (requiresTargetBed(parsed.data.pipeline) && !parsed.data.target_bed) {
      issues.push({
        kind: "MissingField",
        message: `entry ${index}: pipeline ${parsed.data.pipeline} requires target_bed`
      });
      return;
    }

    const first = seen.get(parsed.data.sample_id);
    if (first !== undefined) {
      issues.push({
        kind: "DuplicateId",
        message: `entry ${index}: duplicate sample_id ${parsed.data.sample_id} (first at entry ${first})`
      });
      return;
    }
    seen.set(parsed.data.sample_id, index);
    descriptors.push(toDescriptor(parsed.data));
  });

  const head = issues[0];
  if (head) {
    const messages = issues.map((i) => i.message);
    const summary = issues.length === 1 ? head.message : `${head.message} (+${issues.length - 1} more)`;
    throw new ValidationError(head.kind, summary, messages);
  }
  return descriptors;
}

export function loadManifestText(text: string): JobDescriptor[] {
  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError("MalformedManifest", `manifest is not valid YAML/JSON: ${message}`);
  }
  return loadManifest(parsed);
}

function csvScalar(raw: string): ScalarParam {
  if (raw === "true") return true;
  if (raw === "false") return false;
  if (/^-?\d+(\.\d+)?$/.test(raw)) return Number(raw);
  return raw;
}

/** A custom_params cell is a JSON object, or `key=value` pairs separated by `;`. */
function csvCustomParams(cell: string, index: number): unknown {
  if (cell.startsWith("{")) {
    try {
      return JSON.parse(cell);
    } catch (err) {
      throw new ValidationError("MalformedManifest", `entry ${index}: custom_params is not valid JSON: ${errorMessage(err)}`);
    }
  }
  const params: Record<string, ScalarParam> = {};
  for (const pair of cell.split(";")) {
    if (!pair.trim()) continue;
    const eq = pair.indexOf("=");
    const key = eq > 0 ? pair.slice(0, eq).trim() : "";
    if (!key) throw new ValidationError("MalformedManifest", `entry ${index}: custom_params pair must be key=value: ${pair.trim()}`);
    params[key] = csvScalar(pair.slice(eq + 1).trim());
  }
  return params;
}

/** One sample per row under a header line; empty optional cells are left out. */
export function loadManifestCsv(text: string): JobDescriptor[] {
  let rows: unknown;
  try {
    rows = parseCsv(text, { columns: true, skip_empty_lines: true, trim: true });
  } catch (err) {
    throw new ValidationError("MalformedManifest", `manifest is not valid CSV: ${errorMessage(err)}`);
  }
  if (!Array.isArray(rows)) throw new ValidationError("MalformedManifest", "manifest is not valid CSV");

  const entries = rows.map((row: unknown, index) => {
    if (!isRecord(row)) return row;
    const entry: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(row)) {
      if (typeof value !== "string" || value === "") continue;
      entry[key] = key === "custom_params" ? csvCustomParams(value, index) : value;
    }
    return entry;
  });
  return loadManifest(entries);
}

export async function loadManifestFile(filePath: string): Promise<JobDescriptor[]> {
  const text = await fs.readFile(filePath, "utf8");
  if (path.extname(filePath).toLowerCase() === ".csv") return loadManifestCsv(text);
  return loadManifestText(text);
}
