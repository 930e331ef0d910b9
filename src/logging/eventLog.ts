import { appendFileSync, mkdirSync } from "fs";
import path from "path";
import type { JsonObject } from "../core/json.js";

export interface LogEvent {
  ts: string;
  kind: string;
  message: string;
  data: JsonObject | null;
}

export interface EventLogOptions {
  /** JSON-lines file the events are appended to. */
  filePath?: string | null;
  /** Also write each line to stderr. */
  echo?: boolean;
}

/**
 * Structured event log for a batch: one JSON object per line, kept in memory
 * for the store and mirrored to stderr and/or a file.
 */
export class EventLog {
  private readonly lines: LogEvent[] = [];
  private filePath: string | null = null;
  private readonly echo: boolean;

  constructor(opts: EventLogOptions = {}) {
    this.echo = opts.echo ?? false;
    if (opts.filePath) this.attachFile(opts.filePath);
  }

  attachFile(filePath: string): void {
    mkdirSync(path.dirname(filePath), { recursive: true });
    this.filePath = filePath;
  }

  event(kind: string, message: string, data: JsonObject | null = null): void {
    const entry: LogEvent = { ts: new Date().toISOString(), kind, message, data };
    this.lines.push(entry);

    const line = JSON.stringify(entry);
    if (this.echo) console.error(line);
    if (this.filePath) appendFileSync(this.filePath, line + "\n", "utf8");
  }

  events(kind?: string): LogEvent[] {
    return kind ? this.lines.filter((e) => e.kind === kind) : [...this.lines];
  }
}
