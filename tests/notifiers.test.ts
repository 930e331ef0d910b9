import { describe, it, expect } from "vitest";
import type { AppConfig, EmailSettings } from "../src/config/batchConfig.js";
import { DEFAULT_BATCH_SETTINGS } from "../src/config/batchConfig.js";
import { EventLog } from "../src/logging/eventLog.js";
import { createNotifier } from "../src/notify/index.js";
import {
  EmailNotifier,
  FanoutNotifier,
  LogNotifier,
  SlackWebhookNotifier,
  type FetchLike,
  type MailMessage,
  type MailTransport
} from "../src/notify/notifiers.js";
import { formatNotification, type JobSummary } from "../src/notify/types.js";
import { RecordingNotifier } from "./helpers.js";

const summary = (overrides: Partial<JobSummary> = {}): JobSummary => ({
  batchId: "batch_test",
  sampleId: "s1",
  state: "completed",
  detail: null,
  analysisId: "ana.1",
  attempts: { upload: 1, launch: 1, poll: 3, download: 1 },
  ...overrides
});

const EMAIL: EmailSettings = {
  to: ["lab@example.test", "oncall@example.test"],
  from: "seqbatch@example.test",
  smtpHost: "smtp.example.test",
  smtpPort: 587,
  smtpUser: "seqbatch",
  smtpPass: "test-secret"
};

class RecordingTransport implements MailTransport {
  readonly sent: MailMessage[] = [];

  constructor(private readonly failure: Error | null = null) {}

  async sendMail(message: MailMessage): Promise<unknown> {
    if (this.failure) throw this.failure;
    this.sent.push(message);
    return { messageId: `<${this.sent.length}@example.test>` };
  }
}

function config(slackWebhook: string | null, email: EmailSettings | null = null): AppConfig {
  return {
    batch: DEFAULT_BATCH_SETTINGS,
    notify: { slackWebhook, email },
    platform: { kind: "simulated", projectName: null, cliPath: "ica", commandTimeoutMs: 1_000, simulatedRunningPolls: 0 },
    paths: { workDir: "var/work", outputDir: "out" },
    configHash: "sha256:test"
  };
}

describe("formatNotification", () => {
  it("renders one line per checkpoint", () => {
    expect(formatNotification("start", summary({ state: "uploading" }))).toBe("[seqbatch batch_test] s1 started");
    expect(formatNotification("complete", summary())).toBe("[seqbatch batch_test] s1 completed (analysis ana.1)");
    expect(formatNotification("error", summary({ state: "timed_out", detail: "poll timed out after 35ms" }))).toBe(
      "[seqbatch batch_test] s1 timed_out: poll timed out after 35ms"
    );
  });
});

describe("notifiers", () => {
  it("logs notifications to the event log", async () => {
    const log = new EventLog();
    await new LogNotifier(log).notify("complete", summary());

    expect(log.events("notify.complete")).toEqual([
      {
        ts: expect.any(String),
        kind: "notify.complete",
        message: "[seqbatch batch_test] s1 completed (analysis ana.1)",
        data: { sample_id: "s1", state: "completed" }
      }
    ]);
  });

  it("posts the message text to the webhook", async () => {
    const posted: Array<{ url: string; body: string; method: string }> = [];
    const fetchImpl: FetchLike = async (url, init) => {
      posted.push({ url, body: init.body, method: init.method });
      return { ok: true, status: 200 };
    };

    await new SlackWebhookNotifier("https://hooks.example.test/placeholder", { fetchImpl }).notify("start", summary());
    expect(posted).toEqual([
      {
        url: "https://hooks.example.test/placeholder",
        method: "POST",
        body: JSON.stringify({ text: "[seqbatch batch_test] s1 started" })
      }
    ]);
  });

  it("treats a non-2xx webhook response as a failure", async () => {
    const fetchImpl: FetchLike = async () => ({ ok: false, status: 503 });
    const notifier = new SlackWebhookNotifier("https://hooks.example.test/placeholder", { fetchImpl });
    await expect(notifier.notify("error", summary())).rejects.toThrow("slack webhook responded 503");
  });

  it("mails the formatted line to every recipient", async () => {
    const transport = new RecordingTransport();
    await new EmailNotifier(EMAIL, { transport }).notify(
      "error",
      summary({ state: "failed", detail: "launch exhausted retries: boom", analysisId: null })
    );

    expect(transport.sent).toEqual([
      {
        from: "seqbatch@example.test",
        to: "lab@example.test, oncall@example.test",
        subject: "[seqbatch batch_test] s1 failed: launch exhausted retries: boom",
        text: "[seqbatch batch_test] s1 failed: launch exhausted retries: boom\n\nbatch: batch_test\nsample: s1\nstate: failed\n"
      }
    ]);
  });

  it("surfaces SMTP failures to the caller", async () => {
    const notifier = new EmailNotifier(EMAIL, { transport: new RecordingTransport(new Error("connect ECONNREFUSED")) });
    await expect(notifier.notify("complete", summary())).rejects.toThrow("connect ECONNREFUSED");
  });

  it("delivers to every target even when one fails", async () => {
    const good = new RecordingNotifier();
    const fanout = new FanoutNotifier([new RecordingNotifier(new Error("smtp down")), good]);

    await expect(fanout.notify("complete", summary())).rejects.toThrow("notification failed: smtp down");
    expect(good.count("complete")).toBe(1);
  });

  it("adds the webhook target only when one is configured", async () => {
    expect(createNotifier(config(null), new EventLog())).toBeInstanceOf(LogNotifier);
    expect(createNotifier(config("https://hooks.example.test/placeholder"), new EventLog())).toBeInstanceOf(FanoutNotifier);
    expect(createNotifier(config(null, EMAIL), new EventLog())).toBeInstanceOf(FanoutNotifier);
  });
});
