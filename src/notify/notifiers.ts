import nodemailer from "nodemailer";
import type { EmailSettings } from "../config/batchConfig.js";
import { errorMessage } from "../core/errors.js";
import type { EventLog } from "../logging/eventLog.js";
import { formatNotification, type JobSummary, type Notifier, type NotifyEvent } from "./types.js";

export class LogNotifier implements Notifier {
  constructor(private readonly log: EventLog) {}

  async notify(event: NotifyEvent, summary: JobSummary): Promise<void> {
    this.log.event(`notify.${event}`, formatNotification(event, summary), {
      sample_id: summary.sampleId,
      state: summary.state
    });
  }
}

export type FetchLike = (url: string, init: { method: string; headers: Record<string, string>; body: string; signal?: AbortSignal }) => Promise<{ ok: boolean; status: number }>;

/** Posts `{ text }` to a Slack incoming webhook. */
export class SlackWebhookNotifier implements Notifier {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(
    private readonly webhookUrl: string,
    opts: { fetchImpl?: FetchLike; timeoutMs?: number } = {}
  ) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
  }

  async notify(event: NotifyEvent, summary: JobSummary): Promise<void> {
    const res = await this.fetchImpl(this.webhookUrl, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ text: formatNotification(event, summary) }),
      signal: AbortSignal.timeout(this.timeoutMs)
    });
    if (!res.ok) throw new Error(`slack webhook responded ${res.status}`);
  }
}

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

/** The slice of a nodemailer transport the email notifier sends through. */
export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export function createSmtpTransport(settings: EmailSettings): MailTransport {
  return nodemailer.createTransport({
    host: settings.smtpHost,
    port: settings.smtpPort,
    secure: settings.smtpPort === 465,
    auth: settings.smtpUser ? { user: settings.smtpUser, pass: settings.smtpPass ?? "" } : undefined
  });
}

/** One plain-text message per notification, subject and body both carrying the formatted line. */
export class EmailNotifier implements Notifier {
  private readonly transport: MailTransport;

  constructor(
    private readonly settings: EmailSettings,
    opts: { transport?: MailTransport } = {}
  ) {
    this.transport = opts.transport ?? createSmtpTransport(settings);
  }

  async notify(event: NotifyEvent, summary: JobSummary): Promise<void> {
    const text = formatNotification(event, summary);
    await this.transport.sendMail({
      from: this.settings.from,
      to: this.settings.to.join(", "),
      subject: text,
      text: `${text}\n\nbatch: ${summary.batchId}\nsample: ${summary.sampleId}\nstate: ${summary.state}\n`
    });
  }
}

/** Delivers to every target; one target failing does not stop the others. */
export class FanoutNotifier implements Notifier {
  constructor(private readonly targets: readonly Notifier[]) {}

  async notify(event: NotifyEvent, summary: JobSummary): Promise<void> {
    const results = await Promise.allSettled(this.targets.map((t) => t.notify(event, summary)));
    const failures = results.flatMap((r) => (r.status === "rejected" ? [errorMessage(r.reason)] : []));
    if (failures.length) throw new Error(`notification failed: ${failures.join("; ")}`);
  }
}
