import type { AppConfig } from "../config/batchConfig.js";
import type { EventLog } from "../logging/eventLog.js";
import { EmailNotifier, FanoutNotifier, LogNotifier, SlackWebhookNotifier } from "./notifiers.js";
import type { Notifier } from "./types.js";

export function createNotifier(config: AppConfig, log: EventLog): Notifier {
  const targets: Notifier[] = [new LogNotifier(log)];
  if (config.notify.slackWebhook) targets.push(new SlackWebhookNotifier(config.notify.slackWebhook));
  if (config.notify.email) targets.push(new EmailNotifier(config.notify.email));
  return targets.length === 1 && targets[0] ? targets[0] : new FanoutNotifier(targets);
}
