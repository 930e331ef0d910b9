import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { expandEnvToken, loadConfigFromFile, parseAppConfig, validateBatchSettings, DEFAULT_BATCH_SETTINGS } from "../src/config/batchConfig.js";
import { ConfigError } from "../src/core/errors.js";

describe("batch config", () => {
  let tmpDir: string | null = null;

  afterEach(async () => {
    if (tmpDir) await rm(tmpDir, { recursive: true, force: true });
    tmpDir = null;
  });

  it("loads the default config and expands environment references", async () => {
    const config = await loadConfigFromFile(path.resolve("config/default.batch.yaml"), {
      SLACK_WEBHOOK_URL: "https://hooks.example.test/services/placeholder",
      ICA_PROJECT: "genomics"
    });

    expect(config.batch).toEqual({
      maxConcurrentJobs: 5,
      maxRetriesPerStage: 3,
      perStageTimeoutMs: 86_400_000,
      pollIntervalMs: 60_000,
      backoff: { baseMs: 5_000, maxMs: 300_000, factor: 2 },
      notifyOn: ["start", "complete", "error"]
    });
    expect(config.notify.slackWebhook).toBe("https://hooks.example.test/services/placeholder");
    expect(config.platform).toEqual({
      kind: "ica_cli",
      projectName: "genomics",
      cliPath: "ica",
      commandTimeoutMs: 7_200_000,
      simulatedRunningPolls: 2
    });
    expect(config.notify.email).toBeNull();
    expect(config.paths).toEqual({ workDir: "var/work", outputDir: "batch_results" });
    expect(config.configHash).toMatch(/^sha256:[0-9a-f]{64}$/);
  });

  it("leaves unset environment references empty", async () => {
    const config = await loadConfigFromFile(path.resolve("config/default.batch.yaml"), {});
    expect(config.notify.slackWebhook).toBeNull();
    expect(config.platform.projectName).toBeNull();
  });

  it("enables email once recipients and the SMTP host are set", async () => {
    const config = await loadConfigFromFile(path.resolve("config/default.batch.yaml"), {
      SEQBATCH_EMAIL_TO: "lab@example.test, oncall@example.test",
      SMTP_HOST: "smtp.example.test",
      SMTP_USER: "seqbatch",
      SMTP_PASS: "test-secret"
    });
    expect(config.notify.email).toEqual({
      to: ["lab@example.test", "oncall@example.test"],
      from: "seqbatch@localhost",
      smtpHost: "smtp.example.test",
      smtpPort: 587,
      smtpUser: "seqbatch",
      smtpPass: "test-secret"
    });

    const inline = parseAppConfig(
      { version: 1, notify: { email: { email_to: ["a@example.test"], smtp_host: "localhost", smtp_port: 25 } } },
      "inline",
      {}
    );
    expect(inline.notify.email).toEqual({
      to: ["a@example.test"],
      from: "seqbatch@localhost",
      smtpHost: "localhost",
      smtpPort: 25,
      smtpUser: null,
      smtpPass: null
    });
  });

  it("reads the per-command timeout in seconds", () => {
    const config = parseAppConfig({ version: 1, platform: { command_timeout_seconds: 90 } }, "inline", {});
    expect(config.platform.commandTimeoutMs).toBe(90_000);
    expect(() => parseAppConfig({ version: 1, platform: { command_timeout_seconds: 0 } }, "inline", {})).toThrow(ConfigError);
  });

  it("loads the dry-run config with sub-second timings", async () => {
    const config = await loadConfigFromFile(path.resolve("config/dry-run.batch.yaml"), {});
    expect(config.platform.kind).toBe("simulated");
    expect(config.batch.pollIntervalMs).toBe(200);
    expect(config.batch.backoff).toEqual({ baseMs: 100, maxMs: 1_000, factor: 2 });
    expect(config.batch.notifyOn).toEqual(["complete", "error"]);
    expect(config.paths.outputDir).toBe("var/batch_results");
  });

  it("fills in defaults for a minimal file", () => {
    const config = parseAppConfig({ version: 1 }, "inline", {});
    expect(config.batch).toEqual(DEFAULT_BATCH_SETTINGS);
    expect(config.platform.kind).toBe("ica_cli");
    expect(config.paths.workDir).toBe("var/work");
  });

  it("rejects invalid files", async () => {
    expect(() => parseAppConfig({ version: 2 }, "inline", {})).toThrow(ConfigError);
    expect(() => parseAppConfig({ version: 1, batch: { max_concurrent_jobs: 0 } }, "inline", {})).toThrow(
      /^invalid config at inline: batch\.max_concurrent_jobs: /
    );
    expect(() => parseAppConfig({ version: 1, notify: { on: ["always"] } }, "inline", {})).toThrow(ConfigError);
    expect(() =>
      parseAppConfig({ version: 1, batch: { backoff: { base_seconds: 10, max_seconds: 1 } } }, "inline", {})
    ).toThrow("invalid batch settings: backoff requires 0 <= baseMs <= maxMs");

    tmpDir = await mkdtemp(path.join(os.tmpdir(), "seqbatch-config-"));
    const bad = path.join(tmpDir, "bad.yaml");
    await writeFile(bad, "version: [1\n", "utf8");
    await expect(loadConfigFromFile(bad, {})).rejects.toBeInstanceOf(ConfigError);
  });

  it("reports every invalid batch setting", () => {
    expect(() =>
      validateBatchSettings({ ...DEFAULT_BATCH_SETTINGS, maxConcurrentJobs: 1.5, pollIntervalMs: 0 })
    ).toThrow("invalid batch settings: maxConcurrentJobs must be an integer >= 1; pollIntervalMs must be > 0");
  });
});

describe("expandEnvToken", () => {
  it("resolves ${VAR} and $VAR and keeps literals", () => {
    const env = { ICA_PROJECT: " genomics " };
    expect(expandEnvToken("${ICA_PROJECT}", env)).toBe("genomics");
    expect(expandEnvToken("$ICA_PROJECT", env)).toBe("genomics");
    expect(expandEnvToken("${MISSING}", env)).toBeNull();
    expect(expandEnvToken("literal-project", env)).toBe("literal-project");
    expect(expandEnvToken("   ", env)).toBeNull();
  });
});
