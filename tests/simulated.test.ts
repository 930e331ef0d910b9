import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { CancelledError, ConfigError, ValidationError } from "../src/core/errors.js";
import { SimulatedPlatformClient } from "../src/platform/simulated.js";
import { createPlatformClient } from "../src/platform/index.js";

const launchRequest = (dataRef: string) => ({
  pipeline: "dragen-germline",
  reference: "hg38",
  params: {},
  dataRef,
  analysisName: "s1-batch_test",
  paramsFile: "/unused/params.json"
});

describe("SimulatedPlatformClient", () => {
  let tmpDir: string | null = null;

  afterEach(async () => {
    if (tmpDir) await rm(tmpDir, { recursive: true, force: true });
    tmpDir = null;
  });

  it("plays out the same identifiers for the same inputs", async () => {
    const a = new SimulatedPlatformClient();
    const b = new SimulatedPlatformClient();

    const upA = await a.upload("/data/s1", { folderName: "s1" });
    const upB = await b.upload("/data/s1", { folderName: "s1" });
    expect(upA.dataRef).toBe(upB.dataRef);
    expect(upA.dataRef).toMatch(/^fol\.[0-9a-f]{12}$/);

    const launchA = await a.launch(launchRequest(upA.dataRef));
    const launchB = await b.launch(launchRequest(upB.dataRef));
    expect(launchA.analysisId).toBe(launchB.analysisId);
    expect(launchA.analysisId).toMatch(/^ana\.[0-9a-f]{12}$/);
  });

  it("reports running for the configured number of polls, then succeeds", async () => {
    const client = new SimulatedPlatformClient({ runningPolls: 2 });
    const { analysisId } = await client.launch(launchRequest("fol.1"));

    expect((await client.poll(analysisId)).status).toBe("running");
    expect((await client.poll(analysisId)).status).toBe("running");
    expect(await client.poll(analysisId)).toEqual({ status: "succeeded", detail: "status SUCCEEDED" });
  });

  it("fails every analysis at a failure rate of 1", async () => {
    const client = new SimulatedPlatformClient({ runningPolls: 0, failureRate: 1 });
    const { analysisId } = await client.launch(launchRequest("fol.1"));
    expect(await client.poll(analysisId)).toEqual({
      status: "failed",
      detail: "analysis ended with status FAILED (simulated)"
    });
  });

  it("writes a results summary on download", async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "seqbatch-sim-"));
    const client = new SimulatedPlatformClient({ runningPolls: 0 });
    const { analysisId } = await client.launch(launchRequest("fol.1"));

    const dest = path.join(tmpDir, "s1");
    const { path: written } = await client.download(analysisId, dest);
    expect(written).toBe(path.resolve(dest));

    const summary: unknown = JSON.parse(await readFile(path.join(written, "analysis_summary.json"), "utf8"));
    expect(summary).toMatchObject({ simulated: true, analysis_id: analysisId, pipeline: "dragen-germline", reference: "hg38" });
  });

  it("rejects unknown analyses and aborted calls", async () => {
    const client = new SimulatedPlatformClient();
    await expect(client.poll("ana.missing")).rejects.toBeInstanceOf(ValidationError);

    const controller = new AbortController();
    controller.abort();
    await expect(client.upload("/data/s1", { folderName: "s1", signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError
    );
  });
});

describe("createPlatformClient", () => {
  it("builds the configured client", () => {
    const sim = createPlatformClient({ kind: "simulated", projectName: null, cliPath: "ica", commandTimeoutMs: 60_000, simulatedRunningPolls: 1 });
    expect(sim.kind).toBe("simulated");

    const cli = createPlatformClient({ kind: "ica_cli", projectName: "genomics", cliPath: "ica", commandTimeoutMs: 60_000, simulatedRunningPolls: 0 });
    expect(cli.kind).toBe("ica_cli");
  });

  it("requires a project name for the CLI client", () => {
    expect(() =>
      createPlatformClient({ kind: "ica_cli", projectName: null, cliPath: "ica", commandTimeoutMs: 60_000, simulatedRunningPolls: 0 })
    ).toThrow(ConfigError);
  });
});
