import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfigFromFile } from "./config/batchConfig.js";
import { applySqlFile, createDb, createPool } from "./db/connection.js";
import { LiveBatchRegistry } from "./mcp/liveBatches.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { createPlatformClient } from "./platform/index.js";
import { PostgresStore } from "./store/postgresStore.js";

async function main(): Promise<void> {
  const configPath = process.env.BATCH_CONFIG_PATH ?? "config/default.batch.yaml";
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";

  const config = await loadConfigFromFile(configPath);
  const platform = createPlatformClient(config.platform);

  const pool = createPool();
  if (!process.env.DATABASE_URL || autoSchema) {
    await applySqlFile(pool, "db/schema.sql");
  }

  const store = new PostgresStore(createDb(pool));
  const batches = new LiveBatchRegistry();
  const server = createGatewayServer({ store, config, platform, batches });

  process.once("SIGINT", () => {
    batches.cancelAll();
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`seqbatch gateway ready (platform ${platform.kind})`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
