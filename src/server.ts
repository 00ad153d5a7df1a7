import { createApp } from "./app";
import { PostgresBlogRepository } from "./blog/repository";
import { loadConfig, loadDatabaseConfig } from "./config";
import { createDatabasePool } from "./db/connection";
import { appLogger } from "./security/logger";

const config = loadConfig();
const databasePool = createDatabasePool(loadDatabaseConfig(), appLogger);
const repository = new PostgresBlogRepository(databasePool);
const app = createApp(config, {
  blogRepository: repository,
  healthCheck: async () => {
    await databasePool.query("SELECT 1");
  }
});

app.listen(config.port, () => {
  appLogger.info("server_started", { port: config.port, timeZone: config.timeZone });
});

async function shutdown(): Promise<void> {
  await databasePool.end();
}

process.on("SIGINT", () => {
  void shutdown().finally(() => process.exit(0));
});

process.on("SIGTERM", () => {
  void shutdown().finally(() => process.exit(0));
});
