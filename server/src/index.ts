import { createServer } from "node:http";
import { createLogger, ensureDirs, loadConfig } from "@scriptrunner/shared";
import { createApp } from "./app.js";
import { ScriptCatalog } from "./catalog.js";
import { attachLiveChannel } from "./live.js";
import { JobRegistry } from "./registry.js";
import { JobRunner } from "./runner.js";

const log = createLogger("server");

async function main() {
  const config = loadConfig();
  ensureDirs(config);

  const registry = new JobRegistry({
    logsDir: config.logsDir,
    retentionMs: config.jobRetentionMinutes * 60_000,
    historyCapacity: config.historyCapacity,
  });
  registry.start();

  const runner = new JobRunner(registry, config.interpreters);
  const catalog = new ScriptCatalog(config.scriptsDir, config.reposDir);

  const server = createServer(createApp({ registry, runner, catalog }));
  const live = attachLiveChannel(server, registry, config.streamPollIntervalMs);

  await new Promise<void>((resolve) => server.listen(config.port, resolve));
  log.info(`Script runner listening on port ${config.port}`);
  log.info(`Scripts: ${config.scriptsDir}`);
  log.info(`Repositories: ${config.reposDir}`);
  log.info(`Transcripts: ${config.logsDir}`);

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    registry.stop();
    live
      .close()
      .then(() => server.close())
      .catch((err) => log.error(`Shutdown failed: ${err}`))
      .finally(() => process.exit(0));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  log.error(`Failed to start: ${err}`);
  process.exit(1);
});
