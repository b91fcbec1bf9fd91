import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import type { Config } from "./types.js";
import { HISTORY_CAPACITY } from "./history.js";

function intEnv(name: string, fallback: number, min = 0): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  if (isNaN(value) || value < min) {
    console.error(`Invalid value for ${name}: ${raw}`);
    process.exit(1);
  }
  return value;
}

export function loadConfig(): Config {
  const dataDir = path.resolve(process.env.DATA_DIR ?? process.cwd());

  return {
    port: intEnv("PORT", 8000),
    scriptsDir: path.resolve(process.env.SCRIPTS_DIR ?? path.join(dataDir, "scripts")),
    logsDir: path.resolve(process.env.LOGS_DIR ?? path.join(dataDir, "logs")),
    reposDir: path.resolve(process.env.REPOS_DIR ?? path.join(dataDir, "repos")),
    interpreters: {
      python: process.env.PYTHON_BIN ?? "python3",
      shell: process.env.SHELL_BIN ?? "/bin/bash",
    },
    streamPollIntervalMs: intEnv("STREAM_POLL_INTERVAL_MS", 350, 1),
    jobRetentionMinutes: intEnv("JOB_RETENTION_MINUTES", 60),
    historyCapacity: intEnv("HISTORY_CAPACITY", HISTORY_CAPACITY, 1),
  };
}

export function ensureDirs(config: Config): void {
  for (const dir of [config.scriptsDir, config.logsDir, config.reposDir]) {
    fs.mkdirSync(dir, { recursive: true });
  }
}
