#!/usr/bin/env npx tsx
/**
 * Run one script through the job pipeline without the HTTP server and
 * print its live channel to the terminal.
 *
 * Usage:
 *   npx tsx cli/run-script.ts <script.py|script.sh> [input ...]
 *
 * Each extra argument becomes one line of the script's stdin.
 */

import fs from "node:fs";
import path from "node:path";
import { ensureDirs, loadConfig, parseMessage } from "@scriptrunner/shared";
import { streamJob } from "../src/broadcaster.js";
import type { ViewerChannel } from "../src/broadcaster.js";
import { JobRegistry } from "../src/registry.js";
import { JobRunner } from "../src/runner.js";

function printFrame(frame: string): void {
  const msg = parseMessage(frame);
  if (!msg) return;
  switch (msg.type) {
    case "log":
      console.log(msg.line);
      break;
    case "state":
      process.stderr.write(`[cli] ${msg.percent}% ${msg.status} ${msg.step}\n`);
      break;
    case "done":
      process.stderr.write(`[cli] rc=${msg.returnCode ?? "none"}\n`);
      break;
    case "error":
      console.error(`[cli] ${msg.message}`);
      break;
  }
}

async function main() {
  const [scriptArg, ...inputs] = process.argv.slice(2);

  if (!scriptArg) {
    console.error("Usage: npx tsx cli/run-script.ts <script.py|script.sh> [input ...]");
    process.exit(1);
  }

  const scriptPath = path.resolve(scriptArg);
  if (!fs.existsSync(scriptPath)) {
    console.error(`[cli] No such file: ${scriptPath}`);
    process.exit(1);
  }

  const config = loadConfig();
  ensureDirs(config);

  const registry = new JobRegistry({ logsDir: config.logsDir, historyCapacity: config.historyCapacity });
  const runner = new JobRunner(registry, config.interpreters);

  const jobId = runner.start({
    scriptRef: path.basename(scriptPath),
    executablePath: scriptPath,
    args: [],
    inputs,
  });
  console.error(`[cli] Job ${jobId}`);

  let open = true;
  const channel: ViewerChannel = {
    send: async (frame) => printFrame(frame),
    isOpen: () => open,
    close: () => {
      open = false;
    },
  };
  await streamJob(jobId, registry, channel, { pollIntervalMs: config.streamPollIntervalMs });

  const job = registry.get(jobId);
  console.error(`[cli] Transcript: ${job?.logPath ?? "(none)"}`);
  process.exit(job?.returnCode ?? 1);
}

main().catch((err) => {
  console.error("[cli] Fatal:", err);
  process.exit(1);
});
