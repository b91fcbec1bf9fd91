import fs from "node:fs";
import path from "node:path";
import type { Readable } from "node:stream";
import { StringDecoder } from "node:string_decoder";
import { createLogger, errorMessage } from "@scriptrunner/shared";
import type { JobState, Logger } from "@scriptrunner/shared";

const PROGRESS_RE = /^PROGRESS\s+(-?\d+)\s*(.*)$/;
const DONE_RE = /^DONE\b/;

export const STARTING_STEP = "starting";

export function clampPercent(value: number): number {
  return Math.max(0, Math.min(100, value));
}

/** Records one output line in history and applies any marker it carries. */
export function applyLine(job: JobState, line: string): void {
  job.history.push(line);

  const progress = line.match(PROGRESS_RE);
  if (progress) {
    job.percent = clampPercent(parseInt(progress[1], 10));
    const message = progress[2].trim();
    if (message) job.step = message;
  }

  if (DONE_RE.test(line)) {
    job.percent = 100;
    job.step = "done";
  }
}

/** Terminal transition once the exit code is known. */
export function finishJob(job: JobState, returnCode: number): void {
  job.returnCode = returnCode;
  job.status = returnCode === 0 ? "finished" : "error";
  if (returnCode === 0) {
    job.percent = 100;
    if (job.step === "" || job.step === STARTING_STEP) job.step = "done";
  }
  job.finishedAt = Date.now();
  job.done = true;
}

/**
 * Yields the decoded stream split on `\n` only. A `\r` stays part of its
 * line; a final line without a newline is yielded at the end.
 */
export async function* splitLines(output: Readable): AsyncGenerator<string> {
  const decoder = new StringDecoder("utf8");
  let pending = "";

  for await (const chunk of output) {
    pending += typeof chunk === "string" ? chunk : decoder.write(chunk);
    let start = 0;
    let nl = pending.indexOf("\n");
    while (nl !== -1) {
      yield pending.slice(start, nl);
      start = nl + 1;
      nl = pending.indexOf("\n", start);
    }
    pending = pending.slice(start);
  }

  pending += decoder.end();
  if (pending) yield pending;
}

/** Opens the job's transcript for append, creating its directory. */
export function openTranscript(job: JobState): number {
  fs.mkdirSync(path.dirname(job.logPath), { recursive: true });
  return fs.openSync(job.logPath, "a");
}

/**
 * Consumes the process output until it closes: every line goes to the
 * transcript first, then to history and the marker parser. Finishes the
 * job with the process's exit code. Owns `transcript` and closes it.
 *
 * A failed transcript write stops further writes but not the reading, so
 * the process is never left blocked on a full pipe.
 */
export async function consumeOutput(
  job: JobState,
  transcript: number,
  output: Readable,
  exitCode: Promise<number>,
  log: Logger = createLogger("pipeline", job.id)
): Promise<void> {
  let lines = 0;
  let writable = true;

  try {
    for await (const line of splitLines(output)) {
      if (writable) {
        try {
          fs.writeSync(transcript, line + "\n");
        } catch (err) {
          writable = false;
          log.error(`Transcript write failed, keeping output in memory only: ${errorMessage(err)}`);
        }
      }
      applyLine(job, line);
      lines++;
    }
  } catch (err) {
    log.error(`Output stream failed: ${errorMessage(err)}`);
    output.resume();
  } finally {
    try {
      fs.closeSync(transcript);
    } catch (err) {
      log.error(`Could not close transcript: ${errorMessage(err)}`);
    }
  }

  const code = await exitCode;
  finishJob(job, code);
  log.info(`Process exited with code ${code} after ${lines} line(s)`);
}
