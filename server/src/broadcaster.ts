import { setTimeout as sleep } from "node:timers/promises";
import {
  createLogger,
  formatDone,
  formatError,
  formatLog,
  formatState,
} from "@scriptrunner/shared";
import type { JobState } from "@scriptrunner/shared";

const log = createLogger("broadcaster");

export const DEFAULT_POLL_INTERVAL_MS = 350;

/** One viewer connection. Frames must reach the viewer in the order sent. */
export interface ViewerChannel {
  send(frame: string): Promise<void>;
  isOpen(): boolean;
  close(): void;
}

export interface JobLookup {
  get(jobId: string): JobState | undefined;
}

export interface StreamOptions {
  pollIntervalMs?: number;
}

/**
 * Polls one job for a single viewer until it is done, sending new history
 * lines and a state snapshot each round. The cursor is private to this
 * viewer; the job itself is never written.
 */
export async function streamJob(
  jobId: string,
  jobs: JobLookup,
  channel: ViewerChannel,
  opts: StreamOptions = {}
): Promise<void> {
  const pollIntervalMs = opts.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  let cursor = 0;

  try {
    while (channel.isOpen()) {
      const job = jobs.get(jobId);
      if (!job) {
        await channel.send(formatError("Job not found"));
        return;
      }

      // Lines and state are read together, before any send yields: a job
      // seen as done here has all of its lines in this slice.
      const slice = job.history.since(cursor);
      const { percent, status, step, done, returnCode } = job;
      if (slice.missed > 0) {
        log.debug(`Viewer of ${jobId} fell behind, ${slice.missed} line(s) evicted`);
      }
      cursor = slice.next;
      for (const line of slice.lines) {
        await channel.send(formatLog(line));
      }

      await channel.send(formatState({ percent, status, step }));

      if (done) {
        await channel.send(formatDone(returnCode));
        return;
      }

      await sleep(pollIntervalMs);
    }
  } finally {
    channel.close();
  }
}
