import { randomUUID } from "node:crypto";
import path from "node:path";
import { HistoryBuffer, HISTORY_CAPACITY, createLogger } from "@scriptrunner/shared";
import type { JobState } from "@scriptrunner/shared";

const log = createLogger("registry");

export interface RegistryOptions {
  logsDir: string;
  /** How long a finished job stays visible. 0 keeps jobs forever. */
  retentionMs?: number;
  sweepIntervalMs?: number;
  historyCapacity?: number;
}

/**
 * Owns every job's state for the life of the server. Entries are only
 * mutated by their own pipeline; viewers and the API read them.
 */
export class JobRegistry {
  private jobs = new Map<string, JobState>();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private readonly logsDir: string;
  private readonly retentionMs: number;
  private readonly sweepIntervalMs: number;
  private readonly historyCapacity: number;

  constructor(opts: RegistryOptions) {
    this.logsDir = opts.logsDir;
    this.retentionMs = opts.retentionMs ?? 0;
    this.sweepIntervalMs = opts.sweepIntervalMs ?? 60_000;
    this.historyCapacity = opts.historyCapacity ?? HISTORY_CAPACITY;
  }

  create(scriptRef: string): string {
    const id = randomUUID();
    this.jobs.set(id, {
      id,
      scriptRef,
      percent: 0,
      status: "queued",
      step: "",
      done: false,
      logPath: path.join(this.logsDir, `${id}.log`),
      history: new HistoryBuffer(this.historyCapacity),
      createdAt: Date.now(),
    });
    log.info(`Created job ${id} for ${scriptRef}`);
    return id;
  }

  get(jobId: string): JobState | undefined {
    return this.jobs.get(jobId);
  }

  get size(): number {
    return this.jobs.size;
  }

  /** Drops jobs that finished more than `retentionMs` before `now`. Returns how many went. */
  sweep(now: number = Date.now()): number {
    if (this.retentionMs <= 0) return 0;

    let evicted = 0;
    for (const [id, job] of this.jobs) {
      if (job.done && job.finishedAt !== undefined && now - job.finishedAt > this.retentionMs) {
        this.jobs.delete(id);
        evicted++;
      }
    }
    if (evicted > 0) log.info(`Evicted ${evicted} finished job(s)`);
    return evicted;
  }

  start(): void {
    if (this.sweepTimer || this.retentionMs <= 0) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
