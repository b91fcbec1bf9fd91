import type { HistoryBuffer } from "./history.js";

// --- Job State ---

export type JobStatus = "queued" | "running" | "finished" | "error";

export interface JobState {
  id: string;
  /** Local script name, or "<repo-id>:<relative-path>" for repository scripts. */
  readonly scriptRef: string;
  percent: number;
  status: JobStatus;
  step: string;
  done: boolean;
  /** Set once the job is done; absent while it runs. */
  returnCode?: number;
  readonly logPath: string;
  readonly history: HistoryBuffer;
  readonly createdAt: number;
  finishedAt?: number;
}

/** What viewers and the JSON API see of a job. */
export interface JobSnapshot {
  percent: number;
  status: JobStatus;
  step: string;
  done: boolean;
  returnCode?: number;
}

// --- Run Request ---

export interface RunRequest {
  scriptRef: string;
  executablePath: string;
  args: string[];
  workingDir?: string;
  inputs: string[];
}

// --- Config ---

export interface Interpreters {
  python: string;
  shell: string;
}

export interface Config {
  port: number;
  scriptsDir: string;
  logsDir: string;
  reposDir: string;
  interpreters: Interpreters;
  streamPollIntervalMs: number;
  jobRetentionMinutes: number;
  historyCapacity: number;
}
