import type { JobSnapshot, JobStatus } from "./types.js";

// Live channel: one text frame per event.
//   LOG <line>
//   STATE <percent>|<status>|<step>
//   DONE rc=<code|none>
//   ERROR <text>

export type ChannelMessage =
  | { type: "log"; line: string }
  | { type: "state"; percent: number; status: JobStatus; step: string }
  | { type: "done"; returnCode?: number }
  | { type: "error"; message: string };

const NO_RETURN_CODE = "none";
const STATUSES: readonly JobStatus[] = ["queued", "running", "finished", "error"];

export function formatLog(line: string): string {
  return `LOG ${line}`;
}

/** `step` is sent as is; a `|` inside it is ambiguous to naive splitters. */
export function formatState(snapshot: Pick<JobSnapshot, "percent" | "status" | "step">): string {
  return `STATE ${snapshot.percent}|${snapshot.status}|${snapshot.step}`;
}

export function formatDone(returnCode: number | undefined): string {
  return `DONE rc=${returnCode ?? NO_RETURN_CODE}`;
}

export function formatError(message: string): string {
  return `ERROR ${message}`;
}

function isStatus(value: string): value is JobStatus {
  return STATUSES.some((s) => s === value);
}

function parseState(body: string): ChannelMessage | null {
  const first = body.indexOf("|");
  const second = first < 0 ? -1 : body.indexOf("|", first + 1);
  if (second < 0) return null;

  const percent = Number(body.slice(0, first));
  const status = body.slice(first + 1, second);
  if (!Number.isInteger(percent) || !isStatus(status)) return null;

  return { type: "state", percent, status, step: body.slice(second + 1) };
}

/** Returns null for frames that are not part of the protocol. */
export function parseMessage(frame: string): ChannelMessage | null {
  if (frame.startsWith("LOG ")) return { type: "log", line: frame.slice(4) };
  if (frame.startsWith("STATE ")) return parseState(frame.slice(6));
  if (frame.startsWith("ERROR ")) return { type: "error", message: frame.slice(6) };

  const done = frame.match(/^DONE rc=(-?\d+|none)$/);
  if (done) {
    return done[1] === NO_RETURN_CODE
      ? { type: "done" }
      : { type: "done", returnCode: Number(done[1]) };
  }
  return null;
}
