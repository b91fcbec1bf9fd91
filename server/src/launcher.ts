import { spawn } from "node:child_process";
import { PassThrough } from "node:stream";
import type { Readable, Writable } from "node:stream";
import { constants } from "node:os";
import path from "node:path";
import { LaunchResolutionError } from "@scriptrunner/shared";
import type { Interpreters } from "@scriptrunner/shared";

/** Return code recorded for a job whose process never started. */
export const COULD_NOT_START = 127;

export type InputDelivery = { ok: true } | { ok: false; error: Error };

export interface ProcessHandle {
  pid: number | undefined;
  /** stdout and stderr merged, in arrival order. */
  output: Readable;
  exitCode: Promise<number>;
  /** Never rejects: a failed write is reported here and nowhere else. */
  inputDelivered: Promise<InputDelivery>;
}

export interface LaunchOptions {
  executablePath: string;
  args?: string[];
  workingDir?: string;
  stdinPayload?: readonly string[];
  interpreters: Interpreters;
}

export function resolveInterpreter(executablePath: string, interpreters: Interpreters): string {
  switch (path.extname(executablePath)) {
    case ".py":
      return interpreters.python;
    case ".sh":
      return interpreters.shell;
    default:
      throw new LaunchResolutionError(executablePath);
  }
}

/** Joins inputs one per line; an empty list means nothing is written. */
export function encodeInput(payload: readonly string[] | undefined): string {
  return payload && payload.length > 0 ? payload.join("\n") + "\n" : "";
}

function deliverInput(stdin: Writable, text: string): Promise<InputDelivery> {
  return new Promise((resolve) => {
    let settled = false;
    const settle = (result: InputDelivery) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    // EPIPE and friends arrive here when the child exits without reading.
    stdin.on("error", (error) => settle({ ok: false, error }));

    if (text) stdin.write(text);
    stdin.end(() => settle({ ok: true }));
  });
}

function mergeOutput(stdout: Readable, stderr: Readable): Readable {
  const merged = new PassThrough();
  let open = 2;
  const onEnd = () => {
    if (--open === 0) merged.end();
  };
  for (const source of [stdout, stderr]) {
    source.once("end", onEnd);
    source.pipe(merged, { end: false });
  }
  return merged;
}

function signalCode(signal: NodeJS.Signals | null): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return entry ? 128 + Number(entry[1]) : 1;
}

/**
 * Spawns the script through its interpreter. Resolves once the OS has
 * started the process; rejects when it could not be spawned at all.
 */
export async function launch(opts: LaunchOptions): Promise<ProcessHandle> {
  const interpreter = resolveInterpreter(opts.executablePath, opts.interpreters);

  return new Promise((resolve, reject) => {
    const proc = spawn(interpreter, [opts.executablePath, ...(opts.args ?? [])], {
      cwd: opts.workingDir,
      stdio: ["pipe", "pipe", "pipe"],
    });

    const exitCode = new Promise<number>((resolveExit) => {
      proc.once("close", (code, signal) => {
        resolveExit(code ?? signalCode(signal));
      });
    });

    proc.once("error", (err) => {
      reject(new Error(`Failed to spawn ${interpreter}: ${err.message}`));
    });

    proc.once("spawn", () => {
      resolve({
        pid: proc.pid,
        output: mergeOutput(proc.stdout, proc.stderr),
        exitCode,
        inputDelivered: deliverInput(proc.stdin, encodeInput(opts.stdinPayload)),
      });
    });
  });
}
