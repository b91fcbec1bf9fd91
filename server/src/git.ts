import { spawn } from "node:child_process";
import { randomBytes } from "node:crypto";
import fs from "node:fs";
import { createLogger, InvalidInputError, NotFoundError } from "@scriptrunner/shared";
import type { ScriptCatalog } from "./catalog.js";

const log = createLogger("git");

const GIT_URL_RE = /^(https:\/\/|git@)\S+$/;
const OUTPUT_TAIL = 2000;

export interface GitResult {
  code: number;
  output: string;
}

export class GitCommandError extends Error {
  readonly name = "GitCommandError";

  constructor(message: string, readonly details: string) {
    super(message);
  }
}

/** Runs git with stdout and stderr collected together. */
export function runGit(args: string[]): Promise<GitResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn("git", args, {
      stdio: ["ignore", "pipe", "pipe"],
      env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
    });

    let output = "";
    const collect = (data: Buffer) => {
      output += data.toString();
    };
    proc.stdout.on("data", collect);
    proc.stderr.on("data", collect);

    proc.on("close", (code) => {
      resolve({ code: code ?? 1, output });
    });
    proc.on("error", (err) => {
      reject(new Error(`Failed to spawn git: ${err.message}`));
    });
  });
}

function tail(text: string): string {
  return text.slice(-OUTPUT_TAIL);
}

export function isGitUrl(url: string): boolean {
  return GIT_URL_RE.test(url);
}

export function newRepoId(): string {
  return `repo-${randomBytes(4).toString("hex")}`;
}

/** Shallow-clones `url` into a fresh repository directory. Returns its id. */
export async function cloneRepo(catalog: ScriptCatalog, url: string): Promise<string> {
  if (!isGitUrl(url)) throw new InvalidInputError("Invalid git URL");

  const repoId = newRepoId();
  const dest = catalog.repoPath(repoId);
  if (!dest) throw new InvalidInputError("Bad repo id");

  log.info(`Cloning ${url} as ${repoId}`);
  const { code, output } = await runGit(["clone", "--depth", "1", url, dest]);
  if (code !== 0) {
    fs.rmSync(dest, { recursive: true, force: true });
    log.warn(`Clone of ${url} failed with code ${code}`);
    throw new GitCommandError("Clone failed", tail(output));
  }
  return repoId;
}

export async function pullRepo(catalog: ScriptCatalog, repoId: string): Promise<string> {
  const base = catalog.resolveRepoDir(repoId);
  if (!base) throw new NotFoundError("repo not found");

  const { code, output } = await runGit(["-C", base, "pull"]);
  if (code !== 0) throw new GitCommandError("Pull failed", tail(output));
  log.info(`Pulled ${repoId}`);
  return tail(output);
}

export function deleteRepo(catalog: ScriptCatalog, repoId: string): void {
  const base = catalog.resolveRepoDir(repoId);
  if (!base) throw new NotFoundError("repo not found");
  fs.rmSync(base, { recursive: true, force: true });
  log.info(`Deleted ${repoId}`);
}
