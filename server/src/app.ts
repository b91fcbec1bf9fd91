import fs from "node:fs";
import express from "express";
import type { NextFunction, Request, Response } from "express";
import {
  createLogger,
  errorMessage,
  InvalidInputError,
  NotFoundError,
} from "@scriptrunner/shared";
import type { JobState } from "@scriptrunner/shared";
import type { ScriptCatalog } from "./catalog.js";
import { GitCommandError, cloneRepo, deleteRepo, pullRepo } from "./git.js";
import type { JobRegistry } from "./registry.js";
import type { JobRunner } from "./runner.js";

const log = createLogger("http");

export interface AppDeps {
  registry: JobRegistry;
  runner: JobRunner;
  catalog: ScriptCatalog;
}

type Body = Record<string, unknown>;

function isBody(value: unknown): value is Body {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireBody(req: Request): Body {
  const body: unknown = req.body;
  if (!isBody(body)) throw new InvalidInputError("Expected a JSON object body");
  return body;
}

function requireString(body: Body, key: string): string {
  const value = body[key];
  if (typeof value !== "string" || !value.trim()) {
    throw new InvalidInputError(`Field "${key}" must be a non-empty string`);
  }
  return value;
}

/** Anything but an array counts as no input; elements are stringified as they come. */
export function toInputStrings(value: unknown): string[] {
  return Array.isArray(value) ? value.map((v) => String(v)) : [];
}

export function jobSnapshot(job: JobState) {
  return {
    job_id: job.id,
    script: job.scriptRef,
    percent: job.percent,
    status: job.status,
    step: job.step,
    done: job.done,
    rc: job.returnCode ?? null,
  };
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function createApp({ registry, runner, catalog }: AppDeps): express.Express {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  function requireJob(jobId: string): JobState {
    const job = registry.get(jobId);
    if (!job) throw new NotFoundError("not found");
    return job;
  }

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", jobs: registry.size, running: runner.running });
  });

  // --- Scripts ---

  app.get("/scripts", (_req, res) => {
    res.json(catalog.listScripts());
  });

  app.delete("/delete_script/:name", (req, res) => {
    catalog.deleteScript(req.params.name);
    res.json({ ok: true, deleted: req.params.name });
  });

  app.post("/run", (req, res) => {
    const body = requireBody(req);
    const script = requireString(body, "script");
    const executablePath = catalog.resolveScript(script);
    if (!executablePath) throw new NotFoundError("script not found");

    const jobId = runner.start({
      scriptRef: script,
      executablePath,
      args: [],
      inputs: toInputStrings(body.input_vars),
    });
    res.json({ job_id: jobId });
  });

  // --- Repositories ---

  app.get("/repos", (_req, res) => {
    res.json(catalog.listRepos());
  });

  app.post("/clone_repo", route(async (req, res) => {
    const url = requireString(requireBody(req), "url").trim();
    const repoId = await cloneRepo(catalog, url);
    res.json({ ok: true, repo_id: repoId });
  }));

  app.post("/pull_repo", route(async (req, res) => {
    const repoId = requireString(requireBody(req), "repo_id");
    const output = await pullRepo(catalog, repoId);
    res.json({ ok: true, output });
  }));

  app.delete("/delete_repo/:id", (req, res) => {
    deleteRepo(catalog, req.params.id);
    res.json({ ok: true, deleted: req.params.id });
  });

  app.get("/repo_files/:id", (req, res) => {
    res.json({ repo_id: req.params.id, files: catalog.listRepoFiles(req.params.id) });
  });

  app.post("/run_repo", (req, res) => {
    const body = requireBody(req);
    const repoId = requireString(body, "repo_id");
    const relPath = requireString(body, "path");
    const workingDir = catalog.resolveRepoDir(repoId);
    const executablePath = catalog.resolveRepoFile(repoId, relPath);
    if (!workingDir || !executablePath) throw new NotFoundError("repo file not found");

    const jobId = runner.start({
      scriptRef: `${repoId}:${relPath}`,
      executablePath,
      args: [],
      workingDir,
      inputs: toInputStrings(body.input_vars),
    });
    res.json({ job_id: jobId });
  });

  // --- Jobs & logs ---

  app.get("/jobs/:id", (req, res) => {
    res.json(jobSnapshot(requireJob(req.params.id)));
  });

  app.get("/download/:id", (req, res) => {
    res.json({ log_file: requireJob(req.params.id).logPath });
  });

  app.get("/logs/:id.log", route(async (req, res) => {
    const job = requireJob(req.params.id);
    let text: string;
    try {
      text = await fs.promises.readFile(job.logPath, "utf-8");
    } catch {
      throw new NotFoundError("log missing");
    }
    res.type("text/plain").send(text);
  }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof NotFoundError) {
      res.status(404).json({ error: err.message });
    } else if (err instanceof InvalidInputError) {
      res.status(400).json({ error: err.message });
    } else if (err instanceof GitCommandError) {
      res.status(400).json({ error: err.message, details: err.details });
    } else if (err instanceof SyntaxError) {
      // Body that express.json() could not parse
      res.status(400).json({ error: "Malformed JSON body" });
    } else {
      log.error(`Unhandled error: ${errorMessage(err)}`);
      res.status(500).json({ error: "Internal error" });
    }
  });

  return app;
}
