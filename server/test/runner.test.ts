import { describe, it, expect, beforeEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import type { JobState, RunRequest } from "@scriptrunner/shared";
import { JobRegistry } from "../src/registry.js";
import { JobRunner } from "../src/runner.js";
import { interpreters, makeTempDir, writeScript } from "./helpers.js";

describe("JobRunner", () => {
  let dir: string;
  let registry: JobRegistry;
  let runner: JobRunner;

  beforeEach(() => {
    dir = makeTempDir();
    registry = new JobRegistry({ logsDir: makeTempDir() });
    runner = new JobRunner(registry, interpreters);
  });

  function request(name: string, body: string, inputs: string[] = []): RunRequest {
    return { scriptRef: name, executablePath: writeScript(dir, name, body), args: [], inputs };
  }

  function jobOf(id: string): JobState {
    const job = registry.get(id);
    if (!job) throw new Error(`missing job ${id}`);
    return job;
  }

  it("runs a script to completion", async () => {
    const id = runner.start(request("steps.sh", 'echo "PROGRESS 50 half"\necho line\necho DONE\n'));
    await runner.wait(id);

    const job = jobOf(id);
    expect(job).toMatchObject({ status: "finished", done: true, percent: 100, step: "done", returnCode: 0 });
    expect(job.history.toArray()).toEqual(["PROGRESS 50 half", "line", "DONE"]);
    expect(fs.readFileSync(job.logPath, "utf-8")).toBe("PROGRESS 50 half\nline\nDONE\n");
    expect(runner.running).toBe(0);
  });

  it("marks the job running while the process is alive", async () => {
    const id = runner.start(request("slow.sh", "sleep 0.2\necho ok\n"));
    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(jobOf(id)).toMatchObject({ status: "running", step: "starting", done: false });
    await runner.wait(id);
    expect(jobOf(id).status).toBe("finished");
  });

  it("reports 100% and done for a quiet successful script", async () => {
    const id = runner.start(request("quiet.sh", "true\n"));
    await runner.wait(id);

    expect(jobOf(id)).toMatchObject({ status: "finished", percent: 100, step: "done", returnCode: 0 });
  });

  it("records a failing script without raising", async () => {
    const id = runner.start(request("fail.sh", 'echo "PROGRESS 20 early"\nexit 2\n'));
    await runner.wait(id);

    expect(jobOf(id)).toMatchObject({ status: "error", done: true, percent: 20, step: "early", returnCode: 2 });
  });

  it("feeds the inputs to the script", async () => {
    const id = runner.start(request("hello.sh", 'read name\necho "hi $name"\n', ["bob"]));
    await runner.wait(id);

    expect(jobOf(id).history.toArray()).toEqual(["hi bob"]);
  });

  it("fails unknown script types without ever running them", () => {
    const id = runner.start(request("notes.txt", "echo hi\n"));

    const job = jobOf(id);
    expect(job).toMatchObject({ status: "error", done: true, returnCode: 127, percent: 0, step: "" });
    expect(fs.existsSync(job.logPath)).toBe(false);
  });

  it("fails with the could-not-start code when the interpreter is missing", async () => {
    const broken = new JobRunner(registry, { ...interpreters, shell: "/nonexistent/bash" });
    const id = broken.start(request("fine.sh", "echo hi\n"));
    await broken.wait(id);

    expect(jobOf(id)).toMatchObject({ status: "error", done: true, returnCode: 127 });
  });

  it("does not start the script when its transcript cannot be opened", async () => {
    const notADir = path.join(makeTempDir(), "logs");
    fs.writeFileSync(notADir, "");
    const blockedJobs = new JobRegistry({ logsDir: notADir });
    const blocked = new JobRunner(blockedJobs, interpreters);
    const marker = path.join(dir, "marker");

    const id = blocked.start(request("touch.sh", `touch "${marker}"\n`));
    await blocked.wait(id);
    await new Promise((resolve) => setTimeout(resolve, 300));

    expect(blockedJobs.get(id)).toMatchObject({ status: "error", done: true, returnCode: 127 });
    expect(fs.existsSync(marker)).toBe(false);
  });
});
