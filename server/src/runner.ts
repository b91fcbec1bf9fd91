import fs from "node:fs";
import {
  createLogger,
  errorMessage,
  LaunchResolutionError,
} from "@scriptrunner/shared";
import type { Interpreters, JobState, RunRequest } from "@scriptrunner/shared";
import { COULD_NOT_START, launch, resolveInterpreter } from "./launcher.js";
import type { ProcessHandle } from "./launcher.js";
import { STARTING_STEP, consumeOutput, finishJob, openTranscript } from "./pipeline.js";
import type { JobRegistry } from "./registry.js";

const log = createLogger("runner");

export class JobRunner {
  private active = new Map<string, Promise<void>>();

  constructor(
    private readonly registry: JobRegistry,
    private readonly interpreters: Interpreters
  ) {}

  /** Registers the job and starts it in the background. */
  start(request: RunRequest): string {
    const jobId = this.registry.create(request.scriptRef);
    const job = this.registry.get(jobId);
    if (!job) throw new Error(`Job ${jobId} vanished right after creation`);

    const task = this.run(job, request)
      .catch((err) => {
        log.error(`Job ${jobId} crashed: ${errorMessage(err)}`);
        if (!job.done) finishJob(job, COULD_NOT_START);
      })
      .finally(() => {
        this.active.delete(jobId);
      });
    this.active.set(jobId, task);
    return jobId;
  }

  get running(): number {
    return this.active.size;
  }

  /** Resolves once the job's background task has settled (immediately for unknown ids). */
  async wait(jobId: string): Promise<void> {
    await this.active.get(jobId);
  }

  private async run(job: JobState, request: RunRequest): Promise<void> {
    const jlog = log.child(job.id);

    try {
      resolveInterpreter(request.executablePath, this.interpreters);
    } catch (err) {
      if (!(err instanceof LaunchResolutionError)) throw err;
      jlog.error(err.message);
      finishJob(job, COULD_NOT_START);
      return;
    }

    let transcript: number;
    try {
      transcript = openTranscript(job);
    } catch (err) {
      jlog.error(`Cannot open transcript ${job.logPath}: ${errorMessage(err)}`);
      finishJob(job, COULD_NOT_START);
      return;
    }

    job.status = "running";
    job.step = STARTING_STEP;

    let handle: ProcessHandle;
    try {
      handle = await launch({
        executablePath: request.executablePath,
        args: request.args,
        workingDir: request.workingDir,
        stdinPayload: request.inputs,
        interpreters: this.interpreters,
      });
    } catch (err) {
      jlog.error(errorMessage(err));
      fs.closeSync(transcript);
      finishJob(job, COULD_NOT_START);
      return;
    }
    jlog.info(`Spawned ${request.executablePath}, pid=${handle.pid}`);

    void handle.inputDelivered.then((delivery) => {
      if (!delivery.ok) jlog.warn(`Input not fully delivered: ${delivery.error.message}`);
    });

    await consumeOutput(job, transcript, handle.output, handle.exitCode, jlog);
  }
}
