import { describe, it, expect } from "vitest";
import {
  formatDone,
  formatError,
  formatLog,
  formatState,
  parseMessage,
} from "../src/protocol.js";

describe("live channel frames", () => {
  it("formats each frame type", () => {
    expect(formatLog("hello world")).toBe("LOG hello world");
    expect(formatState({ percent: 40, status: "running", step: "Downloading" })).toBe(
      "STATE 40|running|Downloading"
    );
    expect(formatDone(0)).toBe("DONE rc=0");
    expect(formatDone(undefined)).toBe("DONE rc=none");
    expect(formatError("Job not found")).toBe("ERROR Job not found");
  });

  it("does not escape the separator inside step", () => {
    expect(formatState({ percent: 5, status: "running", step: "a|b" })).toBe("STATE 5|running|a|b");
  });

  it("parses frames back into messages", () => {
    expect(parseMessage("LOG ")).toEqual({ type: "log", line: "" });
    expect(parseMessage("LOG PROGRESS 10 x")).toEqual({ type: "log", line: "PROGRESS 10 x" });
    expect(parseMessage("STATE 100|finished|done")).toEqual({
      type: "state",
      percent: 100,
      status: "finished",
      step: "done",
    });
    expect(parseMessage("STATE 0|queued|")).toEqual({
      type: "state",
      percent: 0,
      status: "queued",
      step: "",
    });
    expect(parseMessage("DONE rc=127")).toEqual({ type: "done", returnCode: 127 });
    expect(parseMessage("DONE rc=none")).toEqual({ type: "done" });
    expect(parseMessage("ERROR Job not found")).toEqual({ type: "error", message: "Job not found" });
  });

  it("keeps everything after the second separator as the step", () => {
    expect(parseMessage("STATE 5|running|a|b")).toEqual({
      type: "state",
      percent: 5,
      status: "running",
      step: "a|b",
    });
  });

  it("rejects frames outside the protocol", () => {
    expect(parseMessage("hello")).toBeNull();
    expect(parseMessage("STATE x|running|s")).toBeNull();
    expect(parseMessage("STATE 1|paused|s")).toBeNull();
    expect(parseMessage("STATE 1|running")).toBeNull();
    expect(parseMessage("DONE rc=")).toBeNull();
  });
});
