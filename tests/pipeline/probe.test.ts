import { describe, it, expect } from "vitest";
import { buildProbeArgs, parseDurationOutput, probeDuration } from "../../src/pipeline/probe";
import { createFakeRunner, exited, FAKE_TOOLS, ok } from "../fixtures";

describe("parseDurationOutput", () => {
  it('parses "12.5" as 12.5 seconds', () => {
    expect(parseDurationOutput("12.5")).toEqual({ ok: true, duration: { seconds: 12.5 } });
  });

  it("ignores surrounding whitespace", () => {
    expect(parseDurationOutput("  125.040000\n")).toEqual({
      ok: true,
      duration: { seconds: 125.04 },
    });
  });

  it("treats empty output as 0 with a warning", () => {
    expect(parseDurationOutput("")).toEqual({
      ok: true,
      duration: { seconds: 0, warning: "Probe returned an empty duration. Assuming 0." },
    });
  });

  it("treats whitespace-only output as empty", () => {
    const result = parseDurationOutput(" \n");
    expect(result.ok && result.duration.seconds).toBe(0);
  });

  it('clamps "-3.0" to 0 with a warning', () => {
    expect(parseDurationOutput("-3.0")).toEqual({
      ok: true,
      duration: { seconds: 0, warning: "Probe returned a negative duration (-3s). Using 0." },
    });
  });

  it('rejects "abc" as ParseFailure', () => {
    expect(parseDurationOutput("abc")).toEqual({
      ok: false,
      error: {
        kind: "ParseFailure",
        message: 'Cannot parse probe duration output: "abc"',
        output: "abc",
      },
    });
  });

  for (const text of ["N/A", "12abc", "Infinity", "0x10", "1,5", "12.5\n13.0"]) {
    it(`rejects ${JSON.stringify(text)}`, () => {
      const result = parseDurationOutput(text);
      expect(!result.ok && result.error.kind).toBe("ParseFailure");
    });
  }

  it("accepts exponent notation", () => {
    expect(parseDurationOutput("1.5e2")).toEqual({ ok: true, duration: { seconds: 150 } });
  });
});

describe("buildProbeArgs", () => {
  it("asks for the bare format duration", () => {
    expect(buildProbeArgs("/videos/a.mp4")).toEqual([
      "-v",
      "error",
      "-show_entries",
      "format=duration",
      "-of",
      "default=noprint_wrappers=1:nokey=1",
      "/videos/a.mp4",
    ]);
  });
});

describe("probeDuration", () => {
  it("runs ffprobe once and returns the duration", async () => {
    const runner = createFakeRunner({ ffprobe: () => ok("600.000000\n") });
    const result = await probeDuration("/videos/a.mp4", FAKE_TOOLS.ffprobe, runner);

    expect(result).toEqual({ ok: true, duration: { seconds: 600 } });
    expect(runner.calls).toEqual([
      { command: FAKE_TOOLS.ffprobe, args: buildProbeArgs("/videos/a.mp4") },
    ]);
  });

  it("reports a non-zero exit as ExecutionFailure with diagnostics", async () => {
    const runner = createFakeRunner({
      ffprobe: () => exited(1, "/videos/a.mp4: Invalid data found when processing input\n"),
    });
    const result = await probeDuration("/videos/a.mp4", FAKE_TOOLS.ffprobe, runner);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "ExecutionFailure",
        message: "ffprobe failed on /videos/a.mp4 (exit code 1)",
        command:
          "/opt/media/bin/ffprobe -v error -show_entries format=duration " +
          "-of default=noprint_wrappers=1:nokey=1 /videos/a.mp4",
        diagnostics: "/videos/a.mp4: Invalid data found when processing input",
      },
    });
  });

  it("reports a spawn failure as ExecutionFailure", async () => {
    const runner = createFakeRunner({
      ffprobe: () => ({ exitCode: -1, stdout: "", stderr: "", error: "spawn ffprobe ENOENT" }),
    });
    const result = await probeDuration("/videos/a.mp4", FAKE_TOOLS.ffprobe, runner);

    expect(!result.ok && result.error.kind).toBe("ExecutionFailure");
    if (!result.ok && result.error.kind === "ExecutionFailure") {
      expect(result.error.diagnostics).toBe("spawn ffprobe ENOENT");
    }
  });

  it("names the video in parse failures", async () => {
    const runner = createFakeRunner({ ffprobe: () => ok("N/A\n") });
    const result = await probeDuration("/videos/a.mp4", FAKE_TOOLS.ffprobe, runner);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "ParseFailure",
        message: 'Cannot parse probe duration output: "N/A" for /videos/a.mp4',
        output: "N/A",
      },
    });
  });

  it("names the video in warnings", async () => {
    const runner = createFakeRunner({ ffprobe: () => ok("") });
    const result = await probeDuration("/videos/a.mp4", FAKE_TOOLS.ffprobe, runner);

    expect(result).toEqual({
      ok: true,
      duration: {
        seconds: 0,
        warning: "Probe returned an empty duration. Assuming 0. (/videos/a.mp4)",
      },
    });
  });

  it("does not retry after a failure", async () => {
    const runner = createFakeRunner({ ffprobe: () => exited(1, "boom") });
    await probeDuration("/videos/a.mp4", FAKE_TOOLS.ffprobe, runner);
    expect(runner.calls).toHaveLength(1);
  });
});
