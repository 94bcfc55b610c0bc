import { formatCommandLine } from "../lib/processRunner";
import type { ProcessRunner } from "../lib/processRunner";
import type { ProbeOutcome, VideoRef } from "../contracts";

// Strict decimal: rejects "12abc", "Infinity", "0x10" and friends that
// Number()/parseFloat() would accept or half-accept.
const DURATION_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function buildProbeArgs(video: VideoRef): string[] {
  return [
    "-v",
    "error",
    "-show_entries",
    "format=duration",
    "-of",
    "default=noprint_wrappers=1:nokey=1",
    video,
  ];
}

/**
 * Parse the probe's stdout into a duration.
 *
 * Policy:
 * - Empty output -> 0 with a warning
 * - Negative value -> clamped to 0 with a warning
 * - Anything non-numeric -> ParseFailure
 */
export function parseDurationOutput(stdout: string): ProbeOutcome {
  const text = stdout.trim();

  if (text.length === 0) {
    return {
      ok: true,
      duration: { seconds: 0, warning: "Probe returned an empty duration. Assuming 0." },
    };
  }

  const seconds = DURATION_PATTERN.test(text) ? Number(text) : NaN;
  if (!Number.isFinite(seconds)) {
    return {
      ok: false,
      error: {
        kind: "ParseFailure",
        message: `Cannot parse probe duration output: "${text}"`,
        output: text,
      },
    };
  }

  if (seconds < 0) {
    return {
      ok: true,
      duration: {
        seconds: 0,
        warning: `Probe returned a negative duration (${seconds}s). Using 0.`,
      },
    };
  }

  return { ok: true, duration: { seconds } };
}

/**
 * Ask ffprobe for the container duration of a video. No retries.
 */
export async function probeDuration(
  video: VideoRef,
  ffprobePath: string,
  runner: ProcessRunner
): Promise<ProbeOutcome> {
  const args = buildProbeArgs(video);
  const command = formatCommandLine(ffprobePath, args);
  const result = await runner.run(ffprobePath, args);

  if (result.error !== undefined || result.exitCode !== 0) {
    const diagnostics = [result.error, result.stderr.trim()]
      .filter((s): s is string => s !== undefined && s.length > 0)
      .join("\n");
    return {
      ok: false,
      error: {
        kind: "ExecutionFailure",
        message: `ffprobe failed on ${video} (exit code ${result.exitCode})`,
        command,
        diagnostics,
      },
    };
  }

  const outcome = parseDurationOutput(result.stdout);
  if (!outcome.ok && outcome.error.kind === "ParseFailure") {
    return {
      ok: false,
      error: {
        ...outcome.error,
        message: `${outcome.error.message} for ${video}`,
      },
    };
  }
  if (outcome.ok && outcome.duration.warning) {
    return {
      ok: true,
      duration: {
        seconds: outcome.duration.seconds,
        warning: `${outcome.duration.warning} (${video})`,
      },
    };
  }
  return outcome;
}
