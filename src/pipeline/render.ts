import * as fs from "fs";
import { formatCommandLine } from "../lib/processRunner";
import type { ProcessRunner } from "../lib/processRunner";
import type { RenderOutcome, RenderRequest } from "../contracts";

/**
 * Remove a partially written sheet. Returns a warning instead of
 * throwing when the file cannot be removed.
 */
export function removePartialOutput(outputPath: string): string | undefined {
  if (!fs.existsSync(outputPath)) return undefined;
  try {
    fs.rmSync(outputPath, { force: true });
    return undefined;
  } catch (err) {
    return `Could not remove incomplete file ${outputPath}: ${(err as Error).message}`;
  }
}

/**
 * Run ffmpeg for a prepared request. On any failure the output path is
 * left absent; on success it holds the finished sheet.
 */
export async function renderSheet(
  request: RenderRequest,
  ffmpegPath: string,
  runner: ProcessRunner
): Promise<RenderOutcome> {
  const command = formatCommandLine(ffmpegPath, request.args);
  const result = await runner.run(ffmpegPath, request.args);

  let message: string | undefined;
  if (result.error !== undefined || result.exitCode !== 0) {
    message = `ffmpeg failed (exit code ${result.exitCode})`;
  } else if (!fs.existsSync(request.outputPath)) {
    message = "ffmpeg reported success but wrote no output";
  }

  if (message === undefined) {
    return { ok: true, outputPath: request.outputPath };
  }

  const diagnostics = [result.error, result.stderr.trim()]
    .filter((s): s is string => s !== undefined && s.length > 0)
    .join("\n");
  const cleanupWarning = removePartialOutput(request.outputPath);

  return {
    ok: false,
    error: {
      kind: "ExecutionFailure",
      message,
      command,
      diagnostics,
      ...(cleanupWarning !== undefined ? { cleanupWarning } : {}),
    },
  };
}
