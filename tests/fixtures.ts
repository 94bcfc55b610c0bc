import sharp from "sharp";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import type { ProcessResult, ProcessRunner } from "../src/lib/processRunner";
import type { ToolPaths } from "../src/contracts";

export const FAKE_TOOLS: ToolPaths = {
  ffprobe: "/opt/media/bin/ffprobe",
  ffmpeg: "/opt/media/bin/ffmpeg",
};

/**
 * Create a temporary directory. Caller is responsible for cleanup.
 */
export function createTempDir(prefix = "vidsheet-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Remove a test directory and all contents.
 */
export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write placeholder "videos". Nothing decodes them; the fake runner
 * answers for ffprobe and ffmpeg.
 */
export function createFakeVideos(dir: string, names: string[]): string[] {
  return names.map((name) => {
    const p = path.join(dir, name);
    fs.writeFileSync(p, "not really a video");
    return p;
  });
}

/** Write a real JPEG so sharp can read it back like a rendered sheet. */
export async function writeSheetJpeg(
  outputPath: string,
  width = 320,
  height = 180
): Promise<void> {
  const jpeg = await sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 20, g: 20, b: 20 },
    },
  })
    .jpeg({ quality: 80 })
    .toBuffer();
  fs.writeFileSync(outputPath, jpeg);
}

export function ok(stdout = "", stderr = ""): ProcessResult {
  return { exitCode: 0, stdout, stderr };
}

export function exited(exitCode: number, stderr: string): ProcessResult {
  return { exitCode, stdout: "", stderr };
}

type Handler = (args: readonly string[]) => ProcessResult | Promise<ProcessResult>;

export interface FakeRunner extends ProcessRunner {
  calls: Array<{ command: string; args: string[] }>;
}

/**
 * In-process stand-in for ffprobe/ffmpeg. Dispatches on the executable's
 * basename and records every call.
 */
export function createFakeRunner(handlers: {
  ffprobe?: Handler;
  ffmpeg?: Handler;
}): FakeRunner {
  const calls: Array<{ command: string; args: string[] }> = [];
  return {
    calls,
    async run(command, args) {
      calls.push({ command, args: [...args] });
      const tool = path.basename(command);
      const handler = tool === "ffprobe" ? handlers.ffprobe : handlers.ffmpeg;
      if (!handler) {
        throw new Error(`Unexpected call to ${tool}`);
      }
      return handler(args);
    },
  };
}

/** ffmpeg stand-in that writes a JPEG to the output path (last argument). */
export function renderingFfmpeg(width = 320, height = 180): Handler {
  return async (args) => {
    await writeSheetJpeg(args[args.length - 1], width, height);
    return ok();
  };
}
