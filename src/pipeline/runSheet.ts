import * as fs from "fs";
import * as path from "path";
import { probeDuration } from "./probe";
import { planSheet } from "./plan";
import { buildRenderRequest, FilterValueError } from "./filter";
import { renderSheet } from "./render";
import { generateManifest, manifestPathFor, writeManifest } from "./manifest";
import { assertManifestDistinct, assertOutputDistinct, OutputPathError } from "../lib/pathSafety";
import { locateTools } from "../lib/tools";
import type { ProcessRunner } from "../lib/processRunner";
import type {
  RenderRequest,
  SheetConfig,
  SheetFailure,
  SheetResult,
  ToolPaths,
  VideoRef,
} from "../contracts";

export interface RunSheetOptions {
  video: VideoRef;
  config: SheetConfig;
  outputPath: string;
  runner: ProcessRunner;
  /** Pre-located tools. When omitted they are looked up from `env`. */
  tools?: ToolPaths;
  env?: Record<string, string | undefined>;
  /** Write a JSON sidecar describing the sheet. */
  writeManifest?: boolean;
  /** Progress messages; the pipeline itself never prints. */
  onProgress?: (message: string) => void;
}

function describeFailure(failure: SheetFailure): string {
  switch (failure.stage) {
    case "tools":
      return failure.error.message;
    case "probe":
      return `Probe: ${failure.error.message}`;
    case "plan":
      return `Plan: ${failure.error.message}`;
    case "render":
      return `Render: ${failure.error.message}`;
    case "output":
      return `Output: ${failure.error.message}`;
  }
}

function fail(failure: SheetFailure, warnings: string[]): SheetResult {
  return { success: false, failure, error: describeFailure(failure), warnings };
}

/**
 * Produce one contact sheet: probe -> plan -> build request -> render.
 *
 * Never exits the process and never prints; every failure comes back
 * as a tagged SheetResult naming the stage that failed.
 */
export async function runSheet(options: RunSheetOptions): Promise<SheetResult> {
  const { video, config, runner } = options;
  const progress = options.onProgress ?? (() => undefined);
  const warnings: string[] = [];

  // Tools first, before any per-video work
  let tools = options.tools;
  if (!tools) {
    const located = locateTools(options.env ?? process.env);
    if (!located.ok) {
      return fail({ stage: "tools", error: located.error }, warnings);
    }
    tools = located.tools;
  }

  // Outputs must never land on the source video or on each other
  let outputPath: string;
  let manifestPath: string | undefined;
  try {
    outputPath = assertOutputDistinct(options.outputPath, video);
    if (options.writeManifest) {
      manifestPath = assertOutputDistinct(manifestPathFor(outputPath), video);
      assertManifestDistinct(manifestPath, outputPath);
    }
  } catch (err) {
    if (err instanceof OutputPathError) {
      return fail({ stage: "output", error: { kind: "OutputFailure", message: err.message } }, warnings);
    }
    throw err;
  }

  // Probe
  progress(`Processing ${path.basename(video)}...`);
  const probed = await probeDuration(video, tools.ffprobe, runner);
  if (!probed.ok) {
    return fail({ stage: "probe", error: probed.error }, warnings);
  }
  const durationSeconds = probed.duration.seconds;
  if (probed.duration.warning) {
    warnings.push(probed.duration.warning);
  }

  // Plan
  const planned = planSheet(durationSeconds, config);
  if (!planned.ok) {
    return fail({ stage: "plan", error: planned.error }, warnings);
  }
  const { plan } = planned;

  // Build request
  let request: RenderRequest;
  try {
    request = buildRenderRequest(plan, config, video, outputPath);
  } catch (err) {
    if (err instanceof FilterValueError) {
      return fail(
        {
          stage: "plan",
          error: { kind: "InvalidConfig", message: err.message, problems: [err.message] },
        },
        warnings
      );
    }
    throw err;
  }

  // Ensure output directory
  const outputDir = path.dirname(outputPath);
  try {
    fs.mkdirSync(outputDir, { recursive: true });
  } catch (err) {
    return fail(
      {
        stage: "output",
        error: {
          kind: "OutputFailure",
          message: `Cannot create output directory ${outputDir}: ${(err as Error).message}`,
        },
      },
      warnings
    );
  }

  // Render
  progress(
    `Generating contact sheet (${plan.columns}x${plan.rows} grid, ${plan.thumbnailCount} thumbnails)...`
  );
  const rendered = await renderSheet(request, tools.ffmpeg, runner);
  if (!rendered.ok) {
    if (rendered.error.cleanupWarning) {
      warnings.push(rendered.error.cleanupWarning);
    }
    return fail({ stage: "render", error: rendered.error }, warnings);
  }

  // Manifest
  if (manifestPath) {
    try {
      const manifest = await generateManifest({
        video,
        durationSeconds,
        config,
        plan,
        sheetPath: rendered.outputPath,
        manifestPath,
        warnings,
      });
      writeManifest(manifest, manifestPath);
    } catch (err) {
      return fail(
        {
          stage: "output",
          error: {
            kind: "OutputFailure",
            message: `Cannot write manifest ${manifestPath}: ${(err as Error).message}`,
          },
        },
        warnings
      );
    }
  }

  return {
    success: true,
    outputPath: rendered.outputPath,
    duration: durationSeconds,
    plan,
    ...(manifestPath ? { manifestPath } : {}),
    warnings,
  };
}
