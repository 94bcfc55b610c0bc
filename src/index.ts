#!/usr/bin/env node
import * as path from "path";
import { parseArgs, UsageError, USAGE } from "./cli/parseArgs";
import type { ParsedArgs, PlanArgs, ProbeArgs, RunArgs, SheetFlags } from "./cli/parseArgs";
import { loadConfig, loadDotenv } from "./config";
import type { AppConfig } from "./config";
import { createProcessRunner, formatCommandLine } from "./lib/processRunner";
import { locateTools } from "./lib/tools";
import { formatTimestamp } from "./lib/labels";
import { probeDuration } from "./pipeline/probe";
import { planSheet, previewSampleTimestamps } from "./pipeline/plan";
import { buildRenderRequest } from "./pipeline/filter";
import { runSheet } from "./pipeline/runSheet";
import {
  createNonInteractiveResolver,
  createPromptResolver,
  createTerminalPromptIO,
  defaultOutputPath,
  normalizeExtensions,
  selectVideo,
} from "./pipeline/select";
import type { SelectionResult } from "./pipeline/select";
import type { SheetConfig, ToolPaths } from "./contracts";

// --- Helpers ---

function exitWithError(message: string, details: string[] = []): never {
  console.error(`Error: ${message}`);
  for (const line of details) {
    console.error(`  ${line}`);
  }
  process.exit(1);
}

function sheetConfigFrom(flags: SheetFlags, config: AppConfig): SheetConfig {
  return {
    interval: flags.interval ?? config.sheet.interval,
    columns: flags.columns ?? config.sheet.columns,
    thumbHeight: flags.thumbHeight ?? config.sheet.thumbHeight,
  };
}

function requireTools(config: AppConfig): ToolPaths {
  const located = locateTools(config.env);
  if (!located.ok) {
    exitWithError(located.error.message);
  }
  return located.tools;
}

// --- Run Command ---

async function runCommand(args: RunArgs, config: AppConfig): Promise<void> {
  // Fail fast before scanning or prompting
  const tools = requireTools(config);
  const extensions = normalizeExtensions(args.extensions);

  if (args.video === undefined) {
    console.log(`Scanning directory ${args.dir} for video files (${extensions.join(", ")})...`);
  }

  const io = createTerminalPromptIO();
  const resolver = args.nonInteractive
    ? createNonInteractiveResolver(() => {
        console.error(`Error: Multiple video files found in ${args.dir} but running in non-interactive mode.`);
        console.error("Please specify a single video file.");
      })
    : createPromptResolver(io);

  let selection: SelectionResult;
  try {
    selection = await selectVideo({ file: args.video, dir: args.dir, extensions, resolver });
  } finally {
    io.close?.();
  }

  if (selection.status === "none") {
    console.log(selection.message);
    return;
  }
  if (selection.status === "error") {
    exitWithError(selection.error);
  }

  const video = selection.video;
  const outputPath = args.output ?? defaultOutputPath(video);

  const result = await runSheet({
    video,
    config: sheetConfigFrom(args, config),
    outputPath,
    runner: createProcessRunner({ timeoutMs: config.timeoutMs }),
    tools,
    writeManifest: args.manifest,
    onProgress: (message) => console.log(message),
  });

  for (const w of result.warnings) {
    console.error(`Warning: ${w}`);
  }

  if (!result.success) {
    const { failure } = result;
    const details: string[] = [];
    if (failure.stage === "probe") {
      const { error } = failure;
      if (error.kind === "ExecutionFailure") {
        details.push(`Command: ${error.command}`, `Stderr: ${error.diagnostics}`);
      } else {
        details.push(`ffprobe stdout: "${error.output}"`);
      }
    } else if (failure.stage === "render") {
      details.push(`Command: ${failure.error.command}`, `Stderr: ${failure.error.diagnostics}`);
    }
    exitWithError(result.error, details);
  }

  console.log(`Wrote ${result.outputPath}`);
  if (result.manifestPath) {
    console.log(`Wrote ${result.manifestPath}`);
  }
  console.log("Done.");
}

// --- Plan Command (dry run) ---

async function planCommand(args: PlanArgs, config: AppConfig): Promise<void> {
  const tools = requireTools(config);
  const sheet = sheetConfigFrom(args, config);
  const runner = createProcessRunner({ timeoutMs: config.timeoutMs });

  const probed = await probeDuration(args.video, tools.ffprobe, runner);
  if (!probed.ok) {
    const details = probed.error.kind === "ExecutionFailure" ? [`Command: ${probed.error.command}`] : [];
    exitWithError(probed.error.message, details);
  }
  if (probed.duration.warning) {
    console.error(`Warning: ${probed.duration.warning}`);
  }

  const planned = planSheet(probed.duration.seconds, sheet);
  if (!planned.ok) {
    exitWithError(planned.error.message);
  }
  const { plan } = planned;

  const outputPath = args.output ?? defaultOutputPath(args.video);
  const request = buildRenderRequest(plan, sheet, args.video, outputPath);

  console.log(`Video:      ${args.video}`);
  console.log(`Duration:   ${formatTimestamp(probed.duration.seconds)} (${probed.duration.seconds}s)`);
  console.log(`Grid:       ${plan.columns}x${plan.rows} (${plan.thumbnailCount} thumbnails)`);
  console.log(`Samples:    ${previewSampleTimestamps(plan, sheet)}`);
  console.log(`Output:     ${request.outputPath}`);
  console.log(`Command:    ${formatCommandLine(tools.ffmpeg, request.args)}`);
}

// --- Probe Command ---

async function probeCommand(args: ProbeArgs, config: AppConfig): Promise<void> {
  const tools = requireTools(config);
  const runner = createProcessRunner({ timeoutMs: config.timeoutMs });

  const probed = await probeDuration(args.video, tools.ffprobe, runner);
  if (!probed.ok) {
    const details = probed.error.kind === "ExecutionFailure"
      ? [`Command: ${probed.error.command}`, `Stderr: ${probed.error.diagnostics}`]
      : [];
    exitWithError(probed.error.message, details);
  }
  if (probed.duration.warning) {
    console.error(`Warning: ${probed.duration.warning}`);
  }
  console.log(`${path.basename(args.video)}: ${probed.duration.seconds}s (${formatTimestamp(probed.duration.seconds)})`);
}

// --- Main ---

async function main(): Promise<void> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      console.error(USAGE);
      process.exit(1);
    }
    throw err;
  }

  if (parsed.command === "help") {
    console.log(USAGE);
    return;
  }

  loadDotenv();
  let config: AppConfig;
  try {
    config = loadConfig(process.env);
  } catch (err) {
    exitWithError((err as Error).message);
  }

  if (parsed.command === "probe") {
    await probeCommand(parsed, config);
    return;
  }

  if (parsed.command === "plan") {
    await planCommand(parsed, config);
    return;
  }

  await runCommand(parsed, config);
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
