import * as path from "path";

// --- CLI Arg Types ---

/** Sheet options given on the command line; unset ones fall back to config. */
export interface SheetFlags {
  interval?: number;
  columns?: number;
  thumbHeight?: number;
  output?: string;
}

export interface RunArgs extends SheetFlags {
  command: "run";
  /** Explicit video; when absent the directory is scanned. */
  video?: string;
  dir: string;
  extensions: string[];
  nonInteractive: boolean;
  manifest: boolean;
}

export interface PlanArgs extends SheetFlags {
  command: "plan";
  video: string;
}

export interface ProbeArgs {
  command: "probe";
  video: string;
}

export interface HelpArgs {
  command: "help";
}

export type ParsedArgs = RunArgs | PlanArgs | ProbeArgs | HelpArgs;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

// --- Usage ---

export const USAGE = [
  "Usage:",
  "  vidsheet [run] [video] [-d dir] [-i seconds] [-c columns] [-H height]",
  "                 [-o output.jpg] [-e ext]... [--non-interactive] [--manifest]",
  "  vidsheet plan <video> [-i seconds] [-c columns] [-H height] [-o output.jpg]",
  "  vidsheet probe <video>",
  "",
  "Options:",
  "  -d, --dir <dir>          Directory to scan when no video is given (default: .)",
  "  -i, --interval <sec>     Seconds between thumbnails (default: 30)",
  "  -c, --columns <n>        Thumbnails per row (default: 5)",
  "  -H, --height <px>        Thumbnail height in pixels (default: 250)",
  "  -o, --output <file>      Output image (default: <video>_contact.jpg beside the video)",
  "  -e, --ext <ext>          Video extension to scan for, repeatable",
  "  -n, --non-interactive    Fail instead of prompting when several videos are found",
  "      --manifest           Write a JSON description next to the sheet",
].join("\n");

// --- Value parsing ---

function takeValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || (value.startsWith("-") && !/^-?\d/.test(value))) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

function parsePositive(raw: string, flag: string, integer: boolean): number {
  const n = Number(raw);
  if (raw.trim().length === 0 || !Number.isFinite(n) || n <= 0 || (integer && !Number.isInteger(n))) {
    throw new UsageError(
      `${flag} must be a positive ${integer ? "integer" : "number"} (got "${raw}")`
    );
  }
  return n;
}

/**
 * Parse a sheet option at args[i]. Returns the number of extra
 * arguments consumed, or -1 when args[i] is not a sheet option.
 */
function parseSheetFlag(args: string[], i: number, flags: SheetFlags): number {
  const arg = args[i];
  switch (arg) {
    case "-i":
    case "--interval":
      flags.interval = parsePositive(takeValue(args, i, arg), arg, false);
      return 1;
    case "-c":
    case "--columns":
      flags.columns = parsePositive(takeValue(args, i, arg), arg, true);
      return 1;
    case "-H":
    case "--height":
      flags.thumbHeight = parsePositive(takeValue(args, i, arg), arg, true);
      return 1;
    case "-o":
    case "--output":
      flags.output = path.resolve(takeValue(args, i, arg));
      return 1;
    default:
      return -1;
  }
}

function requireVideo(args: string[], command: string): string {
  if (args.length < 2 || args[1].startsWith("-")) {
    throw new UsageError(`'${command}' requires a video file path.`);
  }
  return path.resolve(args[1]);
}

// --- CLI Parsing ---

/**
 * Parse process.argv. Throws UsageError for anything malformed; the
 * caller prints it with USAGE and exits.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);

  if (args.includes("-h") || args.includes("--help")) {
    return { command: "help" };
  }

  const firstArg = args[0];

  // Canonical: probe <video>
  if (firstArg === "probe") {
    const video = requireVideo(args, "probe");
    if (args.length > 2) {
      throw new UsageError("'probe' does not accept additional arguments.");
    }
    return { command: "probe", video };
  }

  // Canonical: plan <video> [sheet options]
  if (firstArg === "plan") {
    const video = requireVideo(args, "plan");
    const flags: SheetFlags = {};
    for (let i = 2; i < args.length; i++) {
      const consumed = parseSheetFlag(args, i, flags);
      if (consumed < 0) {
        throw new UsageError(`Unknown argument "${args[i]}"`);
      }
      i += consumed;
    }
    return { command: "plan", video, ...flags };
  }

  // run is the default command
  const rest = firstArg === "run" ? args.slice(1) : args;
  const result: RunArgs = {
    command: "run",
    dir: path.resolve("."),
    extensions: [],
    nonInteractive: false,
    manifest: false,
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const consumed = parseSheetFlag(rest, i, result);
    if (consumed >= 0) {
      i += consumed;
      continue;
    }

    if (arg === "-d" || arg === "--dir") {
      result.dir = path.resolve(takeValue(rest, i, arg));
      i++;
    } else if (arg === "-e" || arg === "--ext") {
      result.extensions.push(takeValue(rest, i, arg));
      i++;
    } else if (arg === "-n" || arg === "--non-interactive") {
      result.nonInteractive = true;
    } else if (arg === "--manifest") {
      result.manifest = true;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown flag "${arg}"`);
    } else if (result.video === undefined) {
      result.video = path.resolve(arg);
    } else {
      throw new UsageError(`Unexpected argument "${arg}". Only one video can be processed per run.`);
    }
  }

  return result;
}
