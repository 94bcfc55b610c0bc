import * as fs from "fs";
import * as path from "path";
import * as readline from "readline/promises";
import { assertSafeFilename } from "../lib/pathSafety";
import type { VideoRef } from "../contracts";

// --- Constants ---

export const DEFAULT_VIDEO_EXTENSIONS = [".mp4", ".mkv", ".avi", ".mov", ".wmv", ".flv"];

// --- Resolver ---

/**
 * Picks one video when a scan finds several. Returns null when the
 * user cancels or no choice can be made.
 */
export interface VideoResolver {
  resolve(candidates: VideoRef[]): Promise<VideoRef | null>;
}

export type SelectionResult =
  | { status: "selected"; video: VideoRef }
  | { status: "none"; message: string }
  | { status: "error"; error: string };

/**
 * Lower-case extensions and add the leading dot. No input means the
 * default set.
 */
export function normalizeExtensions(extensions: string[]): string[] {
  if (extensions.length === 0) return [...DEFAULT_VIDEO_EXTENSIONS];
  return extensions.map((ext) => {
    const lower = ext.trim().toLowerCase();
    return lower.startsWith(".") ? lower : `.${lower}`;
  });
}

/**
 * List video files directly inside `dir`, sorted by name.
 * Returns errors instead of throwing.
 */
export function listVideoFiles(
  dir: string,
  extensions: string[]
): { files: string[]; error?: string } {
  let entries: string[];
  try {
    entries = fs.readdirSync(dir);
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === "ENOENT") return { files: [], error: `Directory not found: ${dir}` };
    if (code === "EACCES" || code === "EPERM") {
      return { files: [], error: `Permission denied for directory: ${dir}` };
    }
    if (code === "ENOTDIR") return { files: [], error: `Not a directory: ${dir}` };
    return { files: [], error: `Cannot read directory ${dir}: ${(err as Error).message}` };
  }

  const files = entries.filter((name) => {
    if (!extensions.includes(path.extname(name).toLowerCase())) return false;
    try {
      return fs.statSync(path.join(dir, name)).isFile();
    } catch {
      return false;
    }
  });

  return { files: files.sort() };
}

/**
 * Resolve the video to process.
 * - Explicit file wins (must exist and be a file)
 * - Otherwise scan `dir`: none -> "none", one -> that file, several -> resolver
 */
export async function selectVideo(opts: {
  file?: string;
  dir: string;
  extensions: string[];
  resolver: VideoResolver;
}): Promise<SelectionResult> {
  if (opts.file !== undefined) {
    const video = path.resolve(opts.file);
    let isFile = false;
    try {
      isFile = fs.statSync(video).isFile();
    } catch {
      isFile = false;
    }
    if (!isFile) {
      return { status: "error", error: `Specified video file not found: ${opts.file}` };
    }
    return { status: "selected", video };
  }

  const dir = path.resolve(opts.dir);
  const listing = listVideoFiles(dir, opts.extensions);
  if (listing.error) {
    return { status: "error", error: listing.error };
  }

  if (listing.files.length === 0) {
    return {
      status: "none",
      message: `No video files with extensions (${opts.extensions.join(", ")}) found in ${dir}.`,
    };
  }

  const candidates = listing.files.map((name) => {
    assertSafeFilename(name, "Scanned file name");
    return path.join(dir, name);
  });

  if (candidates.length === 1) {
    return { status: "selected", video: candidates[0] };
  }

  const chosen = await opts.resolver.resolve(candidates);
  if (chosen === null) {
    return { status: "error", error: "No video selected." };
  }
  return { status: "selected", video: chosen };
}

// --- Resolvers ---

/** Refuses to guess between several candidates. */
export function createNonInteractiveResolver(
  onRefuse?: (candidates: VideoRef[]) => void
): VideoResolver {
  return {
    async resolve(candidates) {
      onRefuse?.(candidates);
      return null;
    },
  };
}

export interface PromptIO {
  /** Returns null at end of input. */
  ask(question: string): Promise<string | null>;
  print(line: string): void;
  close?(): void;
}

/**
 * Numbered-list prompt. Re-asks on invalid input; end of input cancels.
 */
export function createPromptResolver(io: PromptIO): VideoResolver {
  return {
    async resolve(candidates) {
      io.print("Found multiple video files:");
      candidates.forEach((candidate, idx) => {
        io.print(`  ${idx + 1}: ${path.basename(candidate)}`);
      });

      for (;;) {
        const answer = await io.ask(
          `Enter the number of the video file to process (1-${candidates.length}): `
        );
        if (answer === null) {
          io.print("Operation cancelled by user.");
          return null;
        }
        const trimmed = answer.trim();
        if (!/^\d+$/.test(trimmed)) {
          io.print("Invalid input. Please enter a number.");
          continue;
        }
        const choice = Number(trimmed);
        if (choice >= 1 && choice <= candidates.length) {
          return candidates[choice - 1];
        }
        io.print("Invalid choice. Please enter a number from the list.");
      }
    },
  };
}

/** PromptIO over the process's stdin/stdout. Call close() when done. */
export function createTerminalPromptIO(): PromptIO {
  let rl: readline.Interface | undefined;
  let closed: Promise<null> | undefined;

  return {
    async ask(question) {
      if (!rl || !closed) {
        const created = readline.createInterface({ input: process.stdin, output: process.stdout });
        closed = new Promise<null>((resolve) => created.once("close", () => resolve(null)));
        rl = created;
      }
      return Promise.race([rl.question(question), closed]);
    },
    print(line) {
      console.log(line);
    },
    close() {
      rl?.close();
    },
  };
}

/**
 * Output path used when none is given: <video dir>/<name>_contact.jpg
 */
export function defaultOutputPath(video: VideoRef): string {
  const parsed = path.parse(video);
  return path.join(parsed.dir, `${parsed.name}_contact.jpg`);
}
