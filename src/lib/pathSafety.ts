import * as fs from "fs";
import * as path from "path";

/**
 * Resolve the output path for a contact sheet and verify it does not
 * point at the source video. Returns the resolved absolute path.
 *
 * Throws if the output would overwrite the video.
 */
export function assertOutputDistinct(
  outputPath: string,
  videoPath: string
): string {
  const resolvedOutput = path.resolve(outputPath);
  const resolvedVideo = path.resolve(videoPath);

  if (isSameFile(resolvedOutput, resolvedVideo)) {
    throw new OutputPathError(
      `Output path resolves to the source video. ` +
        `Output: ${resolvedOutput}, Video: ${resolvedVideo}`
    );
  }

  return resolvedOutput;
}

/**
 * Verify the manifest sidecar and the sheet are different files.
 * Both paths are expected to be resolved already.
 */
export function assertManifestDistinct(manifestPath: string, sheetPath: string): void {
  if (isSameFile(manifestPath, sheetPath)) {
    throw new OutputPathError(
      `Manifest path resolves to the contact sheet. ` +
        `Choose an output name that does not end in .json. Output: ${sheetPath}`
    );
  }
}

function isSameFile(a: string, b: string): boolean {
  if (a === b) return true;
  // Catch symlinks and case-insensitive file systems when both exist.
  try {
    const statA = fs.statSync(a);
    const statB = fs.statSync(b);
    return statA.ino === statB.ino && statA.dev === statB.dev;
  } catch {
    return false;
  }
}

/**
 * Validate that a filename is a simple basename (no directory separators,
 * no traversal components). Used for candidates found by directory scans.
 */
export function assertSafeFilename(filename: string, label: string): void {
  if (
    filename.includes("/") ||
    filename.includes("\\") ||
    filename === ".." ||
    filename === "." ||
    filename.length === 0
  ) {
    throw new PathEscapeError(
      `${label} contains invalid path components: "${filename}"`
    );
  }
}

export class PathEscapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PathEscapeError";
  }
}

/** An output would overwrite the video or another output of the same run. */
export class OutputPathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OutputPathError";
  }
}
