import * as fs from "fs";
import * as path from "path";
import * as crypto from "crypto";
import sharp from "sharp";
import type { SheetConfig, SheetPlan, VideoRef } from "../contracts";

export interface SheetManifest {
  schemaVersion: string;
  generatedAt: string;
  video: {
    path: string;
    durationSeconds: number;
  };
  config: SheetConfig;
  plan: {
    thumbnailCount: number;
    columns: number;
    rows: number;
  };
  sheet: {
    path: string;
    format: string;
    width: number;
    height: number;
    sizeBytes: number;
    sha256: string;
  };
  warnings: string[];
}

function sha256File(filePath: string): string {
  const data = fs.readFileSync(filePath);
  return crypto.createHash("sha256").update(data).digest("hex");
}

function toForwardSlash(p: string): string {
  return p.replace(/\\/g, "/");
}

/** Sidecar path next to the sheet: movie_contact.jpg -> movie_contact.json */
export function manifestPathFor(sheetPath: string): string {
  const parsed = path.parse(sheetPath);
  return path.join(parsed.dir, `${parsed.name}.json`);
}

/**
 * Describe a finished sheet. Dimensions are read back from the image,
 * so they reflect what the renderer actually produced.
 */
export async function generateManifest(opts: {
  video: VideoRef;
  durationSeconds: number;
  config: SheetConfig;
  plan: SheetPlan;
  sheetPath: string;
  manifestPath: string;
  warnings?: string[];
}): Promise<SheetManifest> {
  const { video, durationSeconds, config, plan, sheetPath, manifestPath, warnings = [] } = opts;
  const manifestDir = path.dirname(manifestPath);

  const meta = await sharp(sheetPath).metadata();

  return {
    schemaVersion: "1.0",
    generatedAt: new Date().toISOString(),
    video: {
      path: toForwardSlash(path.relative(manifestDir, video)),
      durationSeconds,
    },
    config: {
      interval: config.interval,
      columns: config.columns,
      thumbHeight: config.thumbHeight,
    },
    plan: {
      thumbnailCount: plan.thumbnailCount,
      columns: plan.columns,
      rows: plan.rows,
    },
    sheet: {
      path: toForwardSlash(path.relative(manifestDir, sheetPath)),
      format: meta.format ?? "unknown",
      width: meta.width ?? 0,
      height: meta.height ?? 0,
      sizeBytes: fs.statSync(sheetPath).size,
      sha256: sha256File(sheetPath),
    },
    warnings,
  };
}

export function writeManifest(manifest: SheetManifest, outputPath: string): void {
  fs.writeFileSync(outputPath, JSON.stringify(manifest, null, 2), "utf-8");
}
