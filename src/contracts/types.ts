/**
 * Shared contract types for the vidsheet pipeline.
 *
 * All pipeline modules import shared types from here.
 * No pipeline module should import types from another pipeline module.
 */

// --- Video ---

/** Absolute path of the source video. Never written or deleted. */
export type VideoRef = string;

// --- Configuration ---

export interface SheetConfig {
  /** Seconds between sampled frames. */
  interval: number;
  /** Grid width in thumbnails. */
  columns: number;
  /** Pixel height of each thumbnail; width follows the aspect ratio. */
  thumbHeight: number;
}

// --- Probe ---

export interface Duration {
  seconds: number;
  /** Set when the probe output was normalized (empty or negative). */
  warning?: string;
}

export type ProbeError =
  | { kind: "ParseFailure"; message: string; output: string }
  | {
      kind: "ExecutionFailure";
      message: string;
      command: string;
      diagnostics: string;
    };

export type ProbeOutcome =
  | { ok: true; duration: Duration }
  | { ok: false; error: ProbeError };

// --- Plan ---

export interface SheetPlan {
  readonly thumbnailCount: number;
  readonly columns: number;
  readonly rows: number;
}

export type PlanError =
  | { kind: "InvalidConfig"; message: string; problems: string[] }
  | { kind: "EmptyVideo"; message: string }
  | { kind: "NoThumbnails"; message: string };

export type PlanOutcome =
  | { ok: true; plan: SheetPlan }
  | { ok: false; error: PlanError };

// --- Filter graph ---

export interface TimestampLabel {
  /** drawtext expansion, e.g. %{pts\:hms} */
  text: string;
  x: number;
  y: number;
  fontSize: number;
  fontColor: string;
  boxColor: string;
  boxBorderWidth: number;
}

export interface TileGeometry {
  columns: number;
  rows: number;
  padding: number;
  margin: number;
}

/** Structured description of the renderer's video filter chain. */
export interface FilterGraph {
  /** Seconds between sampled frames (fps = 1/interval). */
  sampleInterval: number;
  scaleHeight: number;
  label: TimestampLabel;
  tile: TileGeometry;
}

// --- Render ---

export interface RenderRequest {
  readonly video: VideoRef;
  readonly plan: SheetPlan;
  readonly config: SheetConfig;
  readonly outputPath: string;
  readonly filter: FilterGraph;
  /** Renderer argument vector, without the executable. */
  readonly args: readonly string[];
}

export interface RenderError {
  kind: "ExecutionFailure";
  message: string;
  command: string;
  diagnostics: string;
  /** Set when the partial output could not be removed. */
  cleanupWarning?: string;
}

export type RenderOutcome =
  | { ok: true; outputPath: string }
  | { ok: false; error: RenderError };

// --- Tools ---

export interface ToolPaths {
  ffprobe: string;
  ffmpeg: string;
}

export interface ToolNotFound {
  kind: "ToolNotFound";
  message: string;
  missing: string[];
}

// --- Sheet result ---

export type SheetStage = "tools" | "probe" | "plan" | "render" | "output";

export type SheetFailure =
  | { stage: "tools"; error: ToolNotFound }
  | { stage: "probe"; error: ProbeError }
  | { stage: "plan"; error: PlanError }
  | { stage: "render"; error: RenderError }
  | { stage: "output"; error: { kind: "OutputFailure"; message: string } };

export type SheetResult =
  | {
      success: true;
      outputPath: string;
      duration: number;
      plan: SheetPlan;
      manifestPath?: string;
      warnings: string[];
    }
  | {
      success: false;
      failure: SheetFailure;
      /** One-line reason, prefixed with the failing stage. */
      error: string;
      warnings: string[];
    };
