import * as path from "path";
import { createTimestampLabel } from "../lib/labels";
import type {
  FilterGraph,
  RenderRequest,
  SheetConfig,
  SheetPlan,
  VideoRef,
} from "../contracts";

export const TILE_PADDING = 10;
export const TILE_MARGIN = 10;
/** ffmpeg -q:v for JPEG (1 best .. 31 worst). */
export const JPEG_QUALITY = 3;

/**
 * Thrown when a filter value is not a range-checked number. Planning
 * validates first, so reaching this is a caller bug.
 */
export class FilterValueError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = "FilterValueError";
  }
}

function assertPositiveInteger(value: number, label: string): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new FilterValueError(`${label} must be a positive integer (got ${value})`);
  }
  return value;
}

/**
 * Plain decimal notation for a positive finite number. Exponent forms
 * ("1e-7") are expanded; values too large for fixed notation throw.
 */
export function formatDecimal(value: number, label: string): string {
  if (!Number.isFinite(value) || value <= 0) {
    throw new FilterValueError(`${label} must be a positive number (got ${value})`);
  }
  let text = String(value);
  if (text.includes("e")) {
    if (value >= 1e21) {
      throw new FilterValueError(`${label} is too large (got ${value})`);
    }
    text = value.toFixed(100).replace(/\.?0+$/, "");
  }
  if (!/^\d+(\.\d+)?$/.test(text) || Number(text) === 0) {
    throw new FilterValueError(`${label} cannot be written as a decimal (got ${value})`);
  }
  return text;
}

export function buildFilterGraph(plan: SheetPlan, config: SheetConfig): FilterGraph {
  return {
    sampleInterval: config.interval,
    scaleHeight: config.thumbHeight,
    label: createTimestampLabel(),
    tile: {
      columns: plan.columns,
      rows: plan.rows,
      padding: TILE_PADDING,
      margin: TILE_MARGIN,
    },
  };
}

/**
 * Serialize a filter graph to ffmpeg's -vf syntax:
 * sample -> scale -> timestamp label -> tile.
 *
 * Only numbers are interpolated, and each is checked here again, so no
 * text from outside the program reaches the filter string.
 */
export function serializeFilterGraph(graph: FilterGraph): string {
  const interval = formatDecimal(graph.sampleInterval, "Sample interval");
  const height = assertPositiveInteger(graph.scaleHeight, "Scale height");
  const columns = assertPositiveInteger(graph.tile.columns, "Tile columns");
  const rows = assertPositiveInteger(graph.tile.rows, "Tile rows");
  const { label, tile } = graph;

  const drawtext = [
    `text='${label.text}'`,
    `x=${label.x}`,
    `y=${label.y}`,
    `fontsize=${label.fontSize}`,
    `fontcolor=${label.fontColor}`,
    "box=1",
    `boxcolor=${label.boxColor}`,
    `boxborderw=${label.boxBorderWidth}`,
  ].join(":");

  return [
    `fps=1/${interval}`,
    `scale=-1:${height}`,
    `drawtext=${drawtext}`,
    `tile=layout=${columns}x${rows}:padding=${tile.padding}:margin=${tile.margin}`,
  ].join(",");
}

export function buildRenderArgs(
  video: VideoRef,
  filter: string,
  outputPath: string
): string[] {
  return [
    "-loglevel",
    "warning",
    "-i",
    video,
    "-vf",
    filter,
    "-frames:v",
    "1",
    "-q:v",
    String(JPEG_QUALITY),
    "-y",
    outputPath,
  ];
}

/**
 * Assemble the immutable request handed to the renderer. Paths are made
 * absolute so neither can be mistaken for an ffmpeg option.
 */
export function buildRenderRequest(
  plan: SheetPlan,
  config: SheetConfig,
  video: VideoRef,
  outputPath: string
): RenderRequest {
  const filter = buildFilterGraph(plan, config);
  const absVideo = path.resolve(video);
  const absOutput = path.resolve(outputPath);
  const args = buildRenderArgs(absVideo, serializeFilterGraph(filter), absOutput);

  return Object.freeze({
    video: absVideo,
    plan,
    config: Object.freeze({ ...config }),
    outputPath: absOutput,
    filter,
    args: Object.freeze(args),
  });
}
