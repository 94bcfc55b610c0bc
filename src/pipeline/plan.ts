import { formatTimestamp } from "../lib/labels";
import type { PlanOutcome, SheetConfig, SheetPlan } from "../contracts";

/**
 * Check every SheetConfig field. Returns one message per violation;
 * an empty array means the config is usable.
 */
export function validateSheetConfig(config: SheetConfig): string[] {
  const problems: string[] = [];
  if (!Number.isFinite(config.interval) || config.interval <= 0) {
    problems.push(`interval must be a positive number of seconds (got ${config.interval})`);
  }
  if (!Number.isInteger(config.columns) || config.columns <= 0) {
    problems.push(`columns must be a positive integer (got ${config.columns})`);
  }
  if (!Number.isInteger(config.thumbHeight) || config.thumbHeight <= 0) {
    problems.push(`thumbHeight must be a positive integer (got ${config.thumbHeight})`);
  }
  return problems;
}

/**
 * Derive the thumbnail grid for a video of the given duration.
 * Pure: same inputs always give the same plan or the same error.
 */
export function planSheet(durationSeconds: number, config: SheetConfig): PlanOutcome {
  const problems = validateSheetConfig(config);
  if (problems.length > 0) {
    return {
      ok: false,
      error: {
        kind: "InvalidConfig",
        message: `Invalid sheet configuration: ${problems.join("; ")}`,
        problems,
      },
    };
  }

  if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
    return {
      ok: false,
      error: {
        kind: "EmptyVideo",
        message: "Video has zero duration; nothing to sample.",
      },
    };
  }

  const thumbnailCount = Math.ceil(durationSeconds / config.interval);
  // Unreachable for positive inputs under ceil, kept as a guard.
  if (thumbnailCount <= 0) {
    return {
      ok: false,
      error: {
        kind: "NoThumbnails",
        message:
          `Calculated 0 thumbnails (duration=${durationSeconds.toFixed(2)}s, ` +
          `interval=${config.interval}s).`,
      },
    };
  }

  const rows = Math.ceil(thumbnailCount / config.columns);
  return {
    ok: true,
    plan: Object.freeze({ thumbnailCount, columns: config.columns, rows }),
  };
}

/**
 * Nominal sample times (HH:MM:SS) of each thumbnail in the plan.
 * The renderer picks the nearest frame, so actual labels may differ
 * by a fraction of a second.
 */
export function sampleTimestamps(
  plan: SheetPlan,
  config: SheetConfig,
  limit = plan.thumbnailCount
): string[] {
  const stamps: string[] = [];
  const count = Math.min(limit, plan.thumbnailCount);
  for (let i = 0; i < count; i++) {
    stamps.push(formatTimestamp(i * config.interval));
  }
  return stamps;
}

/** One-line preview of the sample times, listing at most `limit` of them. */
export function previewSampleTimestamps(plan: SheetPlan, config: SheetConfig, limit = 8): string {
  const shown = sampleTimestamps(plan, config, limit).join(" ");
  const hidden = plan.thumbnailCount - Math.min(limit, plan.thumbnailCount);
  return hidden > 0 ? `${shown} ... (${hidden} more)` : shown;
}
