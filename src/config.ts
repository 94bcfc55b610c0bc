import * as dotenv from "dotenv";
import * as path from "path";
import type { SheetConfig } from "./contracts";

export const DEFAULT_INTERVAL = 30;
export const DEFAULT_COLUMNS = 5;
export const DEFAULT_THUMB_HEIGHT = 250;

export interface AppConfig {
  /** Defaults for sheet options not given on the command line */
  sheet: SheetConfig;
  /** Deadline for each ffprobe/ffmpeg run in ms (0 = none) */
  timeoutMs: number;
  /** Environment used for tool lookup (FFMPEG_PATH, FFPROBE_PATH, PATH) */
  env: Record<string, string | undefined>;
}

/**
 * Load .env from the project root without overriding variables that
 * are already set. Missing .env is fine.
 */
export function loadDotenv(): void {
  dotenv.config({ path: path.resolve(__dirname, "../.env"), override: false });
}

function readNumber(
  env: Record<string, string | undefined>,
  key: string,
  fallback: number,
  opts: { integer: boolean; allowZero?: boolean }
): number {
  const raw = env[key]?.trim();
  if (raw === undefined || raw.length === 0) return fallback;

  const n = Number(raw);
  const validSign = opts.allowZero ? n >= 0 : n > 0;
  if (!Number.isFinite(n) || !validSign || (opts.integer && !Number.isInteger(n))) {
    const expected = opts.integer
      ? opts.allowZero ? "a non-negative integer" : "a positive integer"
      : "a positive number";
    throw new Error(`Invalid ${key}: "${raw}". Must be ${expected}.`);
  }
  return n;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const interval = readNumber(env, "VIDSHEET_INTERVAL", DEFAULT_INTERVAL, { integer: false });
  const columns = readNumber(env, "VIDSHEET_COLUMNS", DEFAULT_COLUMNS, { integer: true });
  const thumbHeight = readNumber(env, "VIDSHEET_THUMB_HEIGHT", DEFAULT_THUMB_HEIGHT, {
    integer: true,
  });
  const timeoutMs = readNumber(env, "VIDSHEET_TIMEOUT_MS", 0, {
    integer: true,
    allowZero: true,
  });

  return {
    sheet: { interval, columns, thumbHeight },
    timeoutMs,
    env,
  };
}
