/**
 * Timestamp label styling for contact sheet thumbnails.
 *
 * The renderer draws the label itself (drawtext); these constants are
 * the values serialized into the filter graph.
 */

import type { TimestampLabel } from "../contracts";

export const LABEL_TEXT = "%{pts\\:hms}";
export const LABEL_FONT_SIZE = 24;
export const LABEL_OFFSET_X = 10;
export const LABEL_OFFSET_Y = 10;
export const LABEL_TEXT_COLOR = "white@0.8";
export const LABEL_BG_COLOR = "black@0.5";
export const LABEL_BOX_BORDER = 5;

export function createTimestampLabel(): TimestampLabel {
  return {
    text: LABEL_TEXT,
    x: LABEL_OFFSET_X,
    y: LABEL_OFFSET_Y,
    fontSize: LABEL_FONT_SIZE,
    fontColor: LABEL_TEXT_COLOR,
    boxColor: LABEL_BG_COLOR,
    boxBorderWidth: LABEL_BOX_BORDER,
  };
}

/**
 * Format seconds as HH:MM:SS, truncating fractions. Hours are not
 * wrapped, so a 30h recording reads "30:00:00".
 */
export function formatTimestamp(totalSeconds: number): string {
  const whole = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const seconds = whole % 60;
  return [hours, minutes, seconds]
    .map((n) => String(n).padStart(2, "0"))
    .join(":");
}
