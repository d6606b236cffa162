/**
 * Time utilities for SRT timestamps. All times are integer milliseconds.
 */

const TIMESTAMP_PATTERN = /^(\d{1,3}):(\d{1,2}):(\d{1,2})[,.](\d{1,3})$/;
const TIMING_LINE_PATTERN =
  /^\s*(\d{1,3}:\d{1,2}:\d{1,2}[,.]\d{1,3})\s*-->\s*(\d{1,3}:\d{1,2}:\d{1,2}[,.]\d{1,3})(.*)$/;

/**
 * Converts milliseconds to a timestamp string in format HH:MM:SS,mmm
 * @param ms Total milliseconds
 */
export function msToTimestamp(ms: number): string {
  const total = Math.max(0, Math.round(ms));
  const hours = Math.floor(total / 3_600_000);
  const minutes = Math.floor((total % 3_600_000) / 60_000);
  const secs = Math.floor((total % 60_000) / 1000);
  const millis = total % 1000;

  return `${hours.toString().padStart(2, "0")}:${minutes
    .toString()
    .padStart(2, "0")}:${secs.toString().padStart(2, "0")},${millis
    .toString()
    .padStart(3, "0")}`;
}

/**
 * Converts a timestamp in format HH:MM:SS,mmm (comma or period) to
 * milliseconds. Short fractions are read as decimals: ",5" is 500ms.
 * @returns Milliseconds, or null if the string is not a timestamp
 */
export function timestampToMs(timestamp: string): number | null {
  const match = TIMESTAMP_PATTERN.exec(timestamp.trim());
  if (!match) return null;
  const [, hours, minutes, seconds, fraction] = match;
  if (Number(minutes) > 59 || Number(seconds) > 59) return null;

  return (
    Number(hours) * 3_600_000 +
    Number(minutes) * 60_000 +
    Number(seconds) * 1000 +
    Number(fraction.padEnd(3, "0"))
  );
}

export interface SrtTiming {
  startMs: number;
  endMs: number;
  settings?: string; // Trailing text such as "X1:40 X2:600 Y1:20 Y2:50"
}

/**
 * Parse an SRT timing line (e.g. "00:01:23,456 --> 00:01:45,678")
 * @returns Start/end in milliseconds, or null if the line is not a timing line
 */
export function parseSrtTiming(timingLine: string): SrtTiming | null {
  const match = TIMING_LINE_PATTERN.exec(timingLine);
  if (!match) return null;

  const startMs = timestampToMs(match[1]);
  const endMs = timestampToMs(match[2]);
  if (startMs === null || endMs === null) return null;

  const settings = match[3].trim();
  return settings ? { startMs, endMs, settings } : { startMs, endMs };
}

/**
 * Format start and end milliseconds as an SRT timing line
 */
export function formatSrtTiming(
  startMs: number,
  endMs: number,
  settings?: string
): string {
  const line = `${msToTimestamp(startMs)} --> ${msToTimestamp(endMs)}`;
  return settings ? `${line} ${settings}` : line;
}
