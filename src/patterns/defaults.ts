/**
 * Built-in advertising patterns, used when no pattern file or inline
 * pattern is given. Episode-speed markers, web addresses and the usual
 * "subtitles by" credits.
 */

export const DEFAULT_PLAINTEXT_PATTERNS: readonly string[] = Object.freeze([
  "1x",
  "2x",
  "3x",
  "4x",
  "5x",
  "6x",
  "7x",
  "8x",
  "9x",
  ".com",
  ".net",
  ".org",
  "air date",
  "caption",
  "download",
  "subtitle",
  "sync",
  "www.",
  "âª", // ♪ decoded as latin-1
]);

export const DEFAULT_REGEX_PATTERNS: readonly string[] = Object.freeze([
  "1x",
  "2x",
  "3x",
  "4x",
  "5x",
  "6x",
  "7x",
  "8x",
  "9x",
  "(?<!\\.)\\.com",
  "(?<!\\.)\\.net",
  "(?<!\\.)\\.org",
  "air date",
  "caption",
  "download",
  "subtitle",
  "sync",
  "(?<![A-Za-z0-9])www\\.",
  "âª",
]);

export const BUILT_IN_SOURCE_ID = "<built-in>";
export const INLINE_SOURCE_ID = "<inline>";
