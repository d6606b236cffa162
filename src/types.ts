// Common types shared across the scrubbing pipeline

import type { LogLevel } from "./utils/logger.js";

export type MatchMode = "plaintext" | "regex";
export type BackendName = "native" | "library";

// Resolved run configuration (built once in main.ts)
export interface Config {
  targets: string[]; // Files and/or directories given on the command line
  mode: MatchMode;
  caseSensitive: boolean;
  patternFiles: string[]; // In the order given
  inlinePattern?: string;
  backend: BackendName;
  extensions: string[]; // Used when expanding directories, without the dot
  recursive: boolean;
  autoRemove: boolean; // Remove every match without prompting
  dryRun: boolean; // Report matches, never prompt or write
  fixCharacters: boolean;
  logLevel: LogLevel;
  logFile?: string;
}

// One timed cue
export interface SubtitleBlock {
  index: number; // 1-based position in the document
  sourceIndex: number; // Number found in the file, may be out of sequence
  startMs: number;
  endMs: number;
  text: string; // Lines joined with "\n"
  settings?: string; // Anything after the end timestamp on the timing line
  identifier?: string; // WebVTT cue identifier, when the file had one
}

// A WebVTT NOTE, STYLE or REGION block, kept in place across a save
export interface SideBlock {
  afterCue: number; // sourceIndex of the cue it followed, 0 for before the first
  text: string;
}

// How the file looked on disk, so a save writes it back the same way
export interface DocumentLayout {
  lineEnding: "\n" | "\r\n";
  hasBom: boolean;
  encoding: string; // As detected on read; saves always write UTF-8
  headers: string[]; // Header nodes from the library backend (WebVTT)
  sideBlocks: SideBlock[];
}

export type SubtitleFormat = "SRT" | "WebVTT";

export interface SubtitleDocument {
  path: string;
  backend: BackendName;
  format: SubtitleFormat;
  blocks: SubtitleBlock[];
  layout: DocumentLayout;
}

// Where a pattern came from, for reporting
export interface PatternOrigin {
  source: string; // File path, "<inline>" or "<built-in>"
  line: number;
}

export type Pattern =
  | { kind: "literal"; text: string; needle: string; origin: PatternOrigin }
  | { kind: "regex"; text: string; regex: RegExp; origin: PatternOrigin };

export interface PatternLine {
  line: number; // 1-based within its source
  text: string;
}

export interface PatternSource {
  id: string;
  entries: PatternLine[];
}

export interface MatchCandidate {
  ordinal: number; // 1-based position among the file's candidates
  block: SubtitleBlock;
  pattern: Pattern;
}

export type Decision = "remove" | "keep";

export type OperatorCommand =
  | "remove"
  | "keep"
  | "remove-all"
  | "keep-all"
  | "quit";

export interface CandidateDecision {
  candidate: MatchCandidate;
  decision: Decision;
  decidedBy: "operator" | "override" | "quit";
}

export type FileStatus = "changed" | "unchanged" | "no-matches" | "failed";

export interface FileResult {
  path: string;
  status: FileStatus;
  candidates: number;
  removed: number;
  charactersFixed: number;
  quit: boolean;
  error?: Error;
}

export interface RunReport {
  files: FileResult[];
  changed: FileResult[];
  unchanged: FileResult[];
  noMatches: FileResult[];
  failed: FileResult[];
  patternCount: number;
  durationSeconds: number;
}
