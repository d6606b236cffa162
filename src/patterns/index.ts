import { readFile } from "fs/promises";
import {
  FileAccessError,
  PatternCompileError,
  describeError,
} from "../errors.js";
import type {
  MatchMode,
  Pattern,
  PatternLine,
  PatternSource,
} from "../types.js";
import * as logger from "../utils/logger.js";
import {
  BUILT_IN_SOURCE_ID,
  DEFAULT_PLAINTEXT_PATTERNS,
  DEFAULT_REGEX_PATTERNS,
  INLINE_SOURCE_ID,
} from "./defaults.js";

export interface PatternOptions {
  mode: MatchMode;
  caseSensitive: boolean;
  patternFiles: string[];
  inlinePattern?: string;
}

/**
 * Compiled, ordered collection of patterns. Order is built-in list, then
 * pattern files in the order given, then the inline pattern; it only
 * decides which pattern gets reported, never whether a text matches.
 */
export class PatternSet {
  constructor(
    readonly patterns: readonly Pattern[],
    readonly mode: MatchMode,
    readonly caseSensitive: boolean
  ) {}

  get size(): number {
    return this.patterns.length;
  }

  /** First pattern matching the text, or null. */
  match(text: string): Pattern | null {
    const folded = this.fold(text);
    return this.patterns.find((p) => matchesPattern(p, text, folded)) ?? null;
  }

  /** Every pattern matching the text, in source order. */
  matchAll(text: string): Pattern[] {
    const folded = this.fold(text);
    return this.patterns.filter((p) => matchesPattern(p, text, folded));
  }

  private fold(text: string): string {
    return this.caseSensitive ? text : text.toLowerCase();
  }
}

function matchesPattern(pattern: Pattern, text: string, folded: string): boolean {
  return pattern.kind === "literal"
    ? folded.includes(pattern.needle)
    : pattern.regex.test(text);
}

/**
 * Split pattern file content into entries: one per line, skipping blank
 * lines and "#" comments. Needles are kept as written apart from the line
 * ending.
 */
export function parsePatternLines(id: string, content: string): PatternSource {
  const entries: PatternLine[] = [];
  content.split("\n").forEach((raw, i) => {
    const text = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
    const trimmed = text.trim();
    if (!trimmed || trimmed.startsWith("#")) return;
    entries.push({ line: i + 1, text });
  });
  return { id, entries };
}

/**
 * Gather pattern sources. Without pattern files or an inline pattern the
 * built-in list for the mode is used.
 * @throws FileAccessError if a pattern file cannot be read
 * @throws PatternCompileError if a pattern file has no patterns in it
 */
export async function loadPatternSources(
  options: Pick<PatternOptions, "mode" | "patternFiles" | "inlinePattern">
): Promise<PatternSource[]> {
  const sources: PatternSource[] = [];

  for (const filePath of options.patternFiles) {
    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (error) {
      throw new FileAccessError(
        filePath,
        `unable to load pattern file: ${describeError(error)}`,
        { cause: error }
      );
    }
    const source = parsePatternLines(filePath, content);
    if (source.entries.length === 0) {
      throw new PatternCompileError(filePath, 0, "", "no patterns found");
    }
    logger.debug(`Loaded ${source.entries.length} pattern(s) from ${filePath}`);
    sources.push(source);
  }

  if (options.inlinePattern !== undefined) {
    if (options.inlinePattern.length === 0) {
      throw new PatternCompileError(INLINE_SOURCE_ID, 1, "", "pattern is empty");
    }
    sources.push({
      id: INLINE_SOURCE_ID,
      entries: [{ line: 1, text: options.inlinePattern }],
    });
  }

  if (sources.length === 0) {
    const defaults =
      options.mode === "regex"
        ? DEFAULT_REGEX_PATTERNS
        : DEFAULT_PLAINTEXT_PATTERNS;
    sources.push({
      id: BUILT_IN_SOURCE_ID,
      entries: defaults.map((text, i) => ({ line: i + 1, text })),
    });
  }

  return sources;
}

/**
 * Compile sources into a PatternSet. Every line becomes an independent
 * alternative; duplicates are kept.
 * @throws PatternCompileError on the first regex that does not compile
 */
export function compilePatternSet(
  sources: PatternSource[],
  options: Pick<PatternOptions, "mode" | "caseSensitive">
): PatternSet {
  const flags = options.caseSensitive ? "m" : "im";
  const patterns: Pattern[] = [];

  for (const source of sources) {
    for (const entry of source.entries) {
      const origin = { source: source.id, line: entry.line };
      if (options.mode === "plaintext") {
        patterns.push({
          kind: "literal",
          text: entry.text,
          needle: options.caseSensitive
            ? entry.text
            : entry.text.toLowerCase(),
          origin,
        });
        continue;
      }

      try {
        patterns.push({
          kind: "regex",
          text: entry.text,
          regex: new RegExp(entry.text, flags),
          origin,
        });
      } catch (error) {
        throw new PatternCompileError(
          source.id,
          entry.line,
          entry.text,
          describeError(error),
          { cause: error }
        );
      }
    }
  }

  return new PatternSet(patterns, options.mode, options.caseSensitive);
}

/**
 * Load and compile the effective pattern set for a run.
 */
export async function buildPatternSet(
  options: PatternOptions
): Promise<PatternSet> {
  const sources = await loadPatternSources(options);
  const patternSet = compilePatternSet(sources, options);
  logger.debug(
    `Compiled ${patternSet.size} ${options.mode} pattern(s) from ${sources
      .map((s) => s.id)
      .join(", ")} (${options.caseSensitive ? "case-sensitive" : "ignoring case"})`
  );
  return patternSet;
}

/** Short human-readable label for a pattern, e.g. `"sync" (<built-in>:17)`. */
export function describePattern(pattern: Pattern): string {
  const shown = pattern.kind === "regex" ? `/${pattern.text}/` : `"${pattern.text}"`;
  return `${shown} (${pattern.origin.source}:${pattern.origin.line})`;
}
