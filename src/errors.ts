/**
 * Error kinds surfaced by the pipeline. Each carries the file or pattern
 * source it concerns so the batch can report it against the right target.
 */
export class AdscrubError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A pattern source line that could not be compiled. Fatal for the run. */
export class PatternCompileError extends AdscrubError {
  readonly source: string;
  readonly line: number;
  readonly pattern: string;

  constructor(
    source: string,
    line: number,
    pattern: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(
      line > 0
        ? `Invalid pattern at ${source}:${line} (${pattern}): ${reason}`
        : `Invalid pattern source ${source}: ${reason}`,
      options
    );
    this.source = source;
    this.line = line;
    this.pattern = pattern;
  }
}

/** A subtitle file that is structurally invalid. Fatal for that file only. */
export class ParseError extends AdscrubError {
  readonly path: string;
  readonly line?: number;

  constructor(
    path: string,
    reason: string,
    line?: number,
    options?: { cause?: unknown }
  ) {
    super(
      line !== undefined
        ? `${path}:${line}: ${reason}`
        : `${path}: ${reason}`,
      options
    );
    this.path = path;
    this.line = line;
  }
}

/** Missing, unreadable or unwritable file. */
export class FileAccessError extends AdscrubError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`${path}: ${reason}`, options);
    this.path = path;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
