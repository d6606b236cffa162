import { ParseError } from "../errors.js";
import type { DocumentLayout, SubtitleBlock, SubtitleDocument } from "../types.js";
import {
  readSubtitleFile,
  writeSubtitleFile,
} from "../utils/file_utils.js";
import * as logger from "../utils/logger.js";
import { formatSrtTiming, parseSrtTiming } from "../utils/time_utils.js";
import { assertBackend, type DocumentBackend } from "./backend.js";

const CUE_NUMBER_PATTERN = /^\s*(\d+)\s*$/;

function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

/**
 * Parse SRT text into blocks. Blocks are numbered 1..N by position; the
 * numbers written in the file are kept as sourceIndex and may be out of
 * sequence.
 * @throws ParseError with the 1-based line of the first structural problem
 */
export function parseSrt(text: string, path: string): SubtitleBlock[] {
  const lines = text.split(/\r?\n/);
  const blocks: SubtitleBlock[] = [];
  let i = 0;

  while (i < lines.length) {
    if (isBlank(lines[i])) {
      i++;
      continue;
    }

    const numberMatch = CUE_NUMBER_PATTERN.exec(lines[i]);
    if (!numberMatch) {
      throw new ParseError(
        path,
        `expected a cue number, found "${lines[i].trim()}"`,
        i + 1
      );
    }
    const sourceIndex = Number(numberMatch[1]);
    i++;

    const timing = i < lines.length ? parseSrtTiming(lines[i]) : null;
    if (!timing) {
      throw new ParseError(
        path,
        `cue ${sourceIndex} has a missing or malformed time range`,
        i + 1
      );
    }
    if (timing.endMs < timing.startMs) {
      throw new ParseError(path, `cue ${sourceIndex} ends before it starts`, i + 1);
    }
    i++;

    const textLines: string[] = [];
    while (i < lines.length && !isBlank(lines[i])) {
      textLines.push(lines[i]);
      i++;
    }

    blocks.push({
      index: blocks.length + 1,
      sourceIndex,
      startMs: timing.startMs,
      endMs: timing.endMs,
      text: textLines.join("\n"),
      ...(timing.settings ? { settings: timing.settings } : {}),
    });
  }

  return blocks;
}

/**
 * Serialize blocks as SRT, numbering them 1..N in the order given.
 */
export function serializeSrt(
  blocks: SubtitleBlock[],
  lineEnding: DocumentLayout["lineEnding"] = "\n"
): string {
  if (blocks.length === 0) return "";

  const body =
    blocks
      .map((block, i) => {
        const lines = [
          String(i + 1),
          formatSrtTiming(block.startMs, block.endMs, block.settings),
        ];
        if (block.text) lines.push(block.text);
        return lines.join("\n");
      })
      .join("\n\n") + "\n";

  return lineEnding === "\n" ? body : body.replace(/\n/g, lineEnding);
}

/** Reads and writes SRT directly. */
export class NativeBackend implements DocumentBackend {
  readonly name = "native" as const;
  readonly extensions = ["srt"];

  async load(path: string): Promise<SubtitleDocument> {
    const decoded = await readSubtitleFile(path);
    const blocks = parseSrt(decoded.text, path);
    logger.debug(`[SRT Parser] Parsed ${blocks.length} cue(s) from ${path}`);

    return {
      path,
      backend: this.name,
      format: "SRT",
      blocks,
      layout: {
        lineEnding: decoded.text.includes("\r\n") ? "\r\n" : "\n",
        hasBom: decoded.hasBom,
        encoding: decoded.encoding,
        headers: [],
        sideBlocks: [],
      },
    };
  }

  async save(document: SubtitleDocument, path: string = document.path): Promise<void> {
    assertBackend(this, document);
    const text = serializeSrt(document.blocks, document.layout.lineEnding);
    await writeSubtitleFile(path, text, document.layout.hasBom);
  }
}
