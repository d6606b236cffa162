import { extname } from "path";
import { formatTimestamp, parseSync, stringifySync } from "subtitle";
import { ParseError, describeError } from "../errors.js";
import type {
  DocumentLayout,
  SideBlock,
  SubtitleBlock,
  SubtitleDocument,
  SubtitleFormat,
} from "../types.js";
import {
  readSubtitleFile,
  writeSubtitleFile,
} from "../utils/file_utils.js";
import * as logger from "../utils/logger.js";
import { assertBackend, type DocumentBackend } from "./backend.js";

type SubtitleNode = ReturnType<typeof parseSync>[number];

// A cue's text never holds a blank line; one means the parser ran two blocks together
const BLANK_LINE = /\n[ \t]*\n/;
const SIDE_BLOCK = /^(NOTE|STYLE|REGION)(\s|$)/;

/** Format the subtitle library should write for a path. */
export function formatForPath(path: string): SubtitleFormat {
  return extname(path).toLowerCase() === ".vtt" ? "WebVTT" : "SRT";
}

/**
 * Turn library nodes into blocks plus the header nodes to write back.
 * @throws ParseError on cues that end before they start, and on cue text
 * with a blank line in it (a following cue without a usable time range)
 */
export function nodesToBlocks(
  nodes: SubtitleNode[],
  path: string
): { blocks: SubtitleBlock[]; headers: string[] } {
  const blocks: SubtitleBlock[] = [];
  const headers: string[] = [];

  for (const node of nodes) {
    if (node.type === "header") {
      headers.push(node.data);
      continue;
    }
    const cue = node.data;
    const position = blocks.length + 1;
    if (cue.end < cue.start) {
      throw new ParseError(path, `cue ${position} ends before it starts`);
    }
    if (BLANK_LINE.test(cue.text)) {
      throw new ParseError(
        path,
        `cue ${position} runs into a block with a missing or malformed time range`
      );
    }
    const settings =
      "settings" in cue && typeof cue.settings === "string" && cue.settings
        ? cue.settings
        : undefined;
    blocks.push({
      index: position,
      sourceIndex: position,
      startMs: cue.start,
      endMs: cue.end,
      text: cue.text,
      ...(settings ? { settings } : {}),
    });
  }

  return { blocks, headers };
}

export function blocksToNodes(
  blocks: SubtitleBlock[],
  headers: string[]
): SubtitleNode[] {
  const nodes: SubtitleNode[] = headers.map((data) => ({
    type: "header" as const,
    data,
  }));
  for (const block of blocks) {
    nodes.push({
      type: "cue" as const,
      data: {
        start: block.startMs,
        end: block.endMs,
        text: block.text,
        ...(block.settings ? { settings: block.settings } : {}),
      },
    });
  }
  return nodes;
}

export interface VttLayout {
  identifiers: Array<string | undefined>; // One per cue, in order
  sideBlocks: SideBlock[];
}

/**
 * Read what the subtitle library drops from WebVTT: cue identifiers and
 * NOTE, STYLE and REGION blocks with the cue they follow.
 */
export function scanVttLayout(text: string): VttLayout {
  const identifiers: Array<string | undefined> = [];
  const sideBlocks: SideBlock[] = [];
  const chunks = text
    .replace(/\r\n/g, "\n")
    .split(BLANK_LINE)
    .map((chunk) => chunk.replace(/^\n+/, "").trimEnd())
    .filter((chunk) => chunk.length > 0);

  for (const [i, chunk] of chunks.entries()) {
    if (i === 0 && chunk.startsWith("WEBVTT")) continue;
    const lines = chunk.split("\n");
    if (lines[0].includes("-->")) {
      identifiers.push(undefined);
    } else if (lines.length > 1 && lines[1].includes("-->")) {
      identifiers.push(lines[0]);
    } else if (SIDE_BLOCK.test(lines[0])) {
      sideBlocks.push({ afterCue: identifiers.length, text: chunk });
    }
  }

  return { identifiers, sideBlocks };
}

function formatVttCue(block: SubtitleBlock): string {
  const timing = `${formatTimestamp(block.startMs, { format: "WebVTT" })} --> ${formatTimestamp(
    block.endMs,
    { format: "WebVTT" }
  )}`;
  const lines = [block.settings ? `${timing} ${block.settings}` : timing];
  if (block.identifier !== undefined) lines.unshift(block.identifier);
  if (block.text) lines.push(block.text);
  return lines.join("\n");
}

/**
 * Write WebVTT with the identifiers and side blocks the file was read with.
 * Side blocks whose cue was removed stay ahead of the next surviving cue.
 */
export function serializeVtt(
  blocks: SubtitleBlock[],
  layout: Pick<DocumentLayout, "headers" | "sideBlocks">
): string {
  const chunks = [layout.headers.length > 0 ? layout.headers.join("\n\n") : "WEBVTT"];
  const { sideBlocks } = layout;
  let next = 0;

  for (const block of blocks) {
    while (next < sideBlocks.length && sideBlocks[next].afterCue < block.sourceIndex) {
      chunks.push(sideBlocks[next].text);
      next++;
    }
    chunks.push(formatVttCue(block));
  }
  for (; next < sideBlocks.length; next++) {
    chunks.push(sideBlocks[next].text);
  }

  return chunks.join("\n\n") + "\n";
}

/**
 * Hands parsing and writing to the `subtitle` package (SRT and WebVTT).
 * Library errors surface as ParseError like the native backend's.
 */
export class LibraryBackend implements DocumentBackend {
  readonly name = "library" as const;
  readonly extensions = ["srt", "vtt"];

  async load(path: string): Promise<SubtitleDocument> {
    const decoded = await readSubtitleFile(path);

    let nodes: SubtitleNode[];
    try {
      nodes = parseSync(decoded.text);
    } catch (error) {
      throw new ParseError(path, describeError(error), undefined, {
        cause: error,
      });
    }
    if (nodes.length === 0 && decoded.text.trim().length > 0) {
      throw new ParseError(path, "no subtitle cues found");
    }

    const parsed = nodesToBlocks(nodes, path);
    const { headers } = parsed;
    let { blocks } = parsed;
    const format = formatForPath(path);
    logger.debug(
      `[Subtitle Library] Parsed ${blocks.length} cue(s) from ${path} as ${format}`
    );

    let sideBlocks: SideBlock[] = [];
    if (format === "WebVTT") {
      const scanned = scanVttLayout(decoded.text);
      sideBlocks = scanned.sideBlocks.filter(
        (side) => !headers.some((header) => header.includes(side.text))
      );
      if (scanned.identifiers.length === blocks.length) {
        blocks = blocks.map((block, i) => {
          const identifier = scanned.identifiers[i];
          return identifier === undefined ? block : { ...block, identifier };
        });
      } else {
        logger.warn(
          `${path}: found ${scanned.identifiers.length} cue(s) but the parser read ${blocks.length}, cue identifiers will not be kept`
        );
      }
    }

    return {
      path,
      backend: this.name,
      format,
      blocks,
      layout: {
        lineEnding: decoded.text.includes("\r\n") ? "\r\n" : "\n",
        hasBom: decoded.hasBom,
        encoding: decoded.encoding,
        headers,
        sideBlocks,
      },
    };
  }

  async save(document: SubtitleDocument, path: string = document.path): Promise<void> {
    assertBackend(this, document);
    const written =
      document.format === "WebVTT"
        ? serializeVtt(document.blocks, document.layout)
        : stringifySync(blocksToNodes(document.blocks, document.layout.headers), {
            format: document.format,
          });
    const text =
      document.layout.lineEnding === "\n"
        ? written
        : written.replace(/\r?\n/g, document.layout.lineEnding);
    await writeSubtitleFile(path, text, document.layout.hasBom);
  }
}
