import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { ParseError } from "../errors.js";
import type { SubtitleBlock } from "../types.js";
import { configureLogger } from "../utils/logger.js";
import { applyRemovals } from "../writer/index.js";
import { getBackend, saveDocument } from "./index.js";
import {
  LibraryBackend,
  blocksToNodes,
  formatForPath,
  nodesToBlocks,
  scanVttLayout,
  serializeVtt,
} from "./library_backend.js";

const SRT = `1
00:00:01,000 --> 00:00:02,000
Hello

2
00:00:03,000 --> 00:00:04,500
Sync and corrections
by the crew
`;

const VTT = `WEBVTT

00:00:01.000 --> 00:00:02.000
Hello

00:00:03.000 --> 00:00:04.500
Visit www.example.test
`;

function timesAndText(blocks: SubtitleBlock[]) {
  return blocks.map((b) => ({ startMs: b.startMs, endMs: b.endMs, text: b.text }));
}

describe("formatForPath", () => {
  it("writes WebVTT for .vtt files and SRT otherwise", () => {
    expect(formatForPath("a/b/episode.VTT")).toBe("WebVTT");
    expect(formatForPath("episode.srt")).toBe("SRT");
    expect(formatForPath("episode")).toBe("SRT");
  });
});

describe("nodesToBlocks / blocksToNodes", () => {
  it("numbers cues by position and keeps headers apart", () => {
    const { blocks, headers } = nodesToBlocks(
      [
        { type: "header", data: "WEBVTT" },
        { type: "cue", data: { start: 0, end: 1000, text: "A" } },
        { type: "cue", data: { start: 2000, end: 3000, text: "B" } },
      ],
      "x.vtt"
    );
    expect(headers).toEqual(["WEBVTT"]);
    expect(blocks).toEqual([
      { index: 1, sourceIndex: 1, startMs: 0, endMs: 1000, text: "A" },
      { index: 2, sourceIndex: 2, startMs: 2000, endMs: 3000, text: "B" },
    ]);
    expect(blocksToNodes(blocks, headers)).toEqual([
      { type: "header", data: "WEBVTT" },
      { type: "cue", data: { start: 0, end: 1000, text: "A" } },
      { type: "cue", data: { start: 2000, end: 3000, text: "B" } },
    ]);
  });

  it("rejects a cue that ends before it starts", () => {
    expect(() =>
      nodesToBlocks([{ type: "cue", data: { start: 5000, end: 1000, text: "A" } }], "x.srt")
    ).toThrow(ParseError);
  });

  it("rejects cue text that swallowed a block without timing", () => {
    expect(() =>
      nodesToBlocks(
        [{ type: "cue", data: { start: 0, end: 1000, text: "A\n\n2\nno timing here" } }],
        "x.srt"
      )
    ).toThrow("x.srt: cue 1 runs into a block with a missing or malformed time range");
  });
});

describe("scanVttLayout", () => {
  it("collects identifiers and side blocks with the cue they follow", () => {
    const layout = scanVttLayout(
      "WEBVTT\r\n\r\nSTYLE\r\n::cue { color: lime }\r\n\r\n" +
        "intro\r\n00:00:01.000 --> 00:00:02.000\r\nHello\r\n\r\n" +
        "NOTE between\r\n\r\n" +
        "00:00:03.000 --> 00:00:04.000\r\nBye\r\n"
    );
    expect(layout).toEqual({
      identifiers: ["intro", undefined],
      sideBlocks: [
        { afterCue: 0, text: "STYLE\n::cue { color: lime }" },
        { afterCue: 1, text: "NOTE between" },
      ],
    });
  });
});

describe("serializeVtt", () => {
  const cue = (sourceIndex: number, text: string, identifier?: string): SubtitleBlock => ({
    index: sourceIndex,
    sourceIndex,
    startMs: sourceIndex * 1000,
    endMs: sourceIndex * 1000 + 500,
    text,
    ...(identifier ? { identifier } : {}),
  });

  it("keeps a side block in place when the cue before it is gone", () => {
    const text = serializeVtt([cue(1, "One", "a"), cue(3, "Three")], {
      headers: ["WEBVTT"],
      sideBlocks: [{ afterCue: 2, text: "NOTE after two" }],
    });
    expect(text).toBe(
      "WEBVTT\n\na\n00:00:01.000 --> 00:00:01.500\nOne\n\n" +
        "NOTE after two\n\n00:00:03.000 --> 00:00:03.500\nThree\n"
    );
  });
});

describe("LibraryBackend", () => {
  let dir: string;
  const backend = new LibraryBackend();

  beforeAll(() => {
    configureLogger({ logToConsole: false });
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "adscrub-library-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("is the backend registered as library", () => {
    expect(getBackend("library").name).toBe("library");
    expect(getBackend("library").extensions).toEqual(["srt", "vtt"]);
  });

  it("loads SRT with multi-line cues", async () => {
    const path = join(dir, "episode.srt");
    await writeFile(path, SRT);

    const document = await backend.load(path);
    expect(document.backend).toBe("library");
    expect(document.format).toBe("SRT");
    expect(timesAndText(document.blocks)).toEqual([
      { startMs: 1000, endMs: 2000, text: "Hello" },
      { startMs: 3000, endMs: 4500, text: "Sync and corrections\nby the crew" },
    ]);
  });

  it("round-trips SRT cues through save", async () => {
    const path = join(dir, "episode.srt");
    await writeFile(path, SRT);

    const document = await backend.load(path);
    await saveDocument(document);
    const reloaded = await backend.load(path);
    expect(timesAndText(reloaded.blocks)).toEqual(timesAndText(document.blocks));
  });

  it("loads and round-trips WebVTT cues", async () => {
    const path = join(dir, "episode.vtt");
    await writeFile(path, VTT);

    const document = await backend.load(path);
    expect(document.format).toBe("WebVTT");
    expect(timesAndText(document.blocks)).toEqual([
      { startMs: 1000, endMs: 2000, text: "Hello" },
      { startMs: 3000, endMs: 4500, text: "Visit www.example.test" },
    ]);

    await backend.save(document);
    const reloaded = await backend.load(path);
    expect(timesAndText(reloaded.blocks)).toEqual(timesAndText(document.blocks));
  });

  it("rejects SRT where a cue lost its time range", async () => {
    const path = join(dir, "merged.srt");
    await writeFile(
      path,
      "1\n00:00:01,000 --> 00:00:02,000\nA\n\n2\nno timing here\n\n3\n00:00:05,000 --> 00:00:06,000\nC\n"
    );
    await expect(backend.load(path)).rejects.toBeInstanceOf(ParseError);
  });

  it("saves WebVTT without adding identifiers or losing notes", async () => {
    const path = join(dir, "notes.vtt");
    await writeFile(
      path,
      "WEBVTT\n\nNOTE a comment\n\n00:00:01.000 --> 00:00:02.000 align:start\nHello\n\n" +
        "00:00:03.000 --> 00:00:04.000\nVisit www.example.test\n\n00:00:05.000 --> 00:00:06.000\nBye\n"
    );

    const document = await backend.load(path);
    await saveDocument(applyRemovals(document, new Set([2])).document);

    expect(await readFile(path, "utf-8")).toBe(
      "WEBVTT\n\nNOTE a comment\n\n00:00:01.000 --> 00:00:02.000 align:start\nHello\n\n" +
        "00:00:05.000 --> 00:00:06.000\nBye\n"
    );
  });

  it("keeps WebVTT cue identifiers the file had", async () => {
    const path = join(dir, "ids.vtt");
    const source =
      "WEBVTT\n\n1\n00:00:01.000 --> 00:00:02.000\nHello\n\n2\n00:00:03.000 --> 00:00:04.000\nBye\n";
    await writeFile(path, source);

    const document = await backend.load(path);
    expect(document.blocks.map((b) => b.identifier)).toEqual(["1", "2"]);
    await saveDocument(document);
    expect(await readFile(path, "utf-8")).toBe(source);
  });

  it("wraps library failures as ParseError", async () => {
    const path = join(dir, "broken.srt");
    await writeFile(path, "1\nnot a timestamp\nHello\n");
    await expect(backend.load(path)).rejects.toBeInstanceOf(ParseError);
  });

  it("refuses documents loaded natively", async () => {
    const path = join(dir, "native.srt");
    await writeFile(path, SRT);
    const document = await getBackend("native").load(path);
    await expect(backend.save(document)).rejects.toThrow(
      "cannot be saved by the library backend"
    );
  });
});
