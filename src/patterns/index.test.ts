import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileAccessError, PatternCompileError } from "../errors.js";
import {
  buildPatternSet,
  compilePatternSet,
  describePattern,
  loadPatternSources,
  parsePatternLines,
} from "./index.js";
import { DEFAULT_PLAINTEXT_PATTERNS, DEFAULT_REGEX_PATTERNS } from "./defaults.js";

describe("parsePatternLines", () => {
  it("skips blank lines and comments and keeps line numbers", () => {
    const source = parsePatternLines("ads.txt", "# ads\nsync\r\n\n  \nwww.\n");
    expect(source).toEqual({
      id: "ads.txt",
      entries: [
        { line: 2, text: "sync" },
        { line: 5, text: "www." },
      ],
    });
  });
});

describe("compilePatternSet (plaintext)", () => {
  const sources = [parsePatternLines("ads.txt", "ADVERT\nsync")];

  it("ignores case by default", () => {
    const set = compilePatternSet(sources, { mode: "plaintext", caseSensitive: false });
    expect(set.match("this is an advert")?.text).toBe("ADVERT");
  });

  it("respects case when asked", () => {
    const set = compilePatternSet(sources, { mode: "plaintext", caseSensitive: true });
    expect(set.match("this is an advert")).toBeNull();
    expect(set.match("an ADVERT here")?.text).toBe("ADVERT");
  });

  it("treats regex metacharacters literally", () => {
    const set = compilePatternSet([parsePatternLines("x", "a.c")], {
      mode: "plaintext",
      caseSensitive: false,
    });
    expect(set.match("abc")).toBeNull();
    expect(set.match("xa.cx")?.text).toBe("a.c");
  });

  it("reports the first pattern in source order", () => {
    const set = compilePatternSet(
      [parsePatternLines("one", "sync"), parsePatternLines("two", "resync")],
      { mode: "plaintext", caseSensitive: false }
    );
    const match = set.match("resync by example");
    expect(match?.origin).toEqual({ source: "one", line: 1 });
    expect(set.matchAll("resync by example").map((p) => p.origin.source)).toEqual([
      "one",
      "two",
    ]);
  });

  it("keeps duplicate patterns", () => {
    const set = compilePatternSet([parsePatternLines("dup", "sync\nsync")], {
      mode: "plaintext",
      caseSensitive: false,
    });
    expect(set.size).toBe(2);
  });
});

describe("compilePatternSet (regex)", () => {
  it("treats each line as an alternative", () => {
    const set = compilePatternSet([parsePatternLines("re", "^www\\.\nsubs? by")], {
      mode: "regex",
      caseSensitive: false,
    });
    expect(set.match("Subs by someone")?.text).toBe("subs? by");
    expect(set.match("www.example.test")?.text).toBe("^www\\.");
    expect(set.match("nothing here")).toBeNull();
  });

  it("anchors at line boundaries inside a multi-line cue", () => {
    const set = compilePatternSet([parsePatternLines("re", "^Visit us$")], {
      mode: "regex",
      caseSensitive: true,
    });
    expect(set.match("Enjoy the show\nVisit us")?.text).toBe("^Visit us$");
    expect(set.match("Enjoy the show\nvisit us")).toBeNull();
  });

  it("fails on an invalid expression with its source and line", () => {
    const sources = [parsePatternLines("bad.txt", "# header\nok\n(unclosed")];
    let caught: unknown;
    try {
      compilePatternSet(sources, { mode: "regex", caseSensitive: false });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(PatternCompileError);
    expect(caught).toMatchObject({ source: "bad.txt", line: 3, pattern: "(unclosed" });
  });

  it("does not compile the same text in plaintext mode", () => {
    const sources = [parsePatternLines("bad.txt", "(unclosed")];
    expect(() =>
      compilePatternSet(sources, { mode: "plaintext", caseSensitive: false })
    ).not.toThrow();
  });
});

describe("loadPatternSources", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "adscrub-patterns-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("uses the built-in list for the mode when nothing is given", async () => {
    const plain = await loadPatternSources({ mode: "plaintext", patternFiles: [] });
    expect(plain).toHaveLength(1);
    expect(plain[0].id).toBe("<built-in>");
    expect(plain[0].entries.map((e) => e.text)).toEqual([...DEFAULT_PLAINTEXT_PATTERNS]);

    const regex = await loadPatternSources({ mode: "regex", patternFiles: [] });
    expect(regex[0].entries.map((e) => e.text)).toEqual([...DEFAULT_REGEX_PATTERNS]);
  });

  it("orders files as given, then the inline pattern", async () => {
    const first = join(dir, "first.txt");
    const second = join(dir, "second.txt");
    await writeFile(first, "alpha\n");
    await writeFile(second, "beta\ngamma\n");

    const sources = await loadPatternSources({
      mode: "plaintext",
      patternFiles: [second, first],
      inlinePattern: "delta",
    });
    expect(sources.map((s) => s.id)).toEqual([second, first, "<inline>"]);
    expect(sources[2].entries).toEqual([{ line: 1, text: "delta" }]);
  });

  it("takes an inline pattern instead of the built-in list", async () => {
    const sources = await loadPatternSources({
      mode: "plaintext",
      patternFiles: [],
      inlinePattern: "# not a comment",
    });
    expect(sources).toEqual([
      { id: "<inline>", entries: [{ line: 1, text: "# not a comment" }] },
    ]);
  });

  it("fails on a missing pattern file", async () => {
    await expect(
      loadPatternSources({ mode: "plaintext", patternFiles: [join(dir, "nope.txt")] })
    ).rejects.toBeInstanceOf(FileAccessError);
  });

  it("fails on a pattern file with nothing in it", async () => {
    const empty = join(dir, "empty.txt");
    await writeFile(empty, "# only a comment\n\n");
    await expect(
      loadPatternSources({ mode: "plaintext", patternFiles: [empty] })
    ).rejects.toMatchObject({ source: empty, line: 0 });
  });
});

describe("buildPatternSet", () => {
  it("flags common advertising with the built-in regex list", async () => {
    const set = await buildPatternSet({
      mode: "regex",
      caseSensitive: false,
      patternFiles: [],
    });
    expect(set.match("Visit WWW.example.test")?.origin.line).toBe(18);
    expect(set.match("Subtitles by the crew")?.text).toBe("subtitle");
    expect(set.match("file...com")).toBeNull();
    expect(set.match("I'll be right back")).toBeNull();
  });

  it("labels patterns with their origin", async () => {
    const set = await buildPatternSet({
      mode: "plaintext",
      caseSensitive: false,
      patternFiles: [],
      inlinePattern: "promo",
    });
    expect(describePattern(set.patterns[0])).toBe('"promo" (<inline>:1)');
  });
});
