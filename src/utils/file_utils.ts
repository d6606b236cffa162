import { constants } from "fs";
import { access, readFile, readdir, rename, rm, stat, writeFile } from "fs/promises";
import { basename, dirname, extname, join, resolve } from "path";
import chardet from "chardet";
import { FileAccessError, describeError } from "../errors.js";
import type { DocumentLayout } from "../types.js";
import * as logger from "./logger.js";

export interface DecodedText {
  text: string;
  hasBom: boolean;
  encoding: DocumentLayout["encoding"];
}

const FALLBACK_ENCODING = "windows-1252";

const UTF16_BOMS: Array<{ bytes: [number, number]; encoding: string }> = [
  { bytes: [0xff, 0xfe], encoding: "utf-16le" },
  { bytes: [0xfe, 0xff], encoding: "utf-16be" },
];

function decodeAs(bytes: Uint8Array, encoding: string): string | null {
  try {
    return new TextDecoder(encoding).decode(bytes);
  } catch (error) {
    // TextDecoder throws RangeError for labels it does not support
    if (error instanceof RangeError) return null;
    throw error;
  }
}

/**
 * Decode raw subtitle bytes. Valid UTF-8 wins (BOM stripped and
 * remembered); UTF-16 is recognized by its BOM; anything else goes through
 * chardet, with windows-1252 when detection fails or names an encoding
 * TextDecoder cannot read.
 */
export function decodeSubtitleBytes(bytes: Uint8Array): DecodedText {
  try {
    const text = new TextDecoder("utf-8", {
      fatal: true,
      ignoreBOM: true,
    }).decode(bytes);
    const hasBom = text.charCodeAt(0) === 0xfeff;
    return {
      text: hasBom ? text.slice(1) : text,
      hasBom,
      encoding: "utf-8",
    };
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
  }

  const bom = UTF16_BOMS.find(
    ({ bytes: [a, b] }) => bytes[0] === a && bytes[1] === b
  );
  if (bom) {
    const text = decodeAs(bytes, bom.encoding);
    if (text !== null) {
      return { text, hasBom: true, encoding: bom.encoding };
    }
  }

  const detected = chardet.detect(bytes)?.toLowerCase();
  if (detected && detected !== FALLBACK_ENCODING) {
    const text = decodeAs(bytes, detected);
    if (text !== null) {
      return { text, hasBom: false, encoding: detected };
    }
    logger.debug(`Detected encoding ${detected} is not supported, using ${FALLBACK_ENCODING}`);
  }
  return {
    text: new TextDecoder(FALLBACK_ENCODING).decode(bytes),
    hasBom: false,
    encoding: FALLBACK_ENCODING,
  };
}

/**
 * Read a subtitle file into memory
 * @throws FileAccessError when the file cannot be read
 */
export async function readSubtitleFile(filePath: string): Promise<DecodedText> {
  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (error) {
    throw new FileAccessError(filePath, `cannot read file: ${describeError(error)}`, {
      cause: error,
    });
  }
  const decoded = decodeSubtitleBytes(bytes);
  if (decoded.encoding !== "utf-8") {
    logger.warn(
      `${filePath} is not UTF-8, read as ${decoded.encoding} (saves are written as UTF-8)`
    );
  }
  logger.debug(`Read ${bytes.length} bytes from ${filePath}`);
  return decoded;
}

/**
 * Replace a subtitle file with UTF-8 text, restoring the BOM if it had one.
 * The text goes to a temporary file in the same directory which is then
 * renamed over the target, so an interrupted save leaves the old file.
 * @throws FileAccessError when the file cannot be written
 */
export async function writeSubtitleFile(
  filePath: string,
  text: string,
  hasBom: boolean
): Promise<void> {
  const content = hasBom ? `\uFEFF${text}` : text;
  const tempPath = join(
    dirname(filePath),
    `.${basename(filePath)}.${process.pid}.tmp`
  );
  try {
    await writeFile(tempPath, content, "utf-8");
    await rename(tempPath, filePath);
    logger.debug(`Wrote to file: ${filePath}`);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new FileAccessError(filePath, `cannot write file: ${describeError(error)}`, {
      cause: error,
    });
  }
}

/**
 * @throws FileAccessError when the file is missing or not writable
 */
export async function ensureWritable(filePath: string): Promise<void> {
  try {
    await access(filePath, constants.R_OK | constants.W_OK);
  } catch (error) {
    throw new FileAccessError(filePath, "file is not writable", {
      cause: error,
    });
  }
}

export interface DiscoveryOptions {
  extensions: string[]; // Without the dot, compared case-insensitively
  recursive: boolean;
}

export interface DiscoveryResult {
  files: string[];
  errors: FileAccessError[];
}

function hasExtension(filePath: string, extensions: string[]): boolean {
  const ext = extname(filePath).slice(1).toLowerCase();
  return extensions.some((e) => e.toLowerCase() === ext);
}

async function walkDirectory(
  dirPath: string,
  options: DiscoveryOptions,
  found: string[]
): Promise<void> {
  const entries = await readdir(dirPath, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const entryPath = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      if (options.recursive) {
        await walkDirectory(entryPath, options, found);
      }
    } else if (entry.isFile() && hasExtension(entry.name, options.extensions)) {
      found.push(entryPath);
    }
  }
}

/**
 * Expand command-line targets into subtitle files. Files named directly are
 * always taken; directories contribute files with a matching extension.
 * Duplicates (by resolved path) are dropped, first occurrence wins.
 */
export async function collectSubtitleFiles(
  targets: string[],
  options: DiscoveryOptions
): Promise<DiscoveryResult> {
  const files: string[] = [];
  const errors: FileAccessError[] = [];
  const seen = new Set<string>();

  const add = (filePath: string) => {
    const key = resolve(filePath);
    if (seen.has(key)) return;
    seen.add(key);
    files.push(filePath);
  };

  for (const target of targets) {
    try {
      const stats = await stat(target);
      if (stats.isDirectory()) {
        const found: string[] = [];
        await walkDirectory(target, options, found);
        logger.debug(`Found ${found.length} subtitle file(s) in ${target}`);
        found.forEach(add);
      } else if (stats.isFile()) {
        add(target);
      } else {
        errors.push(new FileAccessError(target, "not a regular file or directory"));
      }
    } catch (error) {
      errors.push(
        new FileAccessError(target, `cannot access path: ${describeError(error)}`, {
          cause: error,
        })
      );
    }
  }

  return { files, errors };
}
