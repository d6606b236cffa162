import cliProgress from "cli-progress";
import chalk from "chalk";
import { getBackend, saveDocument } from "../document/index.js";
import {
  AdscrubError,
  FileAccessError,
  ParseError,
  describeError,
} from "../errors.js";
import { buildPatternSet, describePattern, type PatternSet } from "../patterns/index.js";
import { resolve, type DecisionSource } from "../remover/index.js";
import { scan } from "../scanner/index.js";
import type { Config, FileResult, RunReport } from "../types.js";
import { collectSubtitleFiles, ensureWritable } from "../utils/file_utils.js";
import * as logger from "../utils/logger.js";
import { applyRemovals } from "../writer/index.js";
import { fixCharacters } from "./char_fixes.js";

export interface FileContext {
  config: Pick<Config, "backend" | "dryRun" | "autoRemove" | "fixCharacters">;
  patternSet: PatternSet;
  decisions: DecisionSource;
}

/**
 * Scan one file and remove the cues the operator confirms. The file is only
 * rewritten after every candidate is decided, and only if something changed.
 * @throws ParseError, FileAccessError
 */
export async function processFile(
  path: string,
  context: FileContext
): Promise<FileResult> {
  const { config, patternSet } = context;
  if (!config.dryRun) {
    await ensureWritable(path);
  }

  const loaded = await getBackend(config.backend).load(path);
  logger.debug(
    `Loaded ${path} as ${loaded.format} (${loaded.layout.encoding}, ${loaded.blocks.length} cue(s))`
  );
  const { document, fixed } = config.fixCharacters
    ? fixCharacters(loaded)
    : { document: loaded, fixed: 0 };
  if (fixed > 0) {
    logger.info(`Replaced ${fixed} problem character(s) in ${path}`);
  }

  const candidates = scan(document, patternSet);
  logger.debug(
    `${path}: ${candidates.length} of ${document.blocks.length} cue(s) matched`
  );

  const result: FileResult = {
    path,
    status: "no-matches",
    candidates: candidates.length,
    removed: 0,
    charactersFixed: config.dryRun ? 0 : fixed,
    quit: false,
  };

  if (config.dryRun) {
    for (const candidate of candidates) {
      logger.info(
        `${path}, cue ${candidate.block.sourceIndex}: ${JSON.stringify(
          candidate.block.text
        )} matched ${describePattern(candidate.pattern)}`
      );
    }
    result.status = candidates.length > 0 ? "unchanged" : "no-matches";
    return result;
  }

  let current = document;
  if (candidates.length > 0) {
    const outcome = await resolve(candidates, context.decisions, {
      autoRemove: config.autoRemove,
      path,
    });
    result.quit = outcome.quit;
    const applied = applyRemovals(document, outcome.removals);
    current = applied.document;
    result.removed = applied.removed;
  }

  if (result.removed > 0 || fixed > 0) {
    await saveDocument(current);
    result.status = "changed";
    logger.success(
      `Saved ${path}: removed ${result.removed} cue(s), ${current.blocks.length} remain`
    );
  } else {
    result.status = candidates.length > 0 ? "unchanged" : "no-matches";
  }

  return result;
}

function failedResult(path: string, error: Error): FileResult {
  return {
    path,
    status: "failed",
    candidates: 0,
    removed: 0,
    charactersFixed: 0,
    quit: false,
    error,
  };
}

export function summarize(
  files: FileResult[],
  patternCount: number,
  durationSeconds: number
): RunReport {
  return {
    files,
    changed: files.filter((f) => f.status === "changed"),
    unchanged: files.filter((f) => f.status === "unchanged"),
    noMatches: files.filter((f) => f.status === "no-matches"),
    failed: files.filter((f) => f.status === "failed"),
    patternCount,
    durationSeconds,
  };
}

/**
 * Run over every target. The pattern set is compiled before any file is
 * opened, so a bad pattern aborts the run with nothing touched. Per-file
 * parse and access errors are recorded and the batch moves on.
 * @throws PatternCompileError, FileAccessError (pattern files), AdscrubError
 *   when no subtitle files are found
 */
export async function runBatch(
  config: Config,
  decisions: DecisionSource
): Promise<RunReport> {
  const startTime = Date.now();
  const patternSet = await buildPatternSet(config);

  const discovery = await collectSubtitleFiles(config.targets, {
    extensions: config.extensions,
    recursive: config.recursive,
  });
  const results: FileResult[] = discovery.errors.map((error) => {
    logger.error(error.message);
    return failedResult(error.path, error);
  });

  if (discovery.files.length === 0 && results.length === 0) {
    throw new AdscrubError(
      `No subtitle files (${config.extensions.join(", ")}) found in ${config.targets.join(", ")}`
    );
  }
  logger.info(
    `Scanning ${discovery.files.length} file(s) with ${patternSet.size} ${config.mode} pattern(s)`
  );

  // Prompts and a progress bar would fight over the terminal
  const showProgress =
    (config.dryRun || config.autoRemove) && discovery.files.length > 1;
  const multibar = showProgress
    ? new cliProgress.MultiBar(
        {
          clearOnComplete: false,
          hideCursor: true,
          format: `${chalk.cyan(
            "{bar}"
          )} | {percentage}% | {value}/{total} Files | ${chalk.gray("{task}")}`,
        },
        cliProgress.Presets.shades_classic
      )
    : null;
  const progressBar = multibar?.create(discovery.files.length, 0, {
    task: "Starting scan...",
  });
  logger.setActiveMultibar(multibar);

  const context: FileContext = { config, patternSet, decisions };
  try {
    for (const [i, path] of discovery.files.entries()) {
      progressBar?.update(i, { task: path });
      try {
        results.push(await processFile(path, context));
      } catch (error) {
        if (error instanceof ParseError || error instanceof FileAccessError) {
          logger.error(`Skipping ${path}: ${error.message}`);
          results.push(failedResult(path, error));
        } else {
          const cause = error instanceof Error ? error : new Error(String(error));
          logger.error(
            `Unexpected error while processing ${path}: ${describeError(error)}`,
            cause.stack
          );
          results.push(failedResult(path, cause));
        }
      }
    }
    progressBar?.update(discovery.files.length, { task: "Done" });
  } finally {
    multibar?.stop();
    logger.setActiveMultibar(null);
  }

  return summarize(results, patternSet.size, (Date.now() - startTime) / 1000);
}
