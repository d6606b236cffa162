#!/usr/bin/env node

import { Command } from "commander";
import { realpathSync } from "fs";
import { basename } from "path";
import { pathToFileURL } from "url";
import chalk from "chalk";
import boxen from "boxen";
import { buildConfig, type CliOptions } from "./config/options.js";
import { describeError } from "./errors.js";
import { runBatch } from "./pipeline/index.js";
import { TerminalDecisionSource } from "./remover/index.js";
import type { Config, RunReport } from "./types.js";
import * as logger from "./utils/logger.js";

export const EXIT_OK = 0;
export const EXIT_FILE_ERRORS = 1;
export const EXIT_FATAL = 2;

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function formatReport(report: RunReport, config: Config): string {
  const verb = config.dryRun ? "Files with matches" : "Files changed";
  let content = `Scan Summary:\n`;
  content += `- Files scanned: ${report.files.length}\n`;
  content += `- Patterns: ${report.patternCount} (${config.mode}${
    config.caseSensitive ? ", case-sensitive" : ""
  })\n`;
  if (config.dryRun) {
    content += `- ${verb}: ${report.unchanged.length}\n`;
  } else {
    content += `- ${verb}: ${report.changed.length}\n`;
    content += `- Matches kept: ${report.unchanged.length}\n`;
  }
  content += `- No matches: ${report.noMatches.length}\n`;
  content += `- Skipped (errors): ${report.failed.length}\n`;

  const removed = report.changed.reduce((sum, f) => sum + f.removed, 0);
  if (removed > 0) {
    content += `- Cues removed: ${removed}\n`;
  }
  if (report.changed.length > 0) {
    content += `\nChanged:\n`;
    report.changed.forEach((f) => (content += `    - ${f.path} (-${f.removed})\n`));
  }
  if (report.failed.length > 0) {
    content += `\nErrors:\n`;
    report.failed.forEach(
      (f) => (content += `    - ${f.error ? f.error.message : f.path}\n`)
    );
  }
  content += `\nFinished in ${report.durationSeconds.toFixed(1)}s`;
  return content;
}

/**
 * CLI entry point. Resolves to the process exit code.
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const program = new Command();

  program
    .name("adscrub")
    .description("Remove advertising and credits from subtitle files")
    .version("0.1.0")
    .argument("<paths...>", "Subtitle files and/or directories to scan")
    .option(
      "-f, --file <path>",
      "Read match patterns from a file, one per line (repeatable)",
      collect,
      []
    )
    .option("-e, --pattern <pattern>", "Match a single pattern")
    .option("--regex", "Treat patterns as regular expressions")
    .option("-c, --case-sensitive", "Match case exactly")
    .option(
      "-L, --library",
      "Read and write files with the subtitle library (SRT and WebVTT)"
    )
    .option("--lr", "Shortcut for --library --regex")
    .option("-y, --yes", "Remove every match without asking")
    .option("--list", "Only report matches; never prompt or change files")
    .option(
      "-x, --extensions <list>",
      "Comma-separated extensions to pick up in directories (default: srt, or srt,vtt with --library)"
    )
    .option("--no-recursive", "Do not descend into subdirectories")
    .option("--no-charfix", "Do not replace problem characters (¶ -> ♪)")
    .option("--log-level <level>", "Log level (debug, info, warn, error)", "info")
    .option("--log-file <path>", "Also write debug logs to this file")
    .addHelpText(
      "after",
      `
Answers at the prompt:
  y  remove this cue        n  keep this cue
  a  remove all remaining   s  keep all remaining
  q  keep the rest and move on to the next file

Examples:
  # Scan a folder with the built-in word list
  adscrub ~/Videos/Series

  # Use your own regular expressions on WebVTT files
  adscrub --lr --file ads.txt ./subs

  # See what would be flagged without touching anything
  adscrub --list -e "subscribe to our channel" episode01.srt
    `
    )
    .parse(argv);

  const { config, warnings } = buildConfig(
    program.args,
    program.opts<CliOptions>()
  );

  logger.configureLogger({
    consoleLogLevel: config.logLevel,
    logToFile: config.logFile !== undefined,
    logFilePath: config.logFile,
    fileLogLevel: "debug",
  });
  warnings.forEach((w) => logger.warn(w));
  logger.debug(`Configuration: ${JSON.stringify(config, null, 2)}`);

  const decisions = new TerminalDecisionSource();
  try {
    const report = await runBatch(config, decisions);

    if (report.changed.length + report.unchanged.length === 0 && report.failed.length === 0) {
      logger.info(
        `Search of ${config.targets.map((t) => basename(t)).join(", ")} returned no results.`
      );
    }
    console.log(
      boxen(formatReport(report, config), {
        padding: 1,
        margin: 1,
        borderColor: report.failed.length > 0 ? "yellow" : "green",
        title: config.dryRun ? "Scan Report" : "Scrub Summary",
      })
    );
    return report.failed.length > 0 ? EXIT_FILE_ERRORS : EXIT_OK;
  } catch (err) {
    const stack = err instanceof Error ? err.stack : undefined;
    logger.error(`Fatal error: ${describeError(err)}`, stack);
    console.error(
      boxen(chalk.red(`Fatal Error: ${describeError(err)}`), {
        padding: 1,
        margin: 1,
        borderColor: "red",
      })
    );
    return EXIT_FATAL;
  } finally {
    decisions.close();
    await logger.flushLogs();
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

// Run if this is the main module
if (isMainModule()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = EXIT_FATAL;
    }
  );
}
