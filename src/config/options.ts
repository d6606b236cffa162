import { getBackend } from "../document/index.js";
import type { BackendName, Config, MatchMode } from "../types.js";
import { isLogLevel } from "../utils/logger.js";

// Raw option values as commander hands them over
export interface CliOptions {
  file: string[];
  pattern?: string;
  regex?: boolean;
  caseSensitive?: boolean;
  library?: boolean;
  lr?: boolean;
  yes?: boolean;
  list?: boolean;
  extensions?: string;
  recursive: boolean;
  charfix: boolean;
  logLevel: string;
  logFile?: string;
}

type ShortcutConfig = Partial<{ backend: BackendName; mode: MatchMode }>;

// Flags that bundle other flags. Explicit options still win.
export const SHORTCUTS: Record<"lr", ShortcutConfig> = {
  lr: { backend: "library", mode: "regex" },
};

export function parseExtensions(value: string): string[] {
  return value
    .split(",")
    .map((ext) => ext.trim().replace(/^\./, "").toLowerCase())
    .filter((ext) => ext.length > 0);
}

export interface ConfigResult {
  config: Config;
  warnings: string[];
}

/**
 * Turn parsed command-line options into the run configuration.
 */
export function buildConfig(targets: string[], opts: CliOptions): ConfigResult {
  const warnings: string[] = [];
  const shortcut: ShortcutConfig = opts.lr ? SHORTCUTS.lr : {};

  const backend: BackendName = opts.library
    ? "library"
    : shortcut.backend ?? "native";
  const mode: MatchMode = opts.regex ? "regex" : shortcut.mode ?? "plaintext";

  let extensions = opts.extensions ? parseExtensions(opts.extensions) : [];
  if (extensions.length === 0) {
    if (opts.extensions !== undefined) {
      warnings.push(`No usable extensions in "${opts.extensions}", using defaults`);
    }
    extensions = [...getBackend(backend).extensions];
  }

  let logLevel: Config["logLevel"] = "info";
  if (isLogLevel(opts.logLevel)) {
    logLevel = opts.logLevel;
  } else {
    warnings.push(`Unknown log level "${opts.logLevel}", using "info"`);
  }

  if (opts.yes && opts.list) {
    warnings.push("--list never changes files, ignoring --yes");
  }

  return {
    config: {
      targets,
      mode,
      caseSensitive: opts.caseSensitive ?? false,
      patternFiles: opts.file,
      inlinePattern: opts.pattern,
      backend,
      extensions,
      recursive: opts.recursive,
      autoRemove: (opts.yes ?? false) && !opts.list,
      dryRun: opts.list ?? false,
      fixCharacters: opts.charfix,
      logLevel,
      logFile: opts.logFile,
    },
    warnings,
  };
}
