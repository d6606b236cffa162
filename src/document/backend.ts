import type { BackendName, SubtitleDocument } from "../types.js";

/**
 * Load/save contract shared by the native SRT parser and the subtitle
 * library. A document is always saved by the backend that loaded it.
 */
export interface DocumentBackend {
  readonly name: BackendName;
  /** Extensions picked up when expanding directories */
  readonly extensions: readonly string[];
  /**
   * @throws ParseError for structurally invalid input
   * @throws FileAccessError when the file cannot be read
   */
  load(path: string): Promise<SubtitleDocument>;
  /** Renumbers 1..N and overwrites `path` (the document's own path by default). */
  save(document: SubtitleDocument, path?: string): Promise<void>;
}

export function assertBackend(
  backend: DocumentBackend,
  document: SubtitleDocument
): void {
  if (document.backend !== backend.name) {
    throw new Error(
      `${document.path} was loaded by the ${document.backend} backend and cannot be saved by the ${backend.name} backend`
    );
  }
}
