import type { BackendName, SubtitleDocument } from "../types.js";
import type { DocumentBackend } from "./backend.js";
import { LibraryBackend } from "./library_backend.js";
import { NativeBackend } from "./native_backend.js";

export type { DocumentBackend } from "./backend.js";
export { NativeBackend, parseSrt, serializeSrt } from "./native_backend.js";
export { LibraryBackend } from "./library_backend.js";

const backends: Record<BackendName, DocumentBackend> = {
  native: new NativeBackend(),
  library: new LibraryBackend(),
};

export function getBackend(name: BackendName): DocumentBackend {
  return backends[name];
}

/**
 * Save with the backend that loaded the document, so an SRT read natively
 * is written natively and a library-read file keeps its format.
 */
export function saveDocument(
  document: SubtitleDocument,
  path?: string
): Promise<void> {
  return getBackend(document.backend).save(document, path);
}
