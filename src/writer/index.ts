import type { SubtitleBlock, SubtitleDocument } from "../types.js";

export interface ApplyResult {
  document: SubtitleDocument;
  removed: number;
  changed: boolean; // False means there is nothing to save
}

/**
 * Renumber blocks 1..N in their current order.
 */
export function renumberBlocks(blocks: SubtitleBlock[]): SubtitleBlock[] {
  return blocks.map((block, i) =>
    block.index === i + 1 ? block : { ...block, index: i + 1 }
  );
}

/**
 * Drop the blocks whose index is in `removals` and renumber the rest.
 * When nothing is removed the original document object is returned.
 */
export function applyRemovals(
  document: SubtitleDocument,
  removals: ReadonlySet<number>
): ApplyResult {
  const kept = document.blocks.filter((block) => !removals.has(block.index));
  const removed = document.blocks.length - kept.length;

  if (removed === 0) {
    return { document, removed: 0, changed: false };
  }

  return {
    document: { ...document, blocks: renumberBlocks(kept) },
    removed,
    changed: true,
  };
}
