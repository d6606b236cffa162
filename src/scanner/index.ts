import type { PatternSet } from "../patterns/index.js";
import type { MatchCandidate, SubtitleDocument } from "../types.js";

/**
 * Find the blocks that look like advertising. One candidate per matching
 * block, carrying the first pattern that matched, in document order.
 * The block text is matched as a whole with its line breaks intact.
 */
export function scan(
  document: SubtitleDocument,
  patternSet: PatternSet
): MatchCandidate[] {
  const candidates: MatchCandidate[] = [];
  for (const block of document.blocks) {
    const pattern = patternSet.match(block.text);
    if (pattern) {
      candidates.push({ ordinal: candidates.length + 1, block, pattern });
    }
  }
  return candidates;
}
