import type { SubtitleDocument } from "../types.js";

// Characters that some players and encoders mangle, and what to use instead
export const CHARACTER_FIXES: ReadonlyMap<string, string> = new Map([
  ["¶", "♪"],
]);

/**
 * Replace known problem characters in cue text.
 * @returns The document (the same object when nothing changed) and how many
 *   characters were replaced
 */
export function fixCharacters(
  document: SubtitleDocument,
  fixes: ReadonlyMap<string, string> = CHARACTER_FIXES
): { document: SubtitleDocument; fixed: number } {
  let fixed = 0;
  const blocks = document.blocks.map((block) => {
    let text = "";
    for (const char of block.text) {
      const replacement = fixes.get(char);
      if (replacement === undefined) {
        text += char;
      } else {
        text += replacement;
        fixed++;
      }
    }
    return text === block.text ? block : { ...block, text };
  });

  return fixed === 0
    ? { document, fixed }
    : { document: { ...document, blocks }, fixed };
}
