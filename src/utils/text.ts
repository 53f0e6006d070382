/**
 * Code point helpers. Sizes and cut offsets across the splitter count Unicode
 * code points, so astral characters (emoji, rare CJK) count as one and are
 * never cut in half.
 */

/**
 * Number of code points in `text`.
 */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}

/**
 * The first `count` code points of `text`.
 */
export function firstCodePoints(text: string, count: number): string {
  if (count <= 0) {
    return "";
  }
  // `count` code points span at most `2 * count` code units
  return Array.from(text.slice(0, count * 2))
    .slice(0, count)
    .join("");
}

/**
 * The last `count` code points of `text`.
 */
export function lastCodePoints(text: string, count: number): string {
  if (count <= 0) {
    return "";
  }
  return Array.from(text.slice(-count * 2))
    .slice(-count)
    .join("");
}
