import {
  CODE_BLOCK_CONTEXT_CHARS,
  CODE_BLOCK_MIN_LENGTH,
  LANGUAGE_TAG_MAX_LENGTH,
} from "../utils/config";
import { codePointLength, firstCodePoints, lastCodePoints } from "../utils/text";
import type { CodeBlock } from "./types";

const FENCE_MARKER = "```";

/**
 * Returns the offsets of every fence marker, scanning left to right without overlap.
 */
export function findFenceOffsets(markdown: string): number[] {
  const offsets: number[] = [];
  let position = markdown.indexOf(FENCE_MARKER);
  while (position !== -1) {
    offsets.push(position);
    position = markdown.indexOf(FENCE_MARKER, position + FENCE_MARKER.length);
  }
  return offsets;
}

/**
 * Separates an optional language tag from the body of a fenced region.
 * The first line counts as a tag when it is a single short token followed by
 * more lines.
 */
export function parseFencedRegion(region: string): { language: string; code: string } {
  const newline = region.indexOf("\n");
  if (newline !== -1) {
    const firstLine = region.slice(0, newline).trim();
    if (
      firstLine &&
      !firstLine.includes(" ") &&
      codePointLength(firstLine) < LANGUAGE_TAG_MAX_LENGTH
    ) {
      return { language: firstLine, code: region.slice(newline + 1).trim() };
    }
  }
  return { language: "", code: region.trim() };
}

/**
 * Extracts fenced code blocks along with up to 500 characters of prose on each side.
 *
 * Fence markers are paired by position (1st with 2nd, 3rd with 4th, ...), so a
 * stray marker shifts the pairing of everything after it. A trailing unpaired
 * marker is ignored. Blocks whose body is shorter than `minLength` are dropped.
 */
export function extractCodeBlocks(
  markdown: string,
  minLength: number = CODE_BLOCK_MIN_LENGTH,
): CodeBlock[] {
  const offsets = findFenceOffsets(markdown);
  const blocks: CodeBlock[] = [];

  for (let i = 0; i + 1 < offsets.length; i += 2) {
    const open = offsets[i];
    const close = offsets[i + 1];
    const { language, code } = parseFencedRegion(
      markdown.slice(open + FENCE_MARKER.length, close),
    );

    if (codePointLength(code) < minLength) {
      continue;
    }

    const after = close + FENCE_MARKER.length;
    blocks.push({
      code,
      language,
      contextBefore: lastCodePoints(markdown.slice(0, open), CODE_BLOCK_CONTEXT_CHARS).trim(),
      contextAfter: firstCodePoints(markdown.slice(after), CODE_BLOCK_CONTEXT_CHARS).trim(),
    });
  }

  return blocks;
}
