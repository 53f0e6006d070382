import {
  SPLITTER_BOUNDARY_MIN_FRACTION,
  SPLITTER_SPACE_MIN_FRACTION,
} from "../../utils/config";
import { codePointLength } from "../../utils/text";
import type { BoundaryRule, ContentSplitter, ContentSplitterOptions } from "./types";

/**
 * Cut rules in priority order. The first rule whose last match in the window
 * lies past its minimum offset decides the cut.
 */
export const BOUNDARY_RULES: readonly BoundaryRule[] = [
  // Cut before the fence so the whole block moves to the next chunk
  { name: "fence", delimiter: "```", minFraction: SPLITTER_BOUNDARY_MIN_FRACTION, cutOffset: 0 },
  { name: "paragraph", delimiter: "\n\n", minFraction: SPLITTER_BOUNDARY_MIN_FRACTION, cutOffset: 0 },
  // Keep the period with the sentence it ends
  { name: "sentence", delimiter: ". ", minFraction: SPLITTER_BOUNDARY_MIN_FRACTION, cutOffset: 1 },
  { name: "line", delimiter: "\n", minFraction: SPLITTER_BOUNDARY_MIN_FRACTION, cutOffset: 0 },
  { name: "space", delimiter: " ", minFraction: SPLITTER_SPACE_MIN_FRACTION, cutOffset: 0 },
];

export interface BoundedContentSplitterOptions extends ContentSplitterOptions {
  /**
   * Header of the section being split. Continuation chunks are prefixed with it
   * so each chunk still carries its section context.
   */
  header?: string;
}

/**
 * Finds the cut offset, in code points, for a window of `budget` code points.
 * Falls back to a hard cut at `budget` when no rule clears its threshold.
 */
export function findCutOffset(window: string, budget: number): number {
  for (const rule of BOUNDARY_RULES) {
    const index = window.lastIndexOf(rule.delimiter);
    if (index === -1) {
      continue;
    }
    const offset = codePointLength(window.slice(0, index));
    if (offset > budget * rule.minFraction) {
      return offset + rule.cutOffset;
    }
  }
  return budget;
}

/**
 * Prefixes every chunk after the first with the section header, unless the
 * chunk already starts with it.
 */
export function injectHeader(chunks: string[], header: string): string[] {
  if (!header) {
    return chunks;
  }
  return chunks.map((chunk, index) =>
    index > 0 && !chunk.startsWith(header) ? `${header}\n${chunk}` : chunk,
  );
}

/**
 * Splits an oversized section into chunks using a priority cascade of
 * boundaries: code fences, paragraph breaks, sentence ends, line breaks and
 * finally spaces. Content that fits the chunk size is returned untouched.
 *
 * Sizes count code points. The limit is soft: a window without any acceptable
 * boundary is cut mid-token, and re-injected headers add their own length plus
 * a newline.
 */
export class BoundedContentSplitter implements ContentSplitter {
  constructor(private options: BoundedContentSplitterOptions) {}

  split(content: string): string[] {
    if (codePointLength(content) <= this.options.chunkSize) {
      return [content];
    }

    const header = this.options.header ?? "";
    return injectHeader(this.cut(content, this.getBudget(header)), header);
  }

  /**
   * Room left for body text once a header and its newline are prepended.
   */
  protected getBudget(header: string): number {
    const { chunkSize } = this.options;
    const budget = header ? chunkSize - codePointLength(header) - 1 : chunkSize;
    if (budget <= 0) {
      // Header alone does not fit; a budget below one would never advance
      return Math.max(chunkSize, 1);
    }
    return budget;
  }

  private cut(text: string, budget: number): string[] {
    const chars = Array.from(text);
    const chunks: string[] = [];
    let start = 0;

    while (start < chars.length) {
      if (chars.length - start <= budget) {
        const rest = chars.slice(start).join("").trim();
        if (rest) {
          chunks.push(rest);
        }
        break;
      }

      const window = chars.slice(start, start + budget).join("");
      const end = start + findCutOffset(window, budget);

      const chunk = chars.slice(start, end).join("").trim();
      if (chunk) {
        chunks.push(chunk);
      }
      start = end;
    }

    return chunks;
  }
}

/**
 * Bounds one section to `chunkSize`, re-injecting `header` into continuation chunks.
 */
export function boundSection(sectionText: string, header: string, chunkSize: number): string[] {
  return new BoundedContentSplitter({ chunkSize, header }).split(sectionText);
}
