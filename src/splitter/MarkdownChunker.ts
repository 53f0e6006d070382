/**
 * MarkdownChunker - header-aware chunking for markdown documents
 *
 * Splits a document into header-scoped sections first, then bounds each
 * section with the boundary cascade of BoundedContentSplitter, which returns
 * sections that fit untouched.
 * Chunks come back in document order.
 */

import { SPLITTER_DEFAULT_CHUNK_SIZE } from "../utils/config";
import { logger } from "../utils/logger";
import { codePointLength } from "../utils/text";
import { splitIntoSections } from "./sectionSplitter";
import { boundSection } from "./splitters/BoundedContentSplitter";
import type { DocumentSplitter } from "./types";

/**
 * Configuration options for markdown chunking
 */
export interface MarkdownChunkerOptions {
  /** Target maximum size for individual chunks */
  chunkSize: number;
}

export class MarkdownChunker implements DocumentSplitter {
  private options: MarkdownChunkerOptions;

  constructor(options: Partial<MarkdownChunkerOptions> = {}) {
    this.options = {
      chunkSize: options.chunkSize ?? SPLITTER_DEFAULT_CHUNK_SIZE,
    };
  }

  splitText(markdown: string): string[] {
    const { chunkSize } = this.options;
    const chunks: string[] = [];

    for (const section of splitIntoSections(markdown)) {
      const pieces = boundSection(section.content, section.header, chunkSize);
      if (pieces.length > 1) {
        logger.debug(
          `Split oversized section "${section.header || "(no header)"}" (${codePointLength(section.content)} chars) into ${pieces.length} chunks`,
        );
      }
      chunks.push(...pieces);
    }

    return chunks;
  }
}

/**
 * Chunks a markdown document into header-aware pieces of at most `chunkSize`
 * characters (soft limit).
 */
export function chunkText(text: string, chunkSize: number = SPLITTER_DEFAULT_CHUNK_SIZE): string[] {
  return new MarkdownChunker({ chunkSize }).splitText(text);
}
