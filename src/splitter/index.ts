export { extractCodeBlocks, findFenceOffsets, parseFencedRegion } from "./codeBlockExtractor";
export { chunkText, MarkdownChunker, type MarkdownChunkerOptions } from "./MarkdownChunker";
export { splitIntoSections } from "./sectionSplitter";
export {
  BOUNDARY_RULES,
  BoundedContentSplitter,
  type BoundedContentSplitterOptions,
  boundSection,
  findCutOffset,
  injectHeader,
} from "./splitters/BoundedContentSplitter";
export type { BoundaryRule, ContentSplitter, ContentSplitterOptions } from "./splitters/types";
export { type CodeBlock, type DocumentSplitter, FenceState, type MarkdownSection } from "./types";
