/**
 * Scan state for fenced code regions. A line starting with three backticks
 * flips between the two states.
 */
export enum FenceState {
  InProse = "prose",
  InFence = "fence",
}

/**
 * A run of lines belonging to one heading scope.
 */
export interface MarkdownSection {
  /** Trimmed ATX header line, or an empty string for content before the first header */
  header: string;
  /** Trimmed section text, including the header line when there is one */
  content: string;
}

/**
 * A fenced code block pulled out of a document together with the prose around it.
 */
export interface CodeBlock {
  code: string;
  /** Language tag from the opening fence, or an empty string */
  language: string;
  contextBefore: string;
  contextAfter: string;
}

/**
 * Interface for a splitter that turns a markdown document into chunk strings
 */
export interface DocumentSplitter {
  splitText(markdown: string): string[];
}
