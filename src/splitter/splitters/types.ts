/**
 * Common options for content splitters
 */
export interface ContentSplitterOptions {
  /** Target maximum size of each emitted chunk */
  chunkSize: number;
}

/**
 * Splits one piece of content into chunks no larger than the configured size,
 * except where a single unit cannot be divided.
 */
export interface ContentSplitter {
  split(content: string): string[];
}

/**
 * A candidate cut point searched for backwards inside the window.
 */
export interface BoundaryRule {
  name: "fence" | "paragraph" | "sentence" | "line" | "space";
  delimiter: string;
  /** The match offset must be strictly greater than `minFraction * budget` */
  minFraction: number;
  /** Added to the match offset to get the cut offset */
  cutOffset: number;
}
