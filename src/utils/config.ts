/**
 * Default configuration values for the chunking engine and the tools around it
 */

/** Target maximum length of an emitted chunk, in characters */
export const SPLITTER_DEFAULT_CHUNK_SIZE = 1500;

/**
 * Minimum offset into the cut window, as a fraction of the budget, for the
 * fence, paragraph, sentence and line boundary rules.
 */
export const SPLITTER_BOUNDARY_MIN_FRACTION = 0.3;

/** Minimum offset fraction for the last-resort space boundary rule */
export const SPLITTER_SPACE_MIN_FRACTION = 0.1;

/** Code blocks with a shorter body are dropped by the extractor */
export const CODE_BLOCK_MIN_LENGTH = 50;

/** Characters of prose captured on each side of an extracted code block */
export const CODE_BLOCK_CONTEXT_CHARS = 500;

/** A language tag must be strictly shorter than this */
export const LANGUAGE_TAG_MAX_LENGTH = 20;

/**
 * Truncation limits used when building the prompt for a code snippet title.
 */
export const CODE_TITLE_CONTEXT_CHARS = 500;
export const CODE_TITLE_CODE_CHARS = 1500;

/** Title used when no contextual title could be generated */
export const CODE_TITLE_FALLBACK = "Code Snippet";
