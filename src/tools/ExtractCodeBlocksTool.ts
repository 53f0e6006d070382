import { z } from "zod";
import { type CodeBlock, extractCodeBlocks } from "../splitter";
import { CODE_BLOCK_MIN_LENGTH } from "../utils/config";
import { logger } from "../utils/logger";
import { parseToolInput } from "./validation";

const extractCodeBlocksInput = z.object({
  markdown: z.string(),
  minLength: z.number().int().nonnegative().default(CODE_BLOCK_MIN_LENGTH),
});

export type ExtractCodeBlocksToolOptions = z.input<typeof extractCodeBlocksInput>;

export interface ExtractCodeBlocksResult {
  codeBlocks: CodeBlock[];
}

/**
 * Tool for pulling fenced code blocks and their surrounding prose out of a
 * markdown document.
 */
export class ExtractCodeBlocksTool {
  async execute(options: ExtractCodeBlocksToolOptions): Promise<ExtractCodeBlocksResult> {
    const { markdown, minLength } = parseToolInput(
      extractCodeBlocksInput,
      options,
      "ExtractCodeBlocksTool",
    );

    const codeBlocks = extractCodeBlocks(markdown, minLength);
    logger.debug(`Extracted ${codeBlocks.length} code blocks (min length ${minLength})`);

    return { codeBlocks };
  }
}
