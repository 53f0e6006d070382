import { z } from "zod";
import { chunkText } from "../splitter";
import { SPLITTER_DEFAULT_CHUNK_SIZE } from "../utils/config";
import { logger } from "../utils/logger";
import { parseToolInput } from "./validation";

const chunkTextInput = z.object({
  markdown: z.string(),
  chunkSize: z.number().int().positive().default(SPLITTER_DEFAULT_CHUNK_SIZE),
});

export type ChunkTextToolOptions = z.input<typeof chunkTextInput>;

export interface ChunkTextResult {
  chunks: string[];
}

/**
 * Tool for splitting a markdown document into header-aware chunks.
 */
export class ChunkTextTool {
  async execute(options: ChunkTextToolOptions): Promise<ChunkTextResult> {
    const { markdown, chunkSize } = parseToolInput(chunkTextInput, options, "ChunkTextTool");

    const chunks = chunkText(markdown, chunkSize);
    logger.debug(`Chunked ${markdown.length} chars into ${chunks.length} chunks (size ${chunkSize})`);

    return { chunks };
  }
}
