import { z } from "zod";
import { chunkText, extractCodeBlocks } from "../splitter";
import { CODE_BLOCK_MIN_LENGTH, SPLITTER_DEFAULT_CHUNK_SIZE } from "../utils/config";
import { logger } from "../utils/logger";
import { type CodeTitleGenerator, formatCodePayload, resolveCodeTitle } from "./codeTitle";
import { ValidationError } from "./errors";
import { parseToolInput } from "./validation";

const prepareDocumentInput = z.object({
  url: z
    .string()
    .transform((s) => s.trim())
    .refine((s) => s.length > 0, "must not be empty"),
  title: z.string().default(""),
  markdown: z.string(),
  chunkSize: z.number().int().positive().default(SPLITTER_DEFAULT_CHUNK_SIZE),
  minCodeLength: z.number().int().nonnegative().default(CODE_BLOCK_MIN_LENGTH),
  /** Prefix each code payload with a generated one-sentence title */
  contextualTitles: z.boolean().default(false),
});

export type PrepareDocumentToolOptions = z.input<typeof prepareDocumentInput>;

export interface PreparedChunk {
  content: string;
  metadata: {
    url: string;
    title: string;
    chunkIndex: number;
  };
}

export interface PreparedCodeSnippet {
  /** Text to embed: the code, optionally preceded by its generated title */
  payload: string;
  metadata: {
    url: string;
    title: string;
    codeIndex: number;
    language: string;
    /** Untouched code, kept for exact retrieval */
    rawCode: string;
  };
}

export interface PreparedDocument {
  chunks: PreparedChunk[];
  codeSnippets: PreparedCodeSnippet[];
}

/**
 * Tool that turns one crawled page into the records an embedding pipeline
 * consumes: prose chunks and code snippets, each tagged with page metadata.
 * Embedding and storage happen downstream.
 */
export class PrepareDocumentTool {
  constructor(private readonly titleGenerator?: CodeTitleGenerator) {}

  async execute(options: PrepareDocumentToolOptions): Promise<PreparedDocument> {
    const { url, title, markdown, chunkSize, minCodeLength, contextualTitles } =
      parseToolInput(prepareDocumentInput, options, "PrepareDocumentTool");

    const generator = contextualTitles ? this.titleGenerator : undefined;
    if (contextualTitles && !generator) {
      throw new ValidationError(
        "Contextual titles were requested but no code title generator is configured.",
        "PrepareDocumentTool",
      );
    }

    const chunks = chunkText(markdown, chunkSize).map(
      (content, chunkIndex): PreparedChunk => ({
        content,
        metadata: { url, title, chunkIndex },
      }),
    );

    const codeSnippets: PreparedCodeSnippet[] = [];
    for (const [codeIndex, block] of extractCodeBlocks(markdown, minCodeLength).entries()) {
      const codeTitle = generator ? await resolveCodeTitle(generator, block) : undefined;
      codeSnippets.push({
        payload: formatCodePayload(block.code, codeTitle),
        metadata: {
          url,
          title,
          codeIndex,
          language: block.language,
          rawCode: block.code,
        },
      });
    }

    logger.info(
      `✂️ Prepared ${chunks.length} prose chunks and ${codeSnippets.length} code snippets from ${url}`,
    );

    return { chunks, codeSnippets };
  }
}
