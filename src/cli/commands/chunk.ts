/**
 * Chunk command - Splits a markdown document into header-aware chunks.
 */

import { type Command, Option } from "commander";
import { ChunkTextTool } from "../../tools";
import { SPLITTER_DEFAULT_CHUNK_SIZE } from "../../utils/config";
import { formatOutput, parseIntegerOption, readInput } from "../utils";

export async function chunkAction(file: string | undefined, options: { chunkSize: number }) {
  const markdown = await readInput(file);
  const chunkTextTool = new ChunkTextTool();

  const result = await chunkTextTool.execute({ markdown, chunkSize: options.chunkSize });

  console.log(formatOutput(result.chunks));
}

export function createChunkCommand(program: Command): Command {
  return program
    .command("chunk [file]")
    .description("Split a markdown document into chunks (reads stdin when no file is given)")
    .addOption(
      new Option("-s, --chunk-size <number>", "Target maximum chunk size in characters")
        .env("MD_CHUNK_SIZE")
        .argParser(parseIntegerOption)
        .default(SPLITTER_DEFAULT_CHUNK_SIZE),
    )
    .action(chunkAction);
}
