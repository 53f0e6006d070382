/**
 * Prepare command - Produces the chunk and code snippet records for one page.
 */

import { type Command, Option } from "commander";
import { PrepareDocumentTool } from "../../tools";
import { CODE_BLOCK_MIN_LENGTH, SPLITTER_DEFAULT_CHUNK_SIZE } from "../../utils/config";
import { formatOutput, parseIntegerOption, readInput } from "../utils";

export async function prepareAction(
  file: string | undefined,
  options: { url: string; title: string; chunkSize: number; minLength: number },
) {
  const markdown = await readInput(file);
  // No title generator is available from the command line
  const prepareTool = new PrepareDocumentTool();

  const result = await prepareTool.execute({
    url: options.url,
    title: options.title,
    markdown,
    chunkSize: options.chunkSize,
    minCodeLength: options.minLength,
  });

  console.log(formatOutput(result));
}

export function createPrepareCommand(program: Command): Command {
  return program
    .command("prepare [file]")
    .description("Build prose chunk and code snippet records for a page, tagged with its metadata")
    .requiredOption("-u, --url <url>", "Source URL of the page")
    .option("-t, --title <title>", "Page title", "")
    .addOption(
      new Option("-s, --chunk-size <number>", "Target maximum chunk size in characters")
        .env("MD_CHUNK_SIZE")
        .argParser(parseIntegerOption)
        .default(SPLITTER_DEFAULT_CHUNK_SIZE),
    )
    .addOption(
      new Option("-m, --min-length <number>", "Drop code blocks shorter than this")
        .env("MD_CHUNK_MIN_CODE_LENGTH")
        .argParser(parseIntegerOption)
        .default(CODE_BLOCK_MIN_LENGTH),
    )
    .action(prepareAction);
}
