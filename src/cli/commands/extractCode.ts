/**
 * Extract code command - Lists the fenced code blocks of a markdown document.
 */

import { type Command, Option } from "commander";
import { ExtractCodeBlocksTool } from "../../tools";
import { CODE_BLOCK_MIN_LENGTH } from "../../utils/config";
import { formatOutput, parseIntegerOption, readInput } from "../utils";

export async function extractCodeAction(file: string | undefined, options: { minLength: number }) {
  const markdown = await readInput(file);
  const extractTool = new ExtractCodeBlocksTool();

  const result = await extractTool.execute({ markdown, minLength: options.minLength });

  console.log(formatOutput(result.codeBlocks));
}

export function createExtractCodeCommand(program: Command): Command {
  return program
    .command("extract-code [file]")
    .description(
      "Extract fenced code blocks with surrounding context (reads stdin when no file is given)",
    )
    .addOption(
      new Option("-m, --min-length <number>", "Drop code blocks shorter than this")
        .env("MD_CHUNK_MIN_CODE_LENGTH")
        .argParser(parseIntegerOption)
        .default(CODE_BLOCK_MIN_LENGTH),
    )
    .action(extractCodeAction);
}
