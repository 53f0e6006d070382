import type { CodeBlock } from "../splitter";
import {
  CODE_TITLE_CODE_CHARS,
  CODE_TITLE_CONTEXT_CHARS,
  CODE_TITLE_FALLBACK,
} from "../utils/config";
import { logger } from "../utils/logger";
import { firstCodePoints, lastCodePoints } from "../utils/text";

/**
 * Produces a one-sentence title for a code snippet from a prompt.
 * Implementations wrap an LLM client; none ships with this package.
 */
export interface CodeTitleGenerator {
  generateTitle(prompt: string): Promise<string>;
}

/**
 * Builds the title prompt for a code block. The prose before the block keeps
 * its last characters, the code and the prose after keep their first ones.
 */
export function buildCodeTitlePrompt(block: CodeBlock): string {
  const before = lastCodePoints(block.contextBefore, CODE_TITLE_CONTEXT_CHARS);
  const code = firstCodePoints(block.code, CODE_TITLE_CODE_CHARS);
  const after = firstCodePoints(block.contextAfter, CODE_TITLE_CONTEXT_CHARS);

  return [
    "<context_before>",
    before,
    "</context_before>",
    "",
    "<code_example>",
    code,
    "</code_example>",
    "",
    "<context_after>",
    after,
    "</context_after>",
    "",
    "Based on the code example and its surrounding context, provide a concise 1-sentence summary/title that describes what this code example demonstrates. " +
      "Formulate it so it serves well as search metadata (e.g. 'Example demonstrating how to configure a request timeout'). " +
      "Do NOT use Markdown formatting or quote marks.",
  ].join("\n");
}

/**
 * Asks the generator for a title, falling back to a generic one when the call
 * fails or returns nothing.
 */
export async function resolveCodeTitle(
  generator: CodeTitleGenerator,
  block: CodeBlock,
): Promise<string> {
  try {
    const title = (await generator.generateTitle(buildCodeTitlePrompt(block))).trim();
    if (title) {
      return title;
    }
    logger.warn("⚠️ Code title generator returned an empty title, using fallback");
  } catch (error) {
    logger.warn(
      `⚠️ Failed to generate code title: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return CODE_TITLE_FALLBACK;
}

/**
 * Formats the text that gets embedded for a code snippet.
 */
export function formatCodePayload(code: string, title?: string): string {
  const body = `Code Snippet:\n${code}`;
  return title ? `Title: ${title}\n\n${body}` : body;
}
