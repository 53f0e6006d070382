/**
 * Main CLI setup and command registration.
 */

import { Command, Option } from "commander";
import { createChunkCommand } from "./commands/chunk";
import { createExtractCodeCommand } from "./commands/extractCode";
import { createPrepareCommand } from "./commands/prepare";
import { getGlobalOptions, setupLogging } from "./utils";

/**
 * Creates and configures the main CLI program with all commands.
 */
export function createCliProgram(): Command {
  const program = new Command();

  program
    .name("md-chunk")
    .description("Header-aware markdown chunking and code block extraction for embedding pipelines.")
    .version(__APP_VERSION__)
    // Mutually exclusive logging flags
    .addOption(
      new Option("--verbose", "Enable verbose (debug) logging").conflicts("silent"),
    )
    .addOption(new Option("--silent", "Disable all logging except errors"))
    .allowExcessArguments(false)
    .showHelpAfterError(true);

  program.hook("preAction", (_thisCommand, actionCommand) => {
    setupLogging(getGlobalOptions(actionCommand));
  });

  createChunkCommand(program);
  createExtractCodeCommand(program);
  createPrepareCommand(program);

  return program;
}
