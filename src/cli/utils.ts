/**
 * Shared CLI utilities and helper functions.
 */

import fs from "node:fs/promises";
import { text } from "node:stream/consumers";
import { type Command, InvalidArgumentError } from "commander";
import { LogLevel, setLogLevel } from "../utils/logger";
import type { GlobalOptions } from "./types";

/**
 * Traverses the command hierarchy to find the root command and returns its options.
 */
export function getGlobalOptions(command?: Command): GlobalOptions {
  let rootCommand = command;
  while (rootCommand?.parent) {
    rootCommand = rootCommand.parent;
  }
  return rootCommand?.opts<GlobalOptions>() ?? {};
}

/**
 * Sets the log level from the global flags. `--silent` wins over `--verbose`.
 */
export function setupLogging(options: GlobalOptions): void {
  if (options.silent) {
    setLogLevel(LogLevel.ERROR);
  } else if (options.verbose) {
    setLogLevel(LogLevel.DEBUG);
  } else {
    setLogLevel(LogLevel.INFO);
  }
}

/**
 * Parses an integer option value. Range checks are left to the tools.
 */
export function parseIntegerOption(value: string): number {
  const parsed = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`'${value}' is not an integer.`);
  }
  return parsed;
}

/**
 * Reads the markdown input from a file, or from stdin when no file (or "-") is given.
 */
export async function readInput(file?: string): Promise<string> {
  if (!file || file === "-") {
    return text(process.stdin);
  }
  return fs.readFile(file, "utf8");
}

/**
 * Formats command output as indented JSON.
 */
export function formatOutput(data: unknown): string {
  return JSON.stringify(data, null, 2);
}
