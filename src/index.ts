import { createCliProgram } from "./cli";
import { logger } from "./utils/logger";

createCliProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
