#!/usr/bin/env node
import { createProgram, EXIT_FAILED } from "./cli";
import { logger } from "./logger";

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error(`Backup failed: ${message}`);
  process.exitCode = EXIT_FAILED;
});
