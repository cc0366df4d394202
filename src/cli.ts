#!/usr/bin/env node
import { createProgram } from "./commands.js";
import { errorMessage } from "./errors.js";
import { getLogger } from "./logger.js";

async function main(): Promise<void> {
  const logger = getLogger();
  try {
    await createProgram({ logger }).parseAsync(process.argv);
  } catch (err) {
    logger.error(errorMessage(err));
    process.exitCode = 1;
  }
}

void main();
