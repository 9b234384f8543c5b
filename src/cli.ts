#!/usr/bin/env node
import "dotenv/config";
import { SiteError, UsageError } from "./errors.js";
import { logger } from "./logger.js";
import { buildProgram } from "./program.js";

async function main() {
  try {
    await buildProgram().parseAsync(process.argv);
  } catch (err) {
    // commander has already printed the message and usage
    if (!(err instanceof UsageError)) {
      if (err instanceof SiteError) logger.error({ code: err.code }, err.message);
      else logger.error(err, "generation failed");
    }
    process.exitCode = 1;
  }
}

void main();
