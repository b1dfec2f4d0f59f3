#!/usr/bin/env node

/**
 * mongo-liveness CLI - rate-limited MongoDB liveness workload
 */

import { Command } from "commander";
import { createRunCommand } from "./commands/run.js";
import { createInspectCommand } from "./commands/inspect.js";
import { logger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";

const pkg = {
  name: "mongo-liveness",
  version: "0.1.0",
  description:
    "Rate-limited concurrent find/insert/update workload that keeps a MongoDB deployment under observable load",
};

export function createProgram(): Command {
  const program = new Command();

  program.name(pkg.name).description(pkg.description).version(pkg.version);

  program.addCommand(createRunCommand());
  program.addCommand(createInspectCommand());

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  logger.error("Unexpected error", { error: errorMessage(error) });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message: errorMessage(error),
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
