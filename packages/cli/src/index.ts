#!/usr/bin/env node

import chalk from "chalk";
import { CommanderError } from "commander";
import { createProgram } from "./program";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (error instanceof CommanderError) {
      // Commander has already printed usage or the parse error
      process.exitCode = error.exitCode;
      return;
    }
    console.error(chalk.red("Error:"), error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
