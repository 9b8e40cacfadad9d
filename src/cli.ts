#!/usr/bin/env node
import { createProgram } from "./cli-main.js";
import { errorMessage } from "./errors.js";
import { formatError } from "./ui.js";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.stderr.write(`${formatError(errorMessage(error))}\n`);
    process.exitCode = 1;
  });
