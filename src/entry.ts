#!/usr/bin/env node
import { CommanderError } from "commander";

import { buildProgram } from "./cli/program.js";
import { formatErrorMessage } from "./retry.js";
import { defaultRuntime } from "./runtime.js";

try {
  await buildProgram(defaultRuntime).parseAsync(process.argv);
} catch (error) {
  // commander has already printed usage errors and set the exit code
  if (!(error instanceof CommanderError)) {
    defaultRuntime.error(`Error: ${formatErrorMessage(error)}`);
    defaultRuntime.exit(1);
  }
}
